import { afterEach, describe, expect, it, vi } from 'vitest';
import { DebugLogger } from './debugLog';

describe('DebugLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('keeps the newest entries first up to its capacity', () => {
        const logger = new DebugLogger(3, false);
        ['one', 'two', 'three', 'four'].forEach(message => logger.log(message));

        expect(logger.getLogs().map(entry => entry.message)).toEqual(['four', 'three', 'two']);
    });

    it('records levels', () => {
        const logger = new DebugLogger(10, false);
        logger.warn('slow batch');
        logger.error('failed batch');

        expect(logger.getLogs().map(entry => [entry.level, entry.message])).toEqual([
            ['error', 'failed batch'],
            ['warn', 'slow batch']
        ]);
    });

    it('notifies subscribers until they unsubscribe', () => {
        const logger = new DebugLogger(10, false);
        const listener = vi.fn();
        const unsubscribe = logger.subscribe(listener);

        logger.log('first');
        logger.clear();
        unsubscribe();
        logger.log('second');

        expect(listener).toHaveBeenCalledTimes(2);
        expect(logger.getLogs()).toHaveLength(1);
    });

    it('echoes to the console writer for the level', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = new DebugLogger();

        logger.warn('rejected payload');

        expect(warn).toHaveBeenCalledWith('[WARN] rejected payload');
    });
});
