import { describe, expect, it } from 'vitest';
import { classifyWindow } from './classifier';
import type { FeatureVectorV1 } from './types';

const buildFeatures = (meanMag: number, varX: number, varY: number, varZ: number): FeatureVectorV1 => ({
    meanX: 0,
    meanY: 0,
    meanZ: meanMag,
    varX,
    varY,
    varZ,
    meanMag,
    startTime: 0,
    endTime: 380
});

describe('classifyWindow', () => {
    it.each([
        { label: 'standing', confidence: 0.8, features: buildFeatures(1.0, 0.005, 0.005, 0.005) },
        { label: 'sitting', confidence: 0.8, features: buildFeatures(1.0, 0.015, 0.005, 0.005) },
        { label: 'lying', confidence: 0.7, features: buildFeatures(1.02, 0.04, 0.03, 0.01) },
        { label: 'walking', confidence: 0.9, features: buildFeatures(1.3, 0.05, 0.05, 0.05) },
        { label: 'running', confidence: 0.85, features: buildFeatures(1.7, 0.2, 0.2, 0.2) },
        { label: 'cycling', confidence: 0.75, features: buildFeatures(1.3, 0.2, 0.2, 0) },
        { label: 'unknown', confidence: 0.5, features: buildFeatures(1.08, 0.001, 0.001, 0.001) }
    ])('labels $label windows with confidence $confidence', ({ label, confidence, features }) => {
        expect(classifyWindow(features)).toEqual({ label, confidence });
    });

    it('evaluates rules in priority order', () => {
        // Variances below every stationary bound: standing wins over sitting and lying.
        expect(classifyWindow(buildFeatures(1.0, 0.001, 0.001, 0.001)).label).toBe('standing');
        // Fits both walking and cycling bands on magnitude; walking is checked first.
        expect(classifyWindow(buildFeatures(1.3, 0.11, 0.11, 0)).label).toBe('walking');
    });

    it('treats every bound as strict', () => {
        expect(classifyWindow(buildFeatures(1.05, 0.001, 0.001, 0.001)).label).toBe('unknown');
        expect(classifyWindow(buildFeatures(1.1, 0.05, 0.05, 0.05)).label).toBe('unknown');
        expect(classifyWindow(buildFeatures(1.5, 0.1, 0.1, 0.1)).label).toBe('unknown');
        expect(classifyWindow(buildFeatures(1.0, 0.05, 0.001, 0.001)).label).toBe('unknown');
    });

    it('falls back to unknown when a stationary window is too noisy', () => {
        expect(classifyWindow(buildFeatures(1.0, 0.04, 0.04, 0.06))).toEqual({ label: 'unknown', confidence: 0.5 });
    });
});
