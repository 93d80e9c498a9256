import {
    ActivityRecognitionError,
    MalformedInputError,
    createRecognizer,
    describeError
} from '@/core';
import type { ActivityLabel, ActivityRecognizer } from '@/core';
import { validateAccelerationData, validateActivityRequest } from './batchValidation';
import { toMetricsWire, toPatternWire, toSegmentWire } from './wireFormat';
import type { ActivityMetricsWire, ActivityResponseWire, ErrorResponseWire } from './wireFormat';
import { loadSettings } from './settings';
import type { Settings } from './settings';
import { DebugLogger, debugLog } from './debugLog';

export type ServiceResponse<T> =
    | { statusCode: 200; body: T }
    | { statusCode: 422 | 500; body: ErrorResponseWire };

export interface HealthReport {
    status: 'healthy';
    service: string;
    version: string;
}

/**
 * Transport-agnostic request boundary: validates JSON payloads, runs the
 * recognizer and maps failures to status codes. Never throws.
 */
export interface ActivityService {
    recognizeActivity(payload: unknown): ServiceResponse<ActivityResponseWire>;
    calculateMetrics(payload: unknown): ServiceResponse<ActivityMetricsWire>;
    getActivityTypes(): ServiceResponse<ActivityLabel[]>;
    getHealth(): HealthReport;
}

const malformed = (errors: string[]): ServiceResponse<never> => ({
    statusCode: 422,
    body: { status: 'error', message: 'Malformed acceleration data', errors }
});

class DefaultActivityService implements ActivityService {
    private readonly recognizer: ActivityRecognizer;

    constructor(
        private readonly settings: Settings,
        private readonly logger: DebugLogger,
        recognizer?: ActivityRecognizer
    ) {
        this.recognizer = recognizer
            ?? createRecognizer({ activeIntensityThreshold: settings.activityDetectionThreshold });
    }

    recognizeActivity(payload: unknown): ServiceResponse<ActivityResponseWire> {
        const validation = validateActivityRequest(payload);
        if (!validation.success) {
            this.logger.warn(`recognize rejected: ${validation.errors.length} validation issue(s)`);
            return malformed(validation.errors);
        }

        const { batch, includeMetrics, includePatterns, userId } = validation.data;
        return this.handle<ActivityResponseWire>('recognize', () => {
            const result = this.recognizer.recognize(batch, includePatterns);
            this.logger.log(
                `recognize user=${userId} samples=${batch.samples.length} ` +
                `segments=${result.segments.length} dominant=${result.dominantActivity}`
            );
            return {
                status: 'success',
                activity_segments: result.segments.map(toSegmentWire),
                activity_patterns: result.patterns.map(toPatternWire),
                dominant_activity: result.dominantActivity,
                overall_metrics: includeMetrics ? toMetricsWire(result.overallMetrics) : null
            };
        });
    }

    calculateMetrics(payload: unknown): ServiceResponse<ActivityMetricsWire> {
        const validation = validateAccelerationData(payload);
        if (!validation.success) {
            this.logger.warn(`metrics rejected: ${validation.errors.length} validation issue(s)`);
            return malformed(validation.errors);
        }

        const batch = validation.data;
        return this.handle('metrics', () => toMetricsWire(this.recognizer.computeMetrics(batch)));
    }

    getActivityTypes(): ServiceResponse<ActivityLabel[]> {
        return this.handle('activity types', () => this.recognizer.listSupportedLabels());
    }

    getHealth(): HealthReport {
        return { status: 'healthy', service: this.settings.serviceName, version: this.settings.version };
    }

    private handle<T>(operation: string, run: () => T): ServiceResponse<T> {
        try {
            return { statusCode: 200, body: run() };
        } catch (error) {
            if (error instanceof MalformedInputError) {
                this.logger.warn(`${operation} rejected: ${error.message}`);
                return malformed(error.issues);
            }

            const code = error instanceof ActivityRecognitionError ? error.code : 'UNEXPECTED';
            this.logger.error(`${operation} failed [${code}]: ${describeError(error)}`);
            return {
                statusCode: 500,
                body: { status: 'error', message: `Error processing ${operation}: ${describeError(error)}` }
            };
        }
    }
}

/**
 * `recognizer` replaces the heuristic recognizer built from `settings`.
 */
export const createActivityService = (
    settings: Settings = loadSettings(),
    logger: DebugLogger = debugLog,
    recognizer?: ActivityRecognizer
): ActivityService => {
    return new DefaultActivityService(settings, logger, recognizer);
};
