import { ACTIVITY_LABELS, MAX_EPOCH_MS } from './types';
import type {
    AccelerationBatchV1,
    ActivityLabel,
    ActivityMetricsV1,
    ActivityRecognizer,
    RecognitionResultV1,
    RecognizerOptions
} from './types';
import { iterateFeatureWindows } from './features';
import { buildSegments } from './segmentation';
import { computeMetrics } from './metrics';
import { selectDominantActivity } from './dominance';
import { detectPatterns } from './patterns';
import { ACTIVITY_ANALYSIS_CONFIG } from './analysisConfig';
import { ActivityRecognitionError, ComputationError, MalformedInputError, describeError } from './errors';

const METRIC_KEYS: Array<keyof ActivityMetricsV1> = [
    'avgIntensity',
    'peakIntensity',
    'movementConsistency',
    'activeMinutes',
    'totalDuration'
];

/**
 * Collects every way a batch breaks the data model. Ordering is checked,
 * never repaired.
 */
export const findBatchIssues = (batch: AccelerationBatchV1): string[] => {
    const issues: string[] = [];
    if (!Number.isFinite(batch.samplingRateHz) || batch.samplingRateHz <= 0) {
        issues.push(`samplingRateHz: expected a positive number, got ${batch.samplingRateHz}`);
    }

    batch.samples.forEach((sample, index) => {
        const fields = [['timestamp', sample.timestamp], ['x', sample.x], ['y', sample.y], ['z', sample.z]] as const;
        for (const [name, value] of fields) {
            if (!Number.isFinite(value)) {
                issues.push(`samples.${index}.${name}: expected a finite number`);
            }
        }
        if (Number.isFinite(sample.timestamp) && Math.abs(sample.timestamp) > MAX_EPOCH_MS) {
            issues.push(`samples.${index}.timestamp: outside the representable date range`);
        }
        if (index > 0 && sample.timestamp < batch.samples[index - 1].timestamp) {
            issues.push(`samples.${index}.timestamp: earlier than the previous sample`);
        }
    });

    return issues;
};

const assertBatchInvariants = (batch: AccelerationBatchV1): void => {
    const issues = findBatchIssues(batch);
    if (issues.length > 0) {
        throw new MalformedInputError(issues);
    }
};

const assertFiniteMetrics = (metrics: ActivityMetricsV1, where: string): void => {
    for (const key of METRIC_KEYS) {
        if (!Number.isFinite(metrics[key])) {
            throw new ComputationError(`${where}: ${key} is not finite (${metrics[key]})`);
        }
    }
};

/**
 * Runs one pipeline step; anything other than an ActivityRecognitionError is
 * rethrown as a ComputationError carrying the original as its cause.
 */
export const runGuarded = <T>(operation: string, step: () => T): T => {
    try {
        return step();
    } catch (error) {
        if (error instanceof ActivityRecognitionError) throw error;
        throw new ComputationError(`${operation} failed: ${describeError(error)}`, { cause: error });
    }
};

class HeuristicActivityRecognizerV1 implements ActivityRecognizer {
    private readonly options: Required<RecognizerOptions>;

    constructor(options: RecognizerOptions = {}) {
        this.options = {
            activeIntensityThreshold: options.activeIntensityThreshold
                ?? ACTIVITY_ANALYSIS_CONFIG.metrics.activeIntensityThreshold
        };
    }

    recognize(batch: AccelerationBatchV1, includePatterns: boolean): RecognitionResultV1 {
        assertBatchInvariants(batch);

        return runGuarded<RecognitionResultV1>('recognize', () => {
            // 1. Overall metrics
            const overallMetrics = computeMetrics(batch.samples, batch.samplingRateHz, this.options);
            assertFiniteMetrics(overallMetrics, 'overall metrics');

            // 2. Windows -> labels -> segments
            const segments = buildSegments(iterateFeatureWindows(batch.samples), {
                samples: batch.samples,
                samplingRateHz: batch.samplingRateHz,
                metricsOptions: this.options
            });
            segments.forEach((segment, index) => assertFiniteMetrics(segment.metrics, `segment ${index}`));

            // 3. Timeline summaries
            const dominantActivity = selectDominantActivity(segments);
            const patterns = includePatterns ? detectPatterns(segments) : [];

            return {
                status: 'success',
                segments,
                dominantActivity,
                overallMetrics,
                patterns
            };
        });
    }

    computeMetrics(batch: AccelerationBatchV1): ActivityMetricsV1 {
        assertBatchInvariants(batch);

        return runGuarded('computeMetrics', () => {
            const metrics = computeMetrics(batch.samples, batch.samplingRateHz, this.options);
            assertFiniteMetrics(metrics, 'metrics');
            return metrics;
        });
    }

    listSupportedLabels(): ActivityLabel[] {
        return [...ACTIVITY_LABELS];
    }
}

export const createRecognizer = (options?: RecognizerOptions): ActivityRecognizer => {
    return new HeuristicActivityRecognizerV1(options);
};

export * from './types';
export * from './errors';
export { ACTIVITY_ANALYSIS_CONFIG } from './analysisConfig';
export { extractFeatures, iterateFeatureWindows, getMagnitude } from './features';
export { classifyWindow } from './classifier';
export { computeMetrics, getIntensity } from './metrics';
export { buildSegments, getSamplesBetween, getSegmentDurationSec } from './segmentation';
export { selectDominantActivity } from './dominance';
export { detectPatterns } from './patterns';
