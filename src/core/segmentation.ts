import type {
    AccelerationSampleV1,
    ActivityLabel,
    ActivitySegmentV1,
    FeatureVectorV1,
    MetricsOptions,
    MsEpoch,
    WindowClassificationV1
} from './types';
import { classifyWindow } from './classifier';
import { computeMetrics } from './metrics';
import { ACTIVITY_ANALYSIS_CONFIG } from './analysisConfig';

type SegmentationState =
    | { kind: 'NO_SEGMENT' }
    | { kind: 'IN_SEGMENT'; label: ActivityLabel; startTime: MsEpoch; lastWindow: FeatureVectorV1 };

export interface SegmentationContext {
    /** Ordered by timestamp. */
    samples: AccelerationSampleV1[];
    samplingRateHz: number;
    metricsOptions?: MetricsOptions;
    classify?: (features: FeatureVectorV1) => WindowClassificationV1;
}

export const getSegmentDurationSec = (segment: Pick<ActivitySegmentV1, 'startTime' | 'endTime'>): number => {
    return (segment.endTime - segment.startTime) / 1000;
};

// First index whose timestamp is >= `time` (or > `time` with `inclusive`); samples are non-decreasing.
const searchTimestamp = (samples: AccelerationSampleV1[], time: MsEpoch, inclusive: boolean): number => {
    let lo = 0;
    let hi = samples.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        const before = inclusive ? samples[mid].timestamp <= time : samples[mid].timestamp < time;
        if (before) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo;
};

/**
 * Samples with `startTime <= timestamp <= endTime`.
 */
export const getSamplesBetween = (
    samples: AccelerationSampleV1[],
    startTime: MsEpoch,
    endTime: MsEpoch
): AccelerationSampleV1[] => {
    return samples.slice(searchTimestamp(samples, startTime, false), searchTimestamp(samples, endTime, true));
};

const closeSegment = (
    context: SegmentationContext,
    label: ActivityLabel,
    startTime: MsEpoch,
    endTime: MsEpoch,
    confidence: number
): ActivitySegmentV1 => {
    const inside = getSamplesBetween(context.samples, startTime, endTime);
    return {
        startTime,
        endTime,
        activityType: label,
        confidence,
        metrics: computeMetrics(inside, context.samplingRateHz, context.metricsOptions)
    };
};

/**
 * A label change closes the open segment at the new window's start time and
 * reports the confidence of the window that forced the change. The segment
 * still open after the last window ends at that window's end time with a
 * fixed confidence.
 */
export const buildSegments = (
    features: Iterable<FeatureVectorV1>,
    context: SegmentationContext
): ActivitySegmentV1[] => {
    const classify = context.classify ?? classifyWindow;
    const segments: ActivitySegmentV1[] = [];
    let state: SegmentationState = { kind: 'NO_SEGMENT' };

    for (const window of features) {
        const { label, confidence } = classify(window);

        if (state.kind === 'IN_SEGMENT' && state.label === label) {
            const extended: Extract<SegmentationState, { kind: 'IN_SEGMENT' }> = { ...state, lastWindow: window };
            state = extended;
            continue;
        }

        if (state.kind === 'IN_SEGMENT') {
            segments.push(closeSegment(context, state.label, state.startTime, window.startTime, confidence));
        }
        state = { kind: 'IN_SEGMENT', label, startTime: window.startTime, lastWindow: window };
    }

    if (state.kind === 'IN_SEGMENT') {
        segments.push(closeSegment(
            context,
            state.label,
            state.startTime,
            state.lastWindow.endTime,
            ACTIVITY_ANALYSIS_CONFIG.segmentation.finalSegmentConfidence
        ));
    }

    return segments;
};
