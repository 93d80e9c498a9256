import type { AccelerationSampleV1, FeatureVectorV1, Vector3 } from './types';
import { getMean, getVariance } from './stats';
import { ACTIVITY_ANALYSIS_CONFIG } from './analysisConfig';

/**
 * Calculates the Euclidean magnitude of a 3D vector.
 */
export const getMagnitude = (v: Vector3): number => {
    return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
};

export interface WindowPlan {
    windowSize: number;
    step: number;
}

/**
 * Window size shrinks to the batch length for short batches. A one-sample
 * batch would give a zero step, so the step never drops below 1.
 */
export const planWindows = (
    sampleCount: number,
    maxWindowSamples: number = ACTIVITY_ANALYSIS_CONFIG.windowing.maxWindowSamples
): WindowPlan => {
    const windowSize = Math.min(maxWindowSamples, sampleCount);
    const overlap = ACTIVITY_ANALYSIS_CONFIG.windowing.overlapRatio;
    const step = Math.max(1, Math.floor(windowSize * (1 - overlap)));
    return { windowSize, step };
};

const summarizeWindow = (window: AccelerationSampleV1[]): FeatureVectorV1 => {
    const xs = window.map(s => s.x);
    const ys = window.map(s => s.y);
    const zs = window.map(s => s.z);

    return {
        meanX: getMean(xs),
        meanY: getMean(ys),
        meanZ: getMean(zs),
        varX: getVariance(xs),
        varY: getVariance(ys),
        varZ: getVariance(zs),
        meanMag: getMean(window.map(getMagnitude)),
        startTime: window[0].timestamp,
        endTime: window[window.length - 1].timestamp
    };
};

/**
 * Lazily yields one feature vector per overlapping window. Trailing samples
 * that cannot fill a whole window are dropped.
 */
export function* iterateFeatureWindows(
    samples: AccelerationSampleV1[],
    maxWindowSamples?: number
): Generator<FeatureVectorV1> {
    const { windowSize, step } = planWindows(samples.length, maxWindowSamples);
    if (windowSize === 0) return;

    for (let start = 0; start + windowSize <= samples.length; start += step) {
        yield summarizeWindow(samples.slice(start, start + windowSize));
    }
}

export const extractFeatures = (samples: AccelerationSampleV1[], maxWindowSamples?: number): FeatureVectorV1[] => {
    return Array.from(iterateFeatureWindows(samples, maxWindowSamples));
};
