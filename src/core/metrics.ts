import type { AccelerationSampleV1, ActivityMetricsV1, MetricsOptions } from './types';
import { chunk, clamp01, getMean, getStdDev, round } from './stats';
import { getMagnitude } from './features';
import { ACTIVITY_ANALYSIS_CONFIG } from './analysisConfig';

const config = ACTIVITY_ANALYSIS_CONFIG.metrics;

export const ZERO_METRICS: Readonly<ActivityMetricsV1> = Object.freeze({
    avgIntensity: 0,
    peakIntensity: 0,
    movementConsistency: 0,
    activeMinutes: 0,
    totalDuration: 0
});

/**
 * Instantaneous intensity: deviation of the magnitude from 1 g, scaled so
 * that a full extra g saturates at 1.
 */
export const getIntensity = (sample: AccelerationSampleV1): number => {
    return clamp01(Math.abs(getMagnitude(sample) - config.gravityG) / config.intensityFullScaleG);
};

/**
 * 1 / (1 + coefficient of variation) over one-second window means.
 */
export const getMovementConsistency = (intensities: number[], samplingRateHz: number): number => {
    const windowSamples = Math.max(1, Math.round(samplingRateHz * config.consistencyWindowSec));
    const windowMeans = chunk(intensities, windowSamples).map(getMean);
    if (windowMeans.length < 2) return 1;

    const mean = getMean(windowMeans);
    if (mean <= 0) return 1;

    const cv = getStdDev(windowMeans) / mean;
    return clamp01(1 / (1 + cv));
};

const getActiveMs = (samples: AccelerationSampleV1[], intensities: number[], threshold: number): number => {
    let activeMs = 0;
    for (let i = 0; i < samples.length - 1; i++) {
        if (intensities[i] > threshold) {
            activeMs += Math.max(0, samples[i + 1].timestamp - samples[i].timestamp);
        }
    }
    return activeMs;
};

export const computeMetrics = (
    samples: AccelerationSampleV1[],
    samplingRateHz: number,
    options: MetricsOptions = {}
): ActivityMetricsV1 => {
    if (samples.length === 0) {
        return { ...ZERO_METRICS };
    }

    const threshold = options.activeIntensityThreshold ?? config.activeIntensityThreshold;
    const intensities = samples.map(getIntensity);
    const durationMs = samples.length > 1
        ? Math.max(0, samples[samples.length - 1].timestamp - samples[0].timestamp)
        : 0;

    return {
        avgIntensity: round(getMean(intensities), config.digits),
        peakIntensity: round(intensities.reduce((peak, v) => Math.max(peak, v), 0), config.digits),
        movementConsistency: round(getMovementConsistency(intensities, samplingRateHz), config.digits),
        activeMinutes: round(getActiveMs(samples, intensities, threshold) / 60000, config.digits),
        totalDuration: round(durationMs / 1000, config.digits)
    };
};
