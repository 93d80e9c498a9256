import { describe, expect, it } from 'vitest';
import { buildSegments, getSamplesBetween, getSegmentDurationSec } from './segmentation';
import type { AccelerationSampleV1, FeatureVectorV1 } from './types';

// 50 samples at 50 Hz, 0..980 ms, resting at 1 g.
const samples: AccelerationSampleV1[] = Array.from({ length: 50 }, (_, i) => ({
    timestamp: i * 20,
    x: 0,
    y: 0,
    z: 1
}));

const standing = (startTime: number): FeatureVectorV1 => ({
    meanX: 0, meanY: 0, meanZ: 1,
    varX: 0.001, varY: 0.001, varZ: 0.001,
    meanMag: 1,
    startTime,
    endTime: startTime + 380
});

const walking = (startTime: number): FeatureVectorV1 => ({
    meanX: 0, meanY: 0, meanZ: 1.3,
    varX: 0.05, varY: 0.05, varZ: 0.05,
    meanMag: 1.3,
    startTime,
    endTime: startTime + 380
});

const context = { samples, samplingRateHz: 50 };

describe('buildSegments', () => {
    it('returns no segments without windows', () => {
        expect(buildSegments([], context)).toEqual([]);
    });

    it('closes a segment at the start of the window that changes label', () => {
        const segments = buildSegments([standing(0), standing(200), walking(400), walking(600)], context);

        expect(segments.map(s => [s.activityType, s.startTime, s.endTime, s.confidence])).toEqual([
            ['standing', 0, 400, 0.9],
            ['walking', 400, 980, 0.7]
        ]);
    });

    it('computes segment metrics over samples inside inclusive bounds', () => {
        const [first, last] = buildSegments([standing(0), walking(400), walking(600)], context);

        expect(first.metrics.totalDuration).toBe(0.4);
        expect(last.metrics.totalDuration).toBe(0.58);
        expect(first.metrics.avgIntensity).toBe(0);
    });

    it('computes each segment over its own slice of the samples', () => {
        // Samples 400..600 ms sit at 2 g, i.e. full intensity.
        const active = samples.map(s => (s.timestamp >= 400 && s.timestamp <= 600 ? { ...s, z: 2 } : s));

        const segments = buildSegments([standing(0), walking(400), standing(600)], { ...context, samples: active });

        expect(segments.map(s => [s.activityType, s.metrics.avgIntensity, s.metrics.peakIntensity])).toEqual([
            ['standing', 0.048, 1],
            ['walking', 1, 1],
            ['standing', 0.05, 1]
        ]);
        expect(segments[1].metrics).toMatchObject({ activeMinutes: 0.003, totalDuration: 0.2 });
    });

    it('reports the confidence of the window that forced each change', () => {
        const segments = buildSegments([standing(0), walking(200), standing(400)], context);

        expect(segments.map(s => [s.activityType, s.confidence])).toEqual([
            ['standing', 0.9],
            ['walking', 0.8],
            ['standing', 0.7]
        ]);
    });

    it('closes a single window at its own end time', () => {
        const segments = buildSegments([walking(0)], context);

        expect(segments).toHaveLength(1);
        expect(segments[0]).toMatchObject({ activityType: 'walking', startTime: 0, endTime: 380, confidence: 0.7 });
    });

    it('accepts a custom classifier', () => {
        const segments = buildSegments([standing(0), standing(200), standing(400)], {
            ...context,
            classify: features => features.startTime < 300
                ? { label: 'lying', confidence: 0.6 }
                : { label: 'cycling', confidence: 0.4 }
        });

        expect(segments.map(s => [s.activityType, s.startTime, s.endTime, s.confidence])).toEqual([
            ['lying', 0, 400, 0.4],
            ['cycling', 400, 780, 0.7]
        ]);
    });
});

describe('getSegmentDurationSec', () => {
    it('converts segment bounds to seconds', () => {
        expect(getSegmentDurationSec({ startTime: 1000, endTime: 4500 })).toBe(3.5);
    });
});

describe('getSamplesBetween', () => {
    const at = (...timestamps: number[]): AccelerationSampleV1[] => timestamps.map(timestamp => ({ timestamp, x: 0, y: 0, z: 1 }));

    it('includes samples on both bounds, repeated timestamps too', () => {
        const series = at(0, 20, 20, 40, 60, 60, 80);

        expect(getSamplesBetween(series, 20, 60).map(s => s.timestamp)).toEqual([20, 20, 40, 60, 60]);
    });

    it('returns nothing for a range between samples or past the end', () => {
        const series = at(0, 20, 40);

        expect(getSamplesBetween(series, 5, 15)).toEqual([]);
        expect(getSamplesBetween(series, 50, 90)).toEqual([]);
        expect(getSamplesBetween([], 0, 10)).toEqual([]);
    });

    it('matches a linear scan over a long series', () => {
        const series = at(...Array.from({ length: 500 }, (_, i) => Math.floor(i / 3) * 10));

        for (const [from, to] of [[0, 0], [15, 95], [100, 100], [1200, 1660], [1650, 5000]]) {
            const expected = series.filter(s => s.timestamp >= from && s.timestamp <= to);
            expect(getSamplesBetween(series, from, to)).toEqual(expected);
        }
    });
});
