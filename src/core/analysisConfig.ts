export const ACTIVITY_ANALYSIS_CONFIG = {
    windowing: {
        maxWindowSamples: 20,
        overlapRatio: 0.5
    },
    classifier: {
        stationaryMagMax: 1.05,
        standingVarMax: 0.01,
        sittingVarMax: 0.02,
        lyingVarMax: 0.05,
        walking: { magMin: 1.1, magMax: 1.5, totalVarMin: 0.05, totalVarMax: 0.3 },
        running: { magMin: 1.5, totalVarMin: 0.3 },
        cycling: { magMin: 1.1, magMax: 1.8, axisVarMin: 0.1, axisVarMax: 0.5 }
    },
    segmentation: {
        finalSegmentConfidence: 0.7
    },
    metrics: {
        gravityG: 1.0,
        intensityFullScaleG: 1.0,
        activeIntensityThreshold: 0.3,
        consistencyWindowSec: 1,
        digits: 3
    },
    patterns: {
        sedentaryMinMinutes: 30,
        activeMinMinutes: 10,
        mixedMinSegments: 5,
        mixedMinDistinctLabels: 3
    }
};
