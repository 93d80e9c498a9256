export type MsEpoch = number;

/** Largest distance from the epoch a `Date` can hold, in ms. */
export const MAX_EPOCH_MS = 8.64e15;

export interface Vector3 {
    x: number;
    y: number;
    z: number;
}

/** Single tri-axial reading, acceleration in g. */
export interface AccelerationSampleV1 extends Vector3 {
    timestamp: MsEpoch;
}

export interface AccelerationBatchV1 {
    dataType: string;
    deviceInfo: Record<string, unknown>;
    samplingRateHz: number;
    startTime: MsEpoch;
    samples: AccelerationSampleV1[];
    metadata?: Record<string, unknown>;
    id?: string;
}

export const ACTIVITY_LABELS = [
    'walking',
    'running',
    'standing',
    'sitting',
    'lying',
    'cycling',
    'unknown'
] as const;

export type ActivityLabel = typeof ACTIVITY_LABELS[number];

export interface FeatureVectorV1 {
    meanX: number;
    meanY: number;
    meanZ: number;
    varX: number;
    varY: number;
    varZ: number;
    meanMag: number;
    startTime: MsEpoch;
    endTime: MsEpoch;
}

export interface WindowClassificationV1 {
    label: ActivityLabel;
    confidence: number;
}

export interface ActivityMetricsV1 {
    avgIntensity: number;
    peakIntensity: number;
    movementConsistency: number;
    activeMinutes: number;
    /** Seconds. */
    totalDuration: number;
}

export interface ActivitySegmentV1 {
    startTime: MsEpoch;
    endTime: MsEpoch;
    activityType: ActivityLabel;
    confidence: number;
    metrics: ActivityMetricsV1;
}

export type PatternType = 'sedentary' | 'active' | 'mixed';

export interface ActivityPatternV1 {
    patternType: PatternType;
    description: string;
    totalDurationMinutes: number;
    // Same objects as the timeline's segments, never copies.
    segments: readonly ActivitySegmentV1[];
}

export interface RecognitionResultV1 {
    status: 'success';
    segments: ActivitySegmentV1[];
    dominantActivity: ActivityLabel;
    overallMetrics: ActivityMetricsV1;
    patterns: ActivityPatternV1[];
}

export interface MetricsOptions {
    activeIntensityThreshold?: number;
}

export type RecognizerOptions = MetricsOptions;

export interface ActivityRecognizer {
    recognize(batch: AccelerationBatchV1, includePatterns: boolean): RecognitionResultV1;
    computeMetrics(batch: AccelerationBatchV1): ActivityMetricsV1;
    listSupportedLabels(): ActivityLabel[];
}
