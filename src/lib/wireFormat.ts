import type {
    ActivityLabel,
    ActivityMetricsV1,
    ActivityPatternV1,
    ActivitySegmentV1,
    MsEpoch,
    PatternType
} from '@/core';

export interface ActivityMetricsWire {
    avg_intensity: number;
    peak_intensity: number;
    movement_consistency: number;
    active_minutes: number;
    total_duration: number;
}

export interface ActivitySegmentWire {
    start_time: string;
    end_time: string;
    activity_type: ActivityLabel;
    confidence: number;
    metrics: ActivityMetricsWire;
}

export interface ActivityPatternWire {
    pattern_type: PatternType;
    description: string;
    total_duration: number;
    segments: ActivitySegmentWire[];
}

export interface ActivityResponseWire {
    status: 'success';
    activity_segments: ActivitySegmentWire[];
    activity_patterns: ActivityPatternWire[];
    dominant_activity: ActivityLabel;
    overall_metrics: ActivityMetricsWire | null;
}

export interface ErrorResponseWire {
    status: 'error';
    message: string;
    errors?: string[];
}

export const toIsoTimestamp = (value: MsEpoch): string => new Date(value).toISOString();

export const toMetricsWire = (metrics: ActivityMetricsV1): ActivityMetricsWire => ({
    avg_intensity: metrics.avgIntensity,
    peak_intensity: metrics.peakIntensity,
    movement_consistency: metrics.movementConsistency,
    active_minutes: metrics.activeMinutes,
    total_duration: metrics.totalDuration
});

export const toSegmentWire = (segment: ActivitySegmentV1): ActivitySegmentWire => ({
    start_time: toIsoTimestamp(segment.startTime),
    end_time: toIsoTimestamp(segment.endTime),
    activity_type: segment.activityType,
    confidence: segment.confidence,
    metrics: toMetricsWire(segment.metrics)
});

// JSON has no references, so a pattern's segments are serialized inline.
export const toPatternWire = (pattern: ActivityPatternV1): ActivityPatternWire => ({
    pattern_type: pattern.patternType,
    description: pattern.description,
    total_duration: pattern.totalDurationMinutes,
    segments: pattern.segments.map(toSegmentWire)
});
