import type { ActivityLabel, ActivityPatternV1, ActivitySegmentV1, PatternType } from './types';
import { getSegmentDurationSec } from './segmentation';
import { ACTIVITY_ANALYSIS_CONFIG } from './analysisConfig';

const SEDENTARY_LABELS: ReadonlySet<ActivityLabel> = new Set<ActivityLabel>(['sitting', 'standing', 'lying']);
const ACTIVE_LABELS: ReadonlySet<ActivityLabel> = new Set<ActivityLabel>(['walking', 'running', 'cycling']);

const PATTERN_DESCRIPTIONS: Record<PatternType, string> = {
    sedentary: 'Extended period of low activity',
    active: 'Period of sustained activity',
    mixed: 'Varied activity with multiple transitions'
};

const sumMinutes = (segments: readonly ActivitySegmentV1[]): number => {
    return segments.reduce((total, segment) => total + getSegmentDurationSec(segment), 0) / 60;
};

const buildPattern = (patternType: PatternType, segments: readonly ActivitySegmentV1[]): ActivityPatternV1 => ({
    patternType,
    description: PATTERN_DESCRIPTIONS[patternType],
    totalDurationMinutes: sumMinutes(segments),
    segments
});

/**
 * Sedentary, active and mixed checks run independently and are emitted in
 * that order. A segment may appear in several patterns.
 */
export const detectPatterns = (segments: ActivitySegmentV1[]): ActivityPatternV1[] => {
    if (segments.length === 0) return [];

    const thresholds = ACTIVITY_ANALYSIS_CONFIG.patterns;
    const patterns: ActivityPatternV1[] = [];

    const sedentary = segments.filter(s => SEDENTARY_LABELS.has(s.activityType));
    if (sumMinutes(sedentary) > thresholds.sedentaryMinMinutes) {
        patterns.push(buildPattern('sedentary', sedentary));
    }

    const active = segments.filter(s => ACTIVE_LABELS.has(s.activityType));
    if (sumMinutes(active) > thresholds.activeMinMinutes) {
        patterns.push(buildPattern('active', active));
    }

    const distinctLabels = new Set(segments.map(s => s.activityType)).size;
    if (segments.length > thresholds.mixedMinSegments && distinctLabels >= thresholds.mixedMinDistinctLabels) {
        patterns.push(buildPattern('mixed', segments));
    }

    return patterns;
};
