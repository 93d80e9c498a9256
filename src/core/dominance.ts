import type { ActivityLabel, ActivitySegmentV1 } from './types';
import { getSegmentDurationSec } from './segmentation';

export const getDurationByLabel = (segments: ActivitySegmentV1[]): Map<ActivityLabel, number> => {
    const durations = new Map<ActivityLabel, number>();
    for (const segment of segments) {
        const current = durations.get(segment.activityType) ?? 0;
        durations.set(segment.activityType, current + getSegmentDurationSec(segment));
    }
    return durations;
};

/**
 * Label with the greatest total duration. On a tie the label whose first
 * segment comes earliest wins.
 */
export const selectDominantActivity = (segments: ActivitySegmentV1[]): ActivityLabel => {
    let dominant: ActivityLabel = 'unknown';
    let longest = Number.NEGATIVE_INFINITY;

    // Map iteration follows first-insertion order, i.e. segment order.
    for (const [label, duration] of getDurationByLabel(segments)) {
        if (duration > longest) {
            dominant = label;
            longest = duration;
        }
    }

    return dominant;
};
