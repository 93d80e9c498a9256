import type { ActivityLabel, FeatureVectorV1, WindowClassificationV1 } from './types';
import { ACTIVITY_ANALYSIS_CONFIG } from './analysisConfig';

interface ClassificationRule {
    label: ActivityLabel;
    confidence: number;
    matches: (features: FeatureVectorV1) => boolean;
}

const { classifier: rules } = ACTIVITY_ANALYSIS_CONFIG;

const allAxesBelow = (f: FeatureVectorV1, max: number): boolean => {
    return f.varX < max && f.varY < max && f.varZ < max;
};

const totalVariance = (f: FeatureVectorV1): number => f.varX + f.varY + f.varZ;

const isStationary = (f: FeatureVectorV1): boolean => f.meanMag < rules.stationaryMagMax;

/**
 * Evaluated top-down; the first matching rule wins.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        label: 'standing',
        confidence: 0.8,
        matches: f => isStationary(f) && allAxesBelow(f, rules.standingVarMax)
    },
    {
        label: 'sitting',
        confidence: 0.8,
        matches: f => isStationary(f) && allAxesBelow(f, rules.sittingVarMax)
    },
    {
        label: 'lying',
        confidence: 0.7,
        matches: f => isStationary(f) && allAxesBelow(f, rules.lyingVarMax)
    },
    {
        label: 'walking',
        confidence: 0.9,
        matches: f => {
            const total = totalVariance(f);
            return f.meanMag > rules.walking.magMin && f.meanMag < rules.walking.magMax
                && total > rules.walking.totalVarMin && total < rules.walking.totalVarMax;
        }
    },
    {
        label: 'running',
        confidence: 0.85,
        matches: f => f.meanMag > rules.running.magMin && totalVariance(f) > rules.running.totalVarMin
    },
    {
        label: 'cycling',
        confidence: 0.75,
        matches: f => {
            const { magMin, magMax, axisVarMin, axisVarMax } = rules.cycling;
            return f.meanMag > magMin && f.meanMag < magMax
                && f.varX > axisVarMin && f.varX < axisVarMax
                && f.varY > axisVarMin && f.varY < axisVarMax;
        }
    }
];

const FALLBACK: WindowClassificationV1 = { label: 'unknown', confidence: 0.5 };

export const classifyWindow = (features: FeatureVectorV1): WindowClassificationV1 => {
    const rule = CLASSIFICATION_RULES.find(candidate => candidate.matches(features));
    return rule ? { label: rule.label, confidence: rule.confidence } : { ...FALLBACK };
};
