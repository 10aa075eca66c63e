import { finiteOrZero } from 'util/math';

export const FEATURE_NAMES = [
    'completionTime',
    'jumps',
    'deaths',
    'coinsCollected',
    'enemiesDefeated',
    'totalDistance',
    'preciseLandings',
    'maxSpeed',
    'airTimeRatio',
    'completionSpeed',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type SkillFeatures = Readonly<Record<FeatureName, number>>;

export type FeatureRow = readonly number[];

/** Fixed-order numeric row; missing and non-finite values become 0. */
export const toFeatureRow = (features: Partial<SkillFeatures>): number[] => {
    return FEATURE_NAMES.map((name) => finiteOrZero(features[name]));
};
