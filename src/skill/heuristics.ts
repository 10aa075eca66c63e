import type { SkillLabel } from 'skill/labels';
import type { SkillFeatures } from 'skill/features';

const pointsForTime = (completionTime: number): number => {
    if (completionTime < 30) {
        return 3;
    }
    if (completionTime < 60) {
        return 2;
    }
    return 1;
};

const pointsForDeaths = (deaths: number): number => {
    if (deaths === 0) {
        return 3;
    }
    if (deaths <= 2) {
        return 2;
    }
    return 1;
};

const tieredPoints = (value: number, high: number, low: number): number => {
    if (value > high) {
        return 2;
    }
    if (value > low) {
        return 1;
    }
    return 0;
};

const labelForScore = (score: number, expertAt: number, intermediateAt: number): SkillLabel => {
    if (score >= expertAt) {
        return 'expert';
    }
    if (score >= intermediateAt) {
        return 'intermediate';
    }
    return 'novice';
};

export type AttemptSkillInput = Pick<SkillFeatures, 'completionTime' | 'deaths' | 'coinsCollected' | 'preciseLandings'>;

/**
 * Per-attempt estimate written into every finalized sample. Rewards precise
 * landings; tops out at 10 points.
 */
export const estimateAttemptSkill = (input: AttemptSkillInput): SkillLabel => {
    const score =
        pointsForTime(input.completionTime) +
        pointsForDeaths(input.deaths) +
        tieredPoints(input.coinsCollected, 10, 5) +
        tieredPoints(input.preciseLandings, 5, 2);
    return labelForScore(score, 8, 5);
};

/**
 * Standalone fallback used by the classifier while it has no model. Rewards
 * enemy defeats and completion speed instead of landings, so its thresholds
 * sit higher.
 */
export const predictHeuristicSkill = (features: Partial<SkillFeatures>): SkillLabel => {
    const completionTime = features.completionTime ?? 100;
    const deaths = features.deaths ?? 10;
    const score =
        pointsForTime(completionTime) +
        pointsForDeaths(deaths) +
        tieredPoints(features.coinsCollected ?? 0, 10, 5) +
        tieredPoints(features.enemiesDefeated ?? 0, 3, 1) +
        tieredPoints(features.completionSpeed ?? 0, 100, 50);
    return labelForScore(score, 10, 6);
};
