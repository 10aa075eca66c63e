import { isSkillLabel, type SkillLabel } from 'skill/labels';
import type { SkillFeatures } from 'skill/features';

export interface PerformanceSample extends SkillFeatures {
    /** ISO-8601 wall clock time of the finalize call. */
    readonly timestamp: string;
    readonly levelIndex: number;
    readonly skillLabel: SkillLabel;
}

const COUNT_FIELDS = ['levelIndex', 'jumps', 'deaths', 'coinsCollected', 'enemiesDefeated', 'preciseLandings'] as const;
const MEASURE_FIELDS = ['completionTime', 'totalDistance', 'maxSpeed', 'airTimeRatio', 'completionSpeed'] as const;

export const createPerformanceSample = (input: PerformanceSample): PerformanceSample => {
    for (const field of COUNT_FIELDS) {
        const value = input[field];
        if (!Number.isInteger(value) || value < 0) {
            throw new RangeError(`${field} must be a non-negative integer, received ${value}`);
        }
    }
    for (const field of MEASURE_FIELDS) {
        const value = input[field];
        if (!Number.isFinite(value) || value < 0) {
            throw new RangeError(`${field} must be a non-negative finite number, received ${value}`);
        }
    }
    if (input.airTimeRatio > 1) {
        throw new RangeError(`airTimeRatio must not exceed 1, received ${input.airTimeRatio}`);
    }
    if (!isSkillLabel(input.skillLabel)) {
        throw new RangeError(`Unknown skill label: ${String(input.skillLabel)}`);
    }

    return Object.freeze({
        timestamp: input.timestamp,
        levelIndex: input.levelIndex,
        completionTime: input.completionTime,
        jumps: input.jumps,
        deaths: input.deaths,
        coinsCollected: input.coinsCollected,
        enemiesDefeated: input.enemiesDefeated,
        totalDistance: input.totalDistance,
        preciseLandings: input.preciseLandings,
        maxSpeed: input.maxSpeed,
        airTimeRatio: input.airTimeRatio,
        completionSpeed: input.completionSpeed,
        skillLabel: input.skillLabel,
    });
};
