import { SKILL_LABELS } from 'skill/labels';
import { createPerformanceSample, type PerformanceSample } from 'telemetry/sample';
import { roundTo } from 'util/math';
import { mulberry32, randomBetween, randomInt } from 'util/random';
import profiles from './synthetic-profiles.json';

export interface SyntheticHistoryOptions {
    readonly seed: number;
    readonly perTier?: number;
    readonly now?: () => number;
}

/**
 * Labelled samples drawn from per-tier ranges, enough to bootstrap a first
 * model before any real play. Counts are inclusive integer ranges.
 */
export const generateSyntheticHistory = (options: SyntheticHistoryOptions): PerformanceSample[] => {
    const random = mulberry32(options.seed);
    const perTier = options.perTier ?? profiles.samplesPerTier;
    const timestamp = new Date((options.now ?? Date.now)()).toISOString();
    const samples: PerformanceSample[] = [];

    for (const label of SKILL_LABELS) {
        const ranges = profiles.tiers[label];
        const real = (range: readonly number[], decimals: number) =>
            roundTo(randomBetween(random, range[0], range[1]), decimals);
        const count = (range: readonly number[]) => randomInt(random, range[0], range[1]);

        for (let index = 0; index < perTier; index += 1) {
            samples.push(
                createPerformanceSample({
                    timestamp,
                    levelIndex: index % 3,
                    completionTime: real(ranges.completionTime, 2),
                    jumps: count(ranges.jumps),
                    deaths: count(ranges.deaths),
                    coinsCollected: count(ranges.coinsCollected),
                    enemiesDefeated: count(ranges.enemiesDefeated),
                    totalDistance: real(ranges.totalDistance, 2),
                    preciseLandings: count(ranges.preciseLandings),
                    maxSpeed: real(ranges.maxSpeed, 2),
                    airTimeRatio: real(ranges.airTimeRatio, 3),
                    completionSpeed: real(ranges.completionSpeed, 2),
                    skillLabel: label,
                }),
            );
        }
    }

    return samples;
};
