import { gameConfig } from 'config/game';
import { estimateAttemptSkill } from 'skill/heuristics';
import { rootLogger, type Logger } from 'util/log';
import { rectsTouch, roundTo } from 'util/math';
import type { LevelFrame, PlayerFrame } from './contracts';
import { createPerformanceSample, type PerformanceSample } from './sample';

export interface TelemetryAggregatorOptions {
    readonly preciseLandingEdge?: number;
    /** Wall clock used for sample timestamps. */
    readonly now?: () => number;
    readonly logger?: Logger;
}

export interface TelemetryCounters {
    readonly jumps: number;
    readonly deaths: number;
    readonly coinsCollected: number;
    readonly enemiesDefeated: number;
    readonly totalDistance: number;
    readonly preciseLandings: number;
    readonly maxSpeed: number;
    readonly airTicks: number;
    readonly groundTicks: number;
}

export interface TelemetryAggregator {
    readonly onTick: (player: PlayerFrame, level: LevelFrame) => void;
    readonly recordDeath: () => void;
    readonly finalize: (levelIndex: number, completionTimeSeconds: number) => PerformanceSample;
    readonly reset: () => void;
    readonly counters: () => TelemetryCounters;
}

type Mutable<T> = { -readonly [Key in keyof T]: T[Key] };

const emptyCounters = (): Mutable<TelemetryCounters> => ({
    jumps: 0,
    deaths: 0,
    coinsCollected: 0,
    enemiesDefeated: 0,
    totalDistance: 0,
    preciseLandings: 0,
    maxSpeed: 0,
    airTicks: 0,
    groundTicks: 0,
});

export const createTelemetryAggregator = (options: TelemetryAggregatorOptions = {}): TelemetryAggregator => {
    const edge = options.preciseLandingEdge ?? gameConfig.telemetry.preciseLandingEdge;
    const now = options.now ?? Date.now;
    const logger = options.logger ?? rootLogger.child('telemetry');

    let counters = emptyCounters();
    // null until the first tick of an attempt, or after a respawn
    let previousX: number | null = null;
    let previousGrounded: boolean | null = null;

    const detectPreciseLanding = (player: PlayerFrame, level: LevelFrame): boolean => {
        const platform = level.platforms.find((candidate) => rectsTouch(player.bounds, candidate));
        if (!platform) {
            return false;
        }
        const centerX = player.bounds.x + player.bounds.width / 2;
        return Math.abs(centerX - platform.x) < edge || Math.abs(centerX - (platform.x + platform.width)) < edge;
    };

    const onTick: TelemetryAggregator['onTick'] = (player, level) => {
        if (!player.grounded && player.velocity.y < 0 && previousGrounded === true) {
            counters.jumps += 1;
        }

        if (previousX !== null) {
            counters.totalDistance += Math.abs(player.position.x - previousX);
        }
        previousX = player.position.x;

        counters.maxSpeed = Math.max(counters.maxSpeed, Math.abs(player.velocity.x));

        if (player.grounded) {
            counters.groundTicks += 1;
        } else {
            counters.airTicks += 1;
        }

        counters.coinsCollected = level.coinsCollected;
        counters.enemiesDefeated = level.enemiesDefeated;

        if (player.grounded && previousGrounded === false && detectPreciseLanding(player, level)) {
            counters.preciseLandings += 1;
        }

        previousGrounded = player.grounded;
    };

    const recordDeath: TelemetryAggregator['recordDeath'] = () => {
        counters.deaths += 1;
        previousX = null;
        previousGrounded = null;
    };

    const finalize: TelemetryAggregator['finalize'] = (levelIndex, completionTimeSeconds) => {
        const completionTime = Math.max(0, completionTimeSeconds);
        const airTimeRatio = counters.airTicks / Math.max(counters.airTicks + counters.groundTicks, 1);
        const completionSpeed = counters.totalDistance / Math.max(completionTime, 1);

        const sample = createPerformanceSample({
            timestamp: new Date(now()).toISOString(),
            levelIndex,
            completionTime: roundTo(completionTime, 2),
            jumps: counters.jumps,
            deaths: counters.deaths,
            coinsCollected: counters.coinsCollected,
            enemiesDefeated: counters.enemiesDefeated,
            totalDistance: roundTo(counters.totalDistance, 2),
            preciseLandings: counters.preciseLandings,
            maxSpeed: roundTo(counters.maxSpeed, 2),
            airTimeRatio: roundTo(airTimeRatio, 3),
            completionSpeed: roundTo(completionSpeed, 2),
            skillLabel: estimateAttemptSkill({
                completionTime,
                deaths: counters.deaths,
                coinsCollected: counters.coinsCollected,
                preciseLandings: counters.preciseLandings,
            }),
        });

        logger.debug('Attempt finalized', {
            levelIndex,
            completionTime: sample.completionTime,
            deaths: sample.deaths,
            estimate: sample.skillLabel,
        });
        return sample;
    };

    const reset: TelemetryAggregator['reset'] = () => {
        counters = emptyCounters();
        previousX = null;
        previousGrounded = null;
    };

    return {
        onTick,
        recordDeath,
        finalize,
        reset,
        counters: () => ({ ...counters }),
    } satisfies TelemetryAggregator;
};
