import { gameConfig, type GameConfig } from 'config/game';
import type { SkillLabel } from 'skill/labels';
import { rootLogger, type Logger } from 'util/log';
import type { RandomSource } from 'util/random';
import { baseVectorFor, createDifficultyVector, lerpVector, type DifficultyVector } from './vector';

type ScalingConfig = GameConfig['difficulty']['scaling'];

export interface DifficultyTransitionState {
    readonly current: DifficultyVector;
    readonly target: DifficultyVector;
    /** In [0, 1]; 1 once current has reached target. */
    readonly progress: number;
}

export interface DifficultyModulator {
    readonly computeNextVector: (label: SkillLabel, upcomingLevelIndex: number) => DifficultyVector;
    readonly tick: (deltaSeconds: number) => void;
    readonly state: () => DifficultyTransitionState;
    readonly current: () => DifficultyVector;
    readonly target: () => DifficultyVector;
    readonly reset: () => void;
    readonly adaptiveSpawnRate: (base: number) => number;
    readonly adaptiveEnemySpeed: (base: number) => number;
    readonly platformGapSize: (base: number) => number;
    readonly shouldSpawnCoin: (baseProbability: number, random: RandomSource) => boolean;
}

export interface DifficultyModulatorOptions {
    readonly scaling?: Partial<ScalingConfig>;
    readonly logger?: Logger;
}

export const levelScaling = (levelIndex: number, scaling: ScalingConfig = gameConfig.difficulty.scaling): number => {
    return Math.min(1 + Math.max(0, levelIndex) * scaling.perLevel, scaling.maxScaling);
};

/** Tier preset scaled for the level; pure. */
export const scaledVectorFor = (
    label: SkillLabel,
    levelIndex: number,
    scaling: ScalingConfig = gameConfig.difficulty.scaling,
): DifficultyVector => {
    const base = baseVectorFor(label);
    const factor = levelScaling(levelIndex, scaling);

    return createDifficultyVector({
        ...base,
        enemySpeedMultiplier: base.enemySpeedMultiplier * factor,
        trapDensity: Math.min(base.trapDensity * factor, scaling.maxTrapDensity),
        checkpointFrequency:
            label === 'expert'
                ? Math.max(scaling.minCheckpointFrequency, base.checkpointFrequency / factor)
                : base.checkpointFrequency,
    });
};

export const createDifficultyModulator = (options: DifficultyModulatorOptions = {}): DifficultyModulator => {
    const scaling: ScalingConfig = { ...gameConfig.difficulty.scaling, ...options.scaling };
    const logger = options.logger ?? rootLogger.child('difficulty');
    const initial = baseVectorFor(gameConfig.difficulty.defaultTier);

    let origin = initial;
    let current = initial;
    let target = initial;
    let progress = 1;

    const computeNextVector: DifficultyModulator['computeNextVector'] = (label, upcomingLevelIndex) => {
        const next = scaledVectorFor(label, upcomingLevelIndex, scaling);
        origin = current;
        target = next;
        progress = 0;
        logger.info('Difficulty retargeted', { label, level: upcomingLevelIndex, ...next });
        return next;
    };

    const tick: DifficultyModulator['tick'] = (deltaSeconds) => {
        if (progress >= 1 || !(deltaSeconds > 0)) {
            return;
        }
        progress = Math.min(1, progress + deltaSeconds * scaling.smoothingRatePerSecond);
        current = progress >= 1 ? target : lerpVector(origin, target, progress);
    };

    const reset: DifficultyModulator['reset'] = () => {
        origin = initial;
        current = initial;
        target = initial;
        progress = 1;
    };

    return {
        computeNextVector,
        tick,
        state: () => ({ current, target, progress }),
        current: () => current,
        target: () => target,
        reset,
        adaptiveSpawnRate: (base) => base * current.enemySpawnRate,
        adaptiveEnemySpeed: (base) => base * current.enemySpeedMultiplier,
        platformGapSize: (base) => base * current.platformGapMultiplier,
        shouldSpawnCoin: (baseProbability, random) => random() < Math.min(1, baseProbability * current.coinFrequency),
    };
};
