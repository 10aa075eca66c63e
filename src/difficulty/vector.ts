import { gameConfig, type DifficultyFields } from 'config/game';
import type { SkillLabel } from 'skill/labels';
import { lerp } from 'util/math';

export type DifficultyVector = Readonly<DifficultyFields>;

export const DIFFICULTY_FIELDS = [
    'enemySpeedMultiplier',
    'enemySpawnRate',
    'platformGapMultiplier',
    'coinFrequency',
    'trapDensity',
    'checkpointFrequency',
] as const satisfies readonly (keyof DifficultyFields)[];

/** Validating constructor; every vector in circulation goes through here. */
export const createDifficultyVector = (fields: DifficultyFields): DifficultyVector => {
    for (const field of DIFFICULTY_FIELDS) {
        const value = fields[field];
        if (!Number.isFinite(value) || value <= 0) {
            throw new RangeError(`${field} must be a positive finite number, received ${value}`);
        }
    }

    const { maxTrapDensity, minCheckpointFrequency } = gameConfig.difficulty.scaling;
    if (fields.trapDensity > maxTrapDensity) {
        throw new RangeError(`trapDensity must not exceed ${maxTrapDensity}, received ${fields.trapDensity}`);
    }
    if (fields.checkpointFrequency < minCheckpointFrequency) {
        throw new RangeError(
            `checkpointFrequency must be at least ${minCheckpointFrequency}, received ${fields.checkpointFrequency}`,
        );
    }

    return Object.freeze({
        enemySpeedMultiplier: fields.enemySpeedMultiplier,
        enemySpawnRate: fields.enemySpawnRate,
        platformGapMultiplier: fields.platformGapMultiplier,
        coinFrequency: fields.coinFrequency,
        trapDensity: fields.trapDensity,
        checkpointFrequency: fields.checkpointFrequency,
    });
};

export const baseVectorFor = (label: SkillLabel): DifficultyVector => {
    return createDifficultyVector(gameConfig.difficulty.tiers[label]);
};

export const lerpVector = (from: DifficultyVector, to: DifficultyVector, alpha: number): DifficultyVector => {
    if (alpha >= 1) {
        return to;
    }
    return createDifficultyVector({
        enemySpeedMultiplier: lerp(from.enemySpeedMultiplier, to.enemySpeedMultiplier, alpha),
        enemySpawnRate: lerp(from.enemySpawnRate, to.enemySpawnRate, alpha),
        platformGapMultiplier: lerp(from.platformGapMultiplier, to.platformGapMultiplier, alpha),
        coinFrequency: lerp(from.coinFrequency, to.coinFrequency, alpha),
        trapDensity: lerp(from.trapDensity, to.trapDensity, alpha),
        checkpointFrequency: lerp(from.checkpointFrequency, to.checkpointFrequency, alpha),
    });
};
