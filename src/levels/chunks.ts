import { gameConfig } from 'config/game';
import type { DifficultyVector } from 'difficulty/vector';
import { clamp } from 'util/math';
import { pickOne, randomInt, type RandomSource } from 'util/random';
import type { ChunkArchetype, LayoutDraft } from './contracts';
import { addCoin, addEnemy, addPlatform } from './placement';

const { chunks, safeBand, groundThickness, coin } = gameConfig.levels;

export const CHUNK_ARCHETYPES: readonly ChunkArchetype[] = ['stairs', 'gaps', 'floating', 'ground'];

export interface Cursor {
    x: number;
    y: number;
}

export interface ChunkContext {
    readonly draft: LayoutDraft;
    readonly cursor: Cursor;
    readonly vector: DifficultyVector;
    readonly random: RandomSource;
}

type ChunkBuilder = (context: ChunkContext) => void;

const clampToBand = (y: number): number => clamp(y, safeBand.min, safeBand.max);

const buildStairs: ChunkBuilder = ({ draft, cursor, vector, random }) => {
    const config = chunks.stairs;
    const direction = pickOne(random, [-1, 1]);
    const steps = randomInt(random, config.steps.min, config.steps.max);

    for (let step = 0; step < steps; step += 1) {
        const width = randomInt(random, config.width.min, config.width.max);
        const platform = addPlatform(draft, cursor.x, cursor.y, width);

        if (random() < vector.coinFrequency * config.coinChance) {
            addCoin(draft, cursor.x + width / 2, cursor.y);
        }
        if (random() < vector.enemySpawnRate * config.enemyChance) {
            addEnemy(draft, platform, cursor.x + 20, vector);
        }

        cursor.x += width + config.spacing;
        cursor.y = clampToBand(cursor.y + direction * randomInt(random, config.rise.min, config.rise.max));
    }
};

const buildGaps: ChunkBuilder = ({ draft, cursor, vector, random }) => {
    const config = chunks.gaps;
    const count = randomInt(random, config.platforms.min, config.platforms.max);

    for (let index = 0; index < count; index += 1) {
        const width = randomInt(random, config.width.min, config.width.max);
        const gap = randomInt(random, config.gap.min, config.gap.max) * vector.platformGapMultiplier;
        addPlatform(draft, cursor.x, cursor.y, width);

        if (random() < vector.coinFrequency) {
            addCoin(draft, cursor.x + width + gap / 2, cursor.y, config.coinLift);
        }

        cursor.x += width + gap;
    }
};

const buildFloating: ChunkBuilder = ({ draft, cursor, vector, random }) => {
    const config = chunks.floating;
    const baseline = cursor.y;
    const count = randomInt(random, config.platforms.min, config.platforms.max);

    for (let index = 0; index < count; index += 1) {
        const y = clampToBand(baseline + randomInt(random, config.offset.min, config.offset.max));
        const width = randomInt(random, config.width.min, config.width.max);
        addPlatform(draft, cursor.x, y, width);

        if (random() < vector.coinFrequency) {
            addCoin(draft, cursor.x + width / 2, y, config.coinLift);
        }

        cursor.x += width + randomInt(random, config.spacing.min, config.spacing.max);
    }
};

const buildGround: ChunkBuilder = ({ draft, cursor, vector, random }) => {
    const config = chunks.ground;
    const length = randomInt(random, config.length.min, config.length.max);
    const slab = addPlatform(draft, cursor.x, cursor.y, length, 'ground', groundThickness);

    const coins = Math.floor((length / config.coinSpacing) * vector.coinFrequency);
    for (let index = 0; index < coins; index += 1) {
        const x = cursor.x + randomInt(random, config.edgeInset, length - config.edgeInset);
        addCoin(draft, x, cursor.y, coin.lift);
    }

    const enemies = Math.floor((length / config.enemySpacing) * vector.enemySpawnRate);
    for (let index = 0; index < enemies; index += 1) {
        const x = cursor.x + randomInt(random, config.enemyInset, length - config.enemyInset);
        addEnemy(draft, slab, x, vector);
    }

    cursor.x += length + config.trailingGap;
};

const BUILDERS: Readonly<Record<ChunkArchetype, ChunkBuilder>> = {
    stairs: buildStairs,
    gaps: buildGaps,
    floating: buildFloating,
    ground: buildGround,
};

export const buildChunk = (archetype: ChunkArchetype, context: ChunkContext): void => {
    BUILDERS[archetype](context);
};
