import { gameConfig } from 'config/game';
import type { DifficultyVector } from 'difficulty/vector';
import { rootLogger, type Logger } from 'util/log';
import { mulberry32, normalizeSeed, pickOne } from 'util/random';
import { buildChunk, CHUNK_ARCHETYPES, type Cursor } from './chunks';
import { createLayoutDraft, type ChunkTrace, type LevelLayout } from './contracts';
import { addPlatform } from './placement';
import { buildTutorialLevel } from './tutorial';

const levels = gameConfig.levels;

export interface GenerateOptions {
    readonly seed: number;
}

export interface LevelGenerator {
    readonly generate: (levelIndex: number, vector: DifficultyVector, options: GenerateOptions) => LevelLayout;
}

export interface LevelGeneratorOptions {
    readonly tutorialThreshold?: number;
    readonly logger?: Logger;
}

const freezeLayout = (layout: LevelLayout): LevelLayout => {
    layout.platforms.forEach((platform) => Object.freeze(platform));
    layout.coins.forEach((coin) => Object.freeze(coin));
    layout.enemies.forEach((enemy) => Object.freeze(enemy));
    Object.freeze(layout.platforms);
    Object.freeze(layout.coins);
    Object.freeze(layout.enemies);
    return Object.freeze(layout);
};

const generateProcedural = (levelIndex: number, vector: DifficultyVector, seed: number): LevelLayout => {
    const random = mulberry32(seed);
    const draft = createLayoutDraft();

    addPlatform(draft, levels.startPlatform.x, levels.startPlatform.y, levels.startPlatform.width, 'ground', levels.groundThickness);
    const spawnPlatform = addPlatform(draft, levels.spawnPlatform.x, levels.spawnPlatform.y, levels.spawnPlatform.width, 'spawn');
    const spawnPoint = { x: spawnPlatform.x + 50, y: spawnPlatform.y - gameConfig.player.height };

    const cursor: Cursor = { x: levels.cursorStart.x, y: levels.cursorStart.y };
    const chunks: ChunkTrace[] = [];
    const chunkCount = levels.baseChunks + levelIndex;

    for (let index = 0; index < chunkCount; index += 1) {
        const archetype = pickOne(random, CHUNK_ARCHETYPES);
        const start = { x: cursor.x, y: cursor.y };
        buildChunk(archetype, { draft, cursor, vector, random });
        chunks.push({ archetype, start, end: { x: cursor.x, y: cursor.y } });
    }

    const goal = {
        x: Math.round(cursor.x - levels.goal.backoff),
        y: Math.round(cursor.y - levels.goal.lift),
        width: levels.goal.width,
        height: levels.goal.height,
    };
    // Landing pad so the goal always has ground beneath it.
    addPlatform(draft, goal.x - levels.goal.padLead, cursor.y, levels.goal.padWidth, 'ground', levels.groundThickness);

    return {
        levelIndex,
        platforms: draft.platforms,
        coins: draft.coins,
        enemies: draft.enemies,
        goal,
        width: Math.max(levels.width, Math.round(cursor.x + levels.widthPadding)),
        height: levels.height,
        spawnPoint,
        metadata: { source: 'procedural', seed, chunks },
    };
};

export const createLevelGenerator = (options: LevelGeneratorOptions = {}): LevelGenerator => {
    const tutorialThreshold = options.tutorialThreshold ?? levels.tutorialThreshold;
    const logger = options.logger ?? rootLogger.child('levels');

    const generate: LevelGenerator['generate'] = (levelIndex, vector, generateOptions) => {
        if (!Number.isInteger(levelIndex) || levelIndex < 0) {
            throw new RangeError(`levelIndex must be a non-negative integer, received ${levelIndex}`);
        }
        const seed = normalizeSeed(generateOptions.seed);

        let layout: LevelLayout;
        if (levelIndex < tutorialThreshold) {
            const template = buildTutorialLevel(levelIndex, vector);
            layout = {
                levelIndex,
                platforms: template.draft.platforms,
                coins: template.draft.coins,
                enemies: template.draft.enemies,
                goal: template.goal,
                width: Math.max(levels.width, Math.round(template.extent + levels.widthPadding)),
                height: levels.height,
                spawnPoint: template.spawnPoint,
                metadata: { source: 'tutorial', seed, chunks: [] },
            };
        } else {
            layout = generateProcedural(levelIndex, vector, seed);
        }

        logger.info('Level generated', {
            level: levelIndex,
            source: layout.metadata.source,
            seed,
            platforms: layout.platforms.length,
            coins: layout.coins.length,
            enemies: layout.enemies.length,
        });
        return freezeLayout(layout);
    };

    return { generate };
};
