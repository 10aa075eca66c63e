import { gameConfig } from 'config/game';
import type { DifficultyVector } from 'difficulty/vector';
import type { Vector2 } from 'telemetry/contracts';
import type { Rect } from 'util/math';
import { createLayoutDraft, type LayoutDraft } from './contracts';
import { addCoin, addEnemy, addPlatform } from './placement';

const { groundThickness, goal: goalSize, coin } = gameConfig.levels;
const GROUND_Y = 650;

export interface TemplateResult {
    readonly draft: LayoutDraft;
    readonly goal: Rect;
    readonly spawnPoint: Vector2;
    /** Rightmost x any geometry reaches. */
    readonly extent: number;
}

type TutorialTemplate = (vector: DifficultyVector) => TemplateResult;

const scaledCount = (base: number, factor: number): number => Math.max(0, Math.round(base * factor));

const spawnOnGround = (): Vector2 => ({ x: 100, y: GROUND_Y - gameConfig.player.height });

const goalOnGround = (x: number): Rect => ({
    x,
    y: GROUND_Y - goalSize.height,
    width: goalSize.width,
    height: goalSize.height,
});

/** A row of coins whose length follows the coin frequency; bottoms sit on `bottomY`. */
const addCoinRun = (
    draft: LayoutDraft,
    startX: number,
    bottomY: number,
    spacing: number,
    baseCount: number,
    vector: DifficultyVector,
): void => {
    const count = scaledCount(baseCount, vector.coinFrequency);
    for (let index = 0; index < count; index += 1) {
        addCoin(draft, startX + index * spacing + coin.size / 2, bottomY, 0);
    }
};

// Stairs, a long run and a few floating ledges.
const firstSteps: TutorialTemplate = (vector) => {
    const draft = createLayoutDraft();
    addPlatform(draft, 0, GROUND_Y, 1000, 'ground', groundThickness);

    for (let step = 0; step < 5; step += 1) {
        const x = 200 + step * 150;
        const y = 600 - step * 50;
        addPlatform(draft, x, y, 120);
        if (step > 0) {
            addCoin(draft, x + 60, y, 40);
        }
    }

    const runway = addPlatform(draft, 1000, GROUND_Y, 2000, 'ground', groundThickness);
    addPlatform(draft, 1500, 500, 200);
    addPlatform(draft, 1850, 450, 200);
    addPlatform(draft, 2200, 400, 200);
    addCoinRun(draft, 1550, 370, 100, 7, vector);

    const enemies = scaledCount(2, vector.enemySpawnRate);
    for (let index = 0; index < enemies; index += 1) {
        addEnemy(draft, runway, 1200 + index * 800, vector);
    }

    return { draft, goal: goalOnGround(2600), spawnPoint: spawnOnGround(), extent: 3000 };
};

// Evenly spaced gap jumps, then a guarded final stretch.
const gapJumps: TutorialTemplate = (vector) => {
    const draft = createLayoutDraft();
    addPlatform(draft, 0, GROUND_Y, 400, 'ground', groundThickness);

    const gap = 150 * vector.platformGapMultiplier;
    let x = 500;
    for (let index = 0; index < 6; index += 1) {
        const ledge = addPlatform(draft, x, GROUND_Y, 120);
        if (index < 5) {
            addCoin(draft, x + 120 + gap / 2, GROUND_Y, 100);
        }
        if (index % 2 === 0 && index > 0) {
            addEnemy(draft, ledge, x + 30, vector);
        }
        x += 120 + gap;
    }

    const stretch = addPlatform(draft, x, GROUND_Y, 1500, 'ground', groundThickness);
    addCoinRun(draft, stretch.x + 100, 600, 150, 4, vector);

    const enemies = scaledCount(3, vector.enemySpawnRate);
    for (let index = 0; index < enemies; index += 1) {
        addEnemy(draft, stretch, stretch.x + 200 + index * 300, vector);
    }

    return {
        draft,
        goal: goalOnGround(stretch.x + 1400),
        spawnPoint: spawnOnGround(),
        extent: stretch.x + stretch.width,
    };
};

// A climb to a high row of gapped ledges, then a drop onto a patrolled slab.
const mixedClimb: TutorialTemplate = (vector) => {
    const draft = createLayoutDraft();
    addPlatform(draft, 0, GROUND_Y, 500, 'ground', groundThickness);

    let x = 600;
    let y = 590;
    for (let step = 0; step < 4; step += 1) {
        addPlatform(draft, x, y, 130);
        addCoin(draft, x + 65, y);
        x += 170;
        y -= 55;
    }

    const topY = y + 55;
    const gap = 140 * vector.platformGapMultiplier;
    x += 30;
    for (let index = 0; index < 3; index += 1) {
        addPlatform(draft, x, topY, 110);
        addCoin(draft, x + 110 + gap / 2, topY, 80);
        x += 110 + gap;
    }

    const slab = addPlatform(draft, x, GROUND_Y, 1400, 'ground', groundThickness);
    addCoinRun(draft, slab.x + 150, 600, 120, 6, vector);

    const enemies = scaledCount(3, vector.enemySpawnRate);
    for (let index = 0; index < enemies; index += 1) {
        addEnemy(draft, slab, slab.x + 250 + index * 350, vector);
    }

    return {
        draft,
        goal: goalOnGround(slab.x + 1250),
        spawnPoint: spawnOnGround(),
        extent: slab.x + slab.width,
    };
};

export const TUTORIAL_TEMPLATES: readonly TutorialTemplate[] = [firstSteps, gapJumps, mixedClimb];

export const buildTutorialLevel = (levelIndex: number, vector: DifficultyVector): TemplateResult => {
    const template = TUTORIAL_TEMPLATES[levelIndex];
    if (!template) {
        throw new RangeError(`No tutorial template for level ${levelIndex}`);
    }
    return template(vector);
};
