import { gameConfig } from 'config/game';
import type { DifficultyVector } from 'difficulty/vector';
import type { LayoutDraft, LayoutEnemy, LayoutPlatform, PlatformKind } from './contracts';

const { platformThickness, coin, enemy } = gameConfig.levels;

export const addPlatform = (
    draft: LayoutDraft,
    x: number,
    y: number,
    width: number,
    kind: PlatformKind = 'ledge',
    height: number = platformThickness,
): LayoutPlatform => {
    const platform: LayoutPlatform = { kind, x: Math.round(x), y: Math.round(y), width: Math.round(width), height };
    draft.platforms.push(platform);
    return platform;
};

/** Coin centred on x, its bottom `lift` pixels above y. */
export const addCoin = (draft: LayoutDraft, centerX: number, y: number, lift: number = coin.lift): void => {
    draft.coins.push({ x: Math.round(centerX - coin.size / 2), y: Math.round(y - lift - coin.size) });
};

/** Walker standing on the platform near x; patrols a band clamped to the platform. */
export const addEnemy = (draft: LayoutDraft, platform: LayoutPlatform, x: number, vector: DifficultyVector): LayoutEnemy => {
    const minX = platform.x;
    const maxX = Math.max(minX, platform.x + platform.width - enemy.size);
    const startX = Math.min(maxX, Math.max(minX, Math.round(x)));
    const spawned: LayoutEnemy = {
        kind: 'walker',
        x: startX,
        y: platform.y - enemy.size,
        speed: enemy.baseSpeed * vector.enemySpeedMultiplier,
        patrolMinX: Math.max(minX, startX - enemy.patrol),
        patrolMaxX: Math.min(maxX, startX + enemy.patrol),
    };
    draft.enemies.push(spawned);
    return spawned;
};
