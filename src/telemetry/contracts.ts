import type { Rect } from 'util/math';

export interface Vector2 {
    readonly x: number;
    readonly y: number;
}

/** Player state reported by the physics collaborator once per tick. Screen coordinates: y grows downward. */
export interface PlayerFrame {
    readonly position: Vector2;
    readonly velocity: Vector2;
    readonly grounded: boolean;
    readonly bounds: Rect;
}

export interface LevelFrame {
    /** Collected coins in the current level, not a running total. */
    readonly coinsCollected: number;
    readonly enemiesDefeated: number;
    readonly platforms: readonly Rect[];
}
