import type { Vector2 } from 'telemetry/contracts';
import type { Rect } from 'util/math';

export type PlatformKind = 'ground' | 'ledge' | 'spawn';

export interface LayoutPlatform extends Rect {
    readonly kind: PlatformKind;
}

/** Top-left corner of a coin square. */
export interface LayoutCoin {
    readonly x: number;
    readonly y: number;
}

export type EnemyKind = 'walker';

export interface LayoutEnemy {
    readonly kind: EnemyKind;
    /** Top-left corner; the enemy stands on the platform below it. */
    readonly x: number;
    readonly y: number;
    /** Pixels per frame before live difficulty easing. */
    readonly speed: number;
    readonly patrolMinX: number;
    readonly patrolMaxX: number;
}

export type ChunkArchetype = 'stairs' | 'gaps' | 'floating' | 'ground';

export interface ChunkTrace {
    readonly archetype: ChunkArchetype;
    readonly start: Vector2;
    readonly end: Vector2;
}

export type LayoutSource = 'tutorial' | 'procedural';

export interface LayoutMetadata {
    readonly source: LayoutSource;
    readonly seed: number;
    readonly chunks: readonly ChunkTrace[];
}

export interface LevelLayout {
    readonly levelIndex: number;
    readonly platforms: readonly LayoutPlatform[];
    readonly coins: readonly LayoutCoin[];
    readonly enemies: readonly LayoutEnemy[];
    readonly goal: Rect;
    readonly width: number;
    readonly height: number;
    /** Top-left corner of the player body at spawn. */
    readonly spawnPoint: Vector2;
    readonly metadata: LayoutMetadata;
}

/** Mutable collector the template and chunk builders write into. */
export interface LayoutDraft {
    readonly platforms: LayoutPlatform[];
    readonly coins: LayoutCoin[];
    readonly enemies: LayoutEnemy[];
}

export const createLayoutDraft = (): LayoutDraft => ({ platforms: [], coins: [], enemies: [] });
