import { gameConfig } from 'config/game';
import type { LevelLayout } from 'levels/contracts';
import type { LevelFrame, PlayerFrame, Vector2 } from 'telemetry/contracts';
import { rootLogger, type Logger } from 'util/log';
import { rectsOverlap, type Rect } from 'util/math';
import { Bodies, Body, Composite, Engine } from './matter';
import type { MatterBody, MatterEngine } from './matter';

const GRAVITY_SCALE = 0.001;
const IDLE_DAMPING = 0.8;

export interface PlayerInput {
    readonly left: boolean;
    readonly right: boolean;
    readonly jump: boolean;
}

export const NO_INPUT: PlayerInput = Object.freeze({ left: false, right: false, jump: false });

export type StepOutcome = 'running' | 'goal' | 'fall' | 'enemy';

export interface WorldStepResult {
    readonly outcome: StepOutcome;
    readonly player: PlayerFrame;
    readonly level: LevelFrame;
}

export interface EnemyView {
    readonly x: number;
    readonly y: number;
    readonly active: boolean;
}

export interface PlatformerWorld {
    readonly engine: MatterEngine;
    readonly layout: LevelLayout;
    readonly step: (input?: PlayerInput) => WorldStepResult;
    readonly respawn: (point?: Vector2) => void;
    readonly playerFrame: () => PlayerFrame;
    readonly levelFrame: () => LevelFrame;
    readonly enemies: () => EnemyView[];
    readonly dispose: () => void;
}

export interface PlatformerWorldOptions {
    /** Live multiplier on every enemy's patrol speed, read once per step. */
    readonly enemySpeedScale?: () => number;
    readonly stepMs?: number;
    readonly logger?: Logger;
}

/** Gravity.y that yields `pixelsPerFrame` of downward speed gain per step of `stepMs`. */
export const gravityForStep = (pixelsPerFrame: number, stepMs: number): number => {
    return pixelsPerFrame / (GRAVITY_SCALE * stepMs * stepMs);
};

const createPlayerBody = (spawn: Vector2): MatterBody => {
    const { width, height } = gameConfig.player;
    return Bodies.rectangle(spawn.x + width / 2, spawn.y + height / 2, width, height, {
        label: 'player',
        inertia: Infinity,
        friction: 0,
        frictionStatic: 0,
        frictionAir: 0,
        restitution: 0,
    });
};

const createPlatformBody = (platform: Rect): MatterBody => {
    return Bodies.rectangle(
        platform.x + platform.width / 2,
        platform.y + platform.height / 2,
        platform.width,
        platform.height,
        { label: 'platform', isStatic: true, friction: 0, frictionStatic: 0, restitution: 0 },
    );
};

export const createPlatformerWorld = (layout: LevelLayout, options: PlatformerWorldOptions = {}): PlatformerWorld => {
    const logger = options.logger ?? rootLogger.child('physics:world');
    const stepMs = options.stepMs ?? gameConfig.physics.stepMs;
    const enemySpeedScale = options.enemySpeedScale ?? (() => 1);
    const { player: playerConfig, physics } = gameConfig;
    const coinSize = gameConfig.levels.coin.size;
    const enemySize = gameConfig.levels.enemy.size;

    const engine = Engine.create({ enableSleeping: false, positionIterations: 8, velocityIterations: 8 });
    engine.gravity.x = 0;
    engine.gravity.y = gravityForStep(physics.gravityPerFrame, stepMs);
    engine.gravity.scale = GRAVITY_SCALE;

    const player = createPlayerBody(layout.spawnPoint);
    Composite.add(engine.world, [...layout.platforms.map(createPlatformBody), player]);

    // Dense per-entity columns with an active bit and running counts.
    const coinCount = layout.coins.length;
    const coinX = Float64Array.from(layout.coins, (coin) => coin.x);
    const coinY = Float64Array.from(layout.coins, (coin) => coin.y);
    const coinActive = new Uint8Array(coinCount).fill(1);
    let coinsCollected = 0;

    const enemyCount = layout.enemies.length;
    const enemyX = Float64Array.from(layout.enemies, (enemy) => enemy.x);
    const enemyY = Float64Array.from(layout.enemies, (enemy) => enemy.y);
    const enemySpeed = Float64Array.from(layout.enemies, (enemy) => enemy.speed);
    const enemyMin = Float64Array.from(layout.enemies, (enemy) => enemy.patrolMinX);
    const enemyMax = Float64Array.from(layout.enemies, (enemy) => enemy.patrolMaxX);
    const enemyDirection = new Float64Array(enemyCount).fill(1);
    const enemyActive = new Uint8Array(enemyCount).fill(1);
    let enemiesDefeated = 0;

    const playerBounds = (): Rect => ({
        x: player.position.x - playerConfig.width / 2,
        y: player.position.y - playerConfig.height / 2,
        width: playerConfig.width,
        height: playerConfig.height,
    });

    const isGrounded = (bounds: Rect): boolean => {
        const bottom = bounds.y + bounds.height;
        return layout.platforms.some(
            (platform) =>
                Math.abs(bottom - platform.y) <= physics.groundTolerance &&
                bounds.x < platform.x + platform.width &&
                bounds.x + bounds.width > platform.x,
        );
    };

    const playerFrame: PlatformerWorld['playerFrame'] = () => {
        const bounds = playerBounds();
        return {
            position: { x: bounds.x, y: bounds.y },
            velocity: { x: player.velocity.x, y: player.velocity.y },
            grounded: isGrounded(bounds),
            bounds,
        };
    };

    const levelFrame: PlatformerWorld['levelFrame'] = () => ({
        coinsCollected,
        enemiesDefeated,
        platforms: layout.platforms,
    });

    const applyInput = (input: PlayerInput, grounded: boolean): void => {
        let vx = player.velocity.x;
        if (input.left && !input.right) {
            vx = Math.max(-playerConfig.maxSpeed, vx - playerConfig.acceleration);
        } else if (input.right && !input.left) {
            vx = Math.min(playerConfig.maxSpeed, vx + playerConfig.acceleration);
        } else {
            vx *= IDLE_DAMPING;
        }

        const vy = input.jump && grounded ? -playerConfig.jumpPower : player.velocity.y;
        Body.setVelocity(player, { x: vx, y: vy });
    };

    const moveEnemies = (): void => {
        const scale = enemySpeedScale();
        for (let index = 0; index < enemyCount; index += 1) {
            if (enemyActive[index] === 0) {
                continue;
            }
            let next = enemyX[index] + enemyDirection[index] * enemySpeed[index] * scale;
            if (next <= enemyMin[index]) {
                next = enemyMin[index];
                enemyDirection[index] = 1;
            } else if (next >= enemyMax[index]) {
                next = enemyMax[index];
                enemyDirection[index] = -1;
            }
            enemyX[index] = next;
        }
    };

    const collectCoins = (bounds: Rect): void => {
        for (let index = 0; index < coinCount; index += 1) {
            if (coinActive[index] === 0) {
                continue;
            }
            if (rectsOverlap(bounds, { x: coinX[index], y: coinY[index], width: coinSize, height: coinSize })) {
                coinActive[index] = 0;
                coinsCollected += 1;
            }
        }
    };

    /** True when an enemy touched the player from anywhere but above. */
    const resolveEnemyContacts = (bounds: Rect): boolean => {
        const bottom = bounds.y + bounds.height;
        const previousBottom = bottom - player.velocity.y;
        for (let index = 0; index < enemyCount; index += 1) {
            if (enemyActive[index] === 0) {
                continue;
            }
            const enemy = { x: enemyX[index], y: enemyY[index], width: enemySize, height: enemySize };
            if (!rectsOverlap(bounds, enemy)) {
                continue;
            }
            if (player.velocity.y > 0 && previousBottom <= enemy.y + enemySize / 2) {
                enemyActive[index] = 0;
                enemiesDefeated += 1;
                Body.setVelocity(player, {
                    x: player.velocity.x,
                    y: -playerConfig.jumpPower * playerConfig.stompBounce,
                });
                continue;
            }
            return true;
        }
        return false;
    };

    const result = (outcome: StepOutcome): WorldStepResult => ({
        outcome,
        player: playerFrame(),
        level: levelFrame(),
    });

    const step: PlatformerWorld['step'] = (input = NO_INPUT) => {
        applyInput(input, isGrounded(playerBounds()));
        Engine.update(engine, stepMs);
        moveEnemies();

        const bounds = playerBounds();
        collectCoins(bounds);
        if (resolveEnemyContacts(bounds)) {
            return result('enemy');
        }
        if (rectsOverlap(bounds, layout.goal)) {
            return result('goal');
        }
        if (bounds.y > layout.height + physics.fallMargin) {
            return result('fall');
        }
        return result('running');
    };

    const respawn: PlatformerWorld['respawn'] = (point = layout.spawnPoint) => {
        Body.setPosition(player, {
            x: point.x + playerConfig.width / 2,
            y: point.y + playerConfig.height / 2,
        });
        Body.setVelocity(player, { x: 0, y: 0 });
        logger.debug('Player respawned', { x: point.x, y: point.y });
    };

    const enemies: PlatformerWorld['enemies'] = () =>
        Array.from({ length: enemyCount }, (_, index) => ({
            x: enemyX[index],
            y: enemyY[index],
            active: enemyActive[index] === 1,
        }));

    const dispose: PlatformerWorld['dispose'] = () => {
        Composite.clear(engine.world, false);
        Engine.clear(engine);
    };

    return {
        engine,
        layout,
        step,
        respawn,
        playerFrame,
        levelFrame,
        enemies,
        dispose,
    };
};
