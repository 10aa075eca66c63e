import { describe, expect, it, vi } from 'vitest';

import { gameConfig } from 'config/game';
import { scaledVectorFor } from 'difficulty/modulator';
import { baseVectorFor } from 'difficulty/vector';
import { buildChunk } from 'levels/chunks';
import { createLayoutDraft, type ChunkArchetype } from 'levels/contracts';
import { createLevelGenerator } from 'levels/generator';
import { SKILL_LABELS } from 'skill/labels';
import { createLogger } from 'util/log';
import { mulberry32 } from 'util/random';

const createGenerator = () => createLevelGenerator({ logger: createLogger('test', { writer: vi.fn() }) });

describe('createLevelGenerator', () => {
    it('serves tutorial templates below the threshold', () => {
        const layout = createGenerator().generate(1, baseVectorFor('intermediate'), { seed: 7 });

        expect(layout.metadata).toEqual({ source: 'tutorial', seed: 7, chunks: [] });
        expect(layout.width).toBe(5000);
        expect(layout.height).toBe(720);
        expect(layout.goal).toEqual({ x: 3520, y: 550, width: 50, height: 100 });
    });

    it('rejects negative or fractional level indices', () => {
        const generator = createGenerator();
        const vector = baseVectorFor('intermediate');

        expect(() => generator.generate(-1, vector, { seed: 1 })).toThrow(RangeError);
        expect(() => generator.generate(1.5, vector, { seed: 1 })).toThrow(RangeError);
    });

    it('opens procedural levels with the start ground and spawn platform', () => {
        const layout = createGenerator().generate(3, baseVectorFor('intermediate'), { seed: 99 });

        expect(layout.metadata.source).toBe('procedural');
        expect(layout.platforms[0]).toEqual({ kind: 'ground', x: 0, y: 650, width: 300, height: 70 });
        expect(layout.platforms[1]).toEqual({ kind: 'spawn', x: 50, y: 520, width: 200, height: 20 });
        expect(layout.spawnPoint).toEqual({ x: 100, y: 456 });
    });

    it('adds one chunk per level past the base count and walks the cursor rightward', () => {
        const layout = createGenerator().generate(5, baseVectorFor('expert'), { seed: 1234 });
        const { chunks } = layout.metadata;

        expect(chunks).toHaveLength(13);
        expect(chunks[0]?.start).toEqual({ x: 350, y: 650 });
        chunks.forEach((chunk, index) => {
            expect(chunk.end.x).toBeGreaterThan(chunk.start.x);
            if (index > 0) {
                expect(chunk.start).toEqual(chunks[index - 1]?.end);
            }
        });
    });

    it('keeps every platform inside the safe vertical band', () => {
        const layout = createGenerator().generate(8, baseVectorFor('novice'), { seed: 31337 });

        for (const platform of layout.platforms) {
            expect(platform.y).toBeGreaterThanOrEqual(300);
            expect(platform.y).toBeLessThanOrEqual(650);
        }
    });

    it('places the goal behind the final cursor on its own pad', () => {
        const layout = createGenerator().generate(4, baseVectorFor('intermediate'), { seed: 5 });
        const last = layout.metadata.chunks[layout.metadata.chunks.length - 1];
        if (!last) {
            throw new Error('expected chunk traces');
        }

        expect(layout.goal).toEqual({
            x: Math.round(last.end.x - 100),
            y: Math.round(last.end.y - 100),
            width: 50,
            height: 100,
        });
        expect(layout.platforms[layout.platforms.length - 1]).toEqual({
            kind: 'ground',
            x: layout.goal.x - 100,
            y: Math.round(last.end.y),
            width: 250,
            height: 70,
        });
        expect(layout.width).toBe(Math.max(5000, Math.round(last.end.x + 200)));
    });

    it('scales enemy speed from the vector', () => {
        const vector = baseVectorFor('expert');
        const layout = createGenerator().generate(6, vector, { seed: 77 });

        for (const enemy of layout.enemies) {
            expect(enemy.speed).toBe(3);
            expect(enemy.patrolMinX).toBeLessThanOrEqual(enemy.x);
            expect(enemy.patrolMaxX).toBeGreaterThanOrEqual(enemy.x);
        }
    });

    it('is deterministic per seed', () => {
        const generator = createGenerator();
        const vector = baseVectorFor('intermediate');

        const first = generator.generate(4, vector, { seed: 2024 });
        const again = generator.generate(4, vector, { seed: 2024 });
        const other = generator.generate(4, vector, { seed: 2025 });

        expect(again).toEqual(first);
        expect(other).not.toEqual(first);
    });

    it('freezes the returned layout', () => {
        const layout = createGenerator().generate(3, baseVectorFor('intermediate'), { seed: 3 });

        expect(Object.isFrozen(layout)).toBe(true);
        expect(Object.isFrozen(layout.platforms)).toBe(true);
        expect(Object.isFrozen(layout.platforms[0])).toBe(true);
    });
});

describe('procedural layouts across seeds, levels and tiers', () => {
    const SEEDS = Array.from({ length: 60 }, (_, index) => index * 7919 + 1);
    const LEVELS = [3, 4, 5, 6, 7, 8, 9, 10, 11];

    it('walks the cursor right, stays in the band and spawns on the spawn platform', () => {
        const generator = createGenerator();
        const { safeBand, cursorStart } = gameConfig.levels;
        const violations: string[] = [];

        for (const label of SKILL_LABELS) {
            for (const levelIndex of LEVELS) {
                const vector = scaledVectorFor(label, levelIndex);
                for (const seed of SEEDS) {
                    const layout = generator.generate(levelIndex, vector, { seed });
                    const where = `${label} level ${levelIndex} seed ${seed}`;
                    const { chunks } = layout.metadata;

                    if (chunks.length !== gameConfig.levels.baseChunks + levelIndex) {
                        violations.push(`${where}: ${chunks.length} chunks`);
                    }
                    if (chunks[0]?.start.x !== cursorStart.x || chunks[0]?.start.y !== cursorStart.y) {
                        violations.push(`${where}: first chunk does not start at the cursor origin`);
                    }
                    chunks.forEach((chunk, index) => {
                        if (!(chunk.end.x > chunk.start.x)) {
                            violations.push(`${where}: chunk ${index} did not advance`);
                        }
                        if (chunk.end.y < safeBand.min || chunk.end.y > safeBand.max) {
                            violations.push(`${where}: chunk ${index} ends at y ${chunk.end.y}`);
                        }
                    });
                    for (const platform of layout.platforms) {
                        if (platform.y < safeBand.min || platform.y > safeBand.max) {
                            violations.push(`${where}: platform at y ${platform.y}`);
                        }
                    }

                    const spawn = layout.platforms.find((platform) => platform.kind === 'spawn');
                    const { x, y } = layout.spawnPoint;
                    const under =
                        spawn !== undefined &&
                        spawn.x <= x &&
                        x + gameConfig.player.width <= spawn.x + spawn.width &&
                        y + gameConfig.player.height === spawn.y;
                    if (!under) {
                        violations.push(`${where}: spawn point is not on the spawn platform`);
                    }
                }
            }
        }

        expect(violations).toEqual([]);
    });

    // Sampled over seeds rather than proven: floating chunks can still stack
    // out of reach, so only stairs and gaps are held to the jump envelope.
    it('keeps stair rises and gap widths inside the jump envelope on sampled seeds', () => {
        const { jumpPower, maxSpeed } = gameConfig.player;
        const gravity = gameConfig.physics.gravityPerFrame;
        const jumpHeight = (jumpPower * jumpPower) / (2 * gravity);
        const jumpDistance = maxSpeed * ((2 * jumpPower) / gravity);
        const violations: string[] = [];

        const platformsOf = (archetype: ChunkArchetype, seed: number, label: (typeof SKILL_LABELS)[number]) => {
            const draft = createLayoutDraft();
            const vector = scaledVectorFor(label, 11);
            buildChunk(archetype, { draft, cursor: { x: 350, y: 500 }, vector, random: mulberry32(seed) });
            return draft.platforms;
        };

        for (const label of SKILL_LABELS) {
            for (let seed = 1; seed <= 300; seed += 1) {
                const stairs = platformsOf('stairs', seed, label);
                for (let index = 1; index < stairs.length; index += 1) {
                    const rise = stairs[index - 1].y - stairs[index].y;
                    if (rise >= jumpHeight) {
                        violations.push(`${label} seed ${seed}: stair rise ${rise}`);
                    }
                }

                const gaps = platformsOf('gaps', seed, label);
                for (let index = 1; index < gaps.length; index += 1) {
                    const previous = gaps[index - 1];
                    const width = gaps[index].x - (previous.x + previous.width);
                    if (width >= jumpDistance) {
                        violations.push(`${label} seed ${seed}: gap ${width}`);
                    }
                }
            }
        }

        expect(jumpHeight).toBeCloseTo(160, 6);
        expect(jumpDistance).toBeCloseTo(480, 6);
        expect(violations).toEqual([]);
    });
});
