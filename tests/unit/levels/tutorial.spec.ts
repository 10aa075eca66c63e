import { describe, expect, it } from 'vitest';

import { baseVectorFor } from 'difficulty/vector';
import { buildTutorialLevel, TUTORIAL_TEMPLATES } from 'levels/tutorial';

describe('tutorial templates', () => {
    it('authors exactly three levels', () => {
        expect(TUTORIAL_TEMPLATES).toHaveLength(3);
        expect(() => buildTutorialLevel(3, baseVectorFor('intermediate'))).toThrow(RangeError);
    });

    it('builds the first level with its baseline counts', () => {
        const level = buildTutorialLevel(0, baseVectorFor('intermediate'));

        expect(level.spawnPoint).toEqual({ x: 100, y: 586 });
        expect(level.goal).toEqual({ x: 2600, y: 550, width: 50, height: 100 });
        expect(level.extent).toBe(3000);
        expect(level.draft.coins).toHaveLength(11);
        expect(level.draft.enemies).toEqual([
            { kind: 'walker', x: 1200, y: 618, speed: 2, patrolMinX: 1110, patrolMaxX: 1290 },
            { kind: 'walker', x: 2000, y: 618, speed: 2, patrolMinX: 1910, patrolMaxX: 2090 },
        ]);
    });

    it('scales coins and enemies with the vector', () => {
        const novice = buildTutorialLevel(0, baseVectorFor('novice'));
        const expert = buildTutorialLevel(0, baseVectorFor('expert'));

        expect(novice.draft.coins).toHaveLength(15);
        expect(novice.draft.enemies).toHaveLength(1);
        expect(novice.draft.enemies[0]?.speed).toBeCloseTo(1.2, 10);
        expect(expert.draft.coins).toHaveLength(9);
        expect(expert.draft.enemies).toHaveLength(3);
    });

    it('stretches the gap level with the gap multiplier', () => {
        const intermediate = buildTutorialLevel(1, baseVectorFor('intermediate'));
        const expert = buildTutorialLevel(1, baseVectorFor('expert'));
        const novice = buildTutorialLevel(1, baseVectorFor('novice'));

        expect(intermediate.draft.platforms.slice(1, 7).map((platform) => platform.x)).toEqual([
            500, 770, 1040, 1310, 1580, 1850,
        ]);
        expect(intermediate.goal.x).toBe(3520);
        expect(intermediate.extent).toBe(3620);
        expect(expert.goal.x).toBe(3790);
        expect(novice.goal.x).toBe(3250);
    });

    it('keeps ledge walkers inside their ledge', () => {
        const level = buildTutorialLevel(1, baseVectorFor('intermediate'));

        expect(level.draft.enemies[0]).toEqual({
            kind: 'walker',
            x: 1070,
            y: 618,
            speed: 2,
            patrolMinX: 1040,
            patrolMaxX: 1128,
        });
    });

    it('rests every goal on the ground', () => {
        for (let index = 0; index < TUTORIAL_TEMPLATES.length; index += 1) {
            const level = buildTutorialLevel(index, baseVectorFor('intermediate'));
            expect(level.goal.y + level.goal.height).toBe(650);
            const support = level.draft.platforms.find(
                (platform) =>
                    platform.y === 650 && platform.x <= level.goal.x && platform.x + platform.width >= level.goal.x + level.goal.width,
            );
            expect(support).toBeDefined();
        }
    });
});
