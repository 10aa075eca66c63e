import { describe, expect, it } from 'vitest';
import { mulberry32, pickOne, randomBetween, randomInt, shuffled } from 'util/random';

const sample = (source: () => number, count: number): number[] => {
    return Array.from({ length: count }, () => source());
};

const constant = (value: number) => () => value;

describe('mulberry32', () => {
    it('produces deterministic sequences for the same seed', () => {
        expect(sample(mulberry32(1234), 5)).toEqual(sample(mulberry32(1234), 5));
    });

    it('produces distinct sequences for different seeds', () => {
        expect(sample(mulberry32(1), 3)).not.toEqual(sample(mulberry32(2), 3));
    });

    it('stays inside the unit interval', () => {
        for (const value of sample(mulberry32(99), 500)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });

    it('treats zero and non-finite seeds as the default seed', () => {
        expect(sample(mulberry32(0), 3)).toEqual(sample(mulberry32(1), 3));
        expect(sample(mulberry32(Number.NaN), 3)).toEqual(sample(mulberry32(1), 3));
    });
});

describe('range helpers', () => {
    it('maps the unit interval onto inclusive integer bounds', () => {
        expect(randomInt(constant(0), 3, 6)).toBe(3);
        expect(randomInt(constant(0.999999), 3, 6)).toBe(6);
        expect(randomInt(constant(0.5), 6, 3)).toBe(5);
    });

    it('maps the unit interval onto a real range', () => {
        expect(randomBetween(constant(0), 40, 70)).toBe(40);
        expect(randomBetween(constant(0.5), 40, 70)).toBe(55);
        expect(randomBetween(constant(0.25), -150, 50)).toBe(-100);
    });

    it('picks list members by position', () => {
        const items = ['stairs', 'gaps', 'floating', 'ground'];
        expect(pickOne(constant(0), items)).toBe('stairs');
        expect(pickOne(constant(0.5), items)).toBe('floating');
        expect(pickOne(constant(0.9999), items)).toBe('ground');
        expect(() => pickOne(constant(0), [])).toThrow(RangeError);
    });

    it('shuffles a copy without touching the input', () => {
        const items = [1, 2, 3, 4, 5];
        const result = shuffled(mulberry32(5), items);

        expect(items).toEqual([1, 2, 3, 4, 5]);
        expect([...result].sort()).toEqual([1, 2, 3, 4, 5]);
    });
});
