import { describe, expect, it, vi } from 'vitest';
import { createHighScoreTable, createMemoryStorage } from 'util/high-scores';
import { createLogger } from 'util/log';

const quietLogger = () => createLogger('test', { writer: vi.fn() });

describe('high score table', () => {
    it('stores accepted scores in descending order', () => {
        const table = createHighScoreTable({ logger: quietLogger() });

        expect(table.record(5_000, { name: 'AAA', level: 2, achievedAt: 100 }).accepted).toBe(true);
        expect(table.record(7_200, { name: 'BBB', level: 3, achievedAt: 200 }).accepted).toBe(true);

        const entries = table.list();
        expect(entries.map((entry) => [entry.name, entry.score])).toEqual([
            ['BBB', 7_200],
            ['AAA', 5_000],
        ]);
    });

    it('keeps at most ten entries and rejects scores that do not place', () => {
        const table = createHighScoreTable({ logger: quietLogger() });
        for (let index = 0; index < 10; index += 1) {
            table.record(1_000 + index, { achievedAt: index });
        }

        const result = table.record(10, { achievedAt: 50 });

        expect(result.accepted).toBe(false);
        expect(result.position).toBeNull();
        expect(table.list()).toHaveLength(10);
        expect(table.list()[0]?.score).toBe(1_009);
    });

    it('rejects negative and below-minimum scores', () => {
        const table = createHighScoreTable({ logger: quietLogger() });

        expect(table.record(-1).accepted).toBe(false);
        expect(table.record(0, { minScore: 1 }).accepted).toBe(false);
        expect(table.list()).toHaveLength(0);
    });

    it('normalizes names, levels and timestamps', () => {
        const table = createHighScoreTable({ now: () => 42, logger: quietLogger() });

        const result = table.record(1_500.9, { name: '  ABCDEFGHIJKLMNOPQR ', level: 6.7 });

        expect(result.position).toBe(0);
        expect(result.entries[0]).toEqual({ name: 'ABCDEFGHIJKLMNOP', score: 1_500, level: 6, achievedAt: 42 });
        expect(table.record(10, { name: '   ' }).entries[1]?.name).toBe('PLAYER');
    });

    it('shares entries through the injected storage', () => {
        const storage = createMemoryStorage();
        createHighScoreTable({ storage, logger: quietLogger() }).record(900, { name: 'ANA', achievedAt: 1 });

        const reopened = createHighScoreTable({ storage, logger: quietLogger() });

        expect(reopened.list()).toEqual([{ name: 'ANA', score: 900, level: 1, achievedAt: 1 }]);
    });

    it('clears unreadable storage and warns', () => {
        const storage = createMemoryStorage();
        storage.setItem('leapwise::high-scores::v1', '{not json');
        const writer = vi.fn();
        const table = createHighScoreTable({ storage, logger: createLogger('test', { writer }) });

        expect(table.list()).toEqual([]);
        expect(storage.getItem('leapwise::high-scores::v1')).toBe('[]');
        expect(writer).toHaveBeenCalledWith(expect.objectContaining({ level: 'warn' }));
    });
});
