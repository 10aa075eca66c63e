import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { generateSyntheticHistory } from 'cli/synthetic';
import { runTraining, seedHistory } from 'cli/train';
import { diskStorageConfig, memoryStorageConfig } from 'storage/config';
import { createHistoryStore } from 'storage/history-store';
import { createLogger } from 'util/log';

const logger = createLogger('train-test', { writer: () => undefined });
const now = () => Date.UTC(2026, 0, 1);

describe('generateSyntheticHistory', () => {
    it('draws fifteen samples per tier inside the tier ranges', () => {
        const samples = generateSyntheticHistory({ seed: 3, now });

        expect(samples).toHaveLength(45);
        expect(samples.filter((sample) => sample.skillLabel === 'novice')).toHaveLength(15);
        expect(samples.every((sample) => sample.timestamp === '2026-01-01T00:00:00.000Z')).toBe(true);
        const novices = samples.filter((sample) => sample.skillLabel === 'novice');
        expect(novices.every((sample) => sample.deaths >= 3 && sample.deaths <= 9)).toBe(true);
        expect(novices.every((sample) => sample.completionTime >= 60 && sample.completionTime <= 120)).toBe(true);
    });

    it('repeats for a seed', () => {
        expect(generateSyntheticHistory({ seed: 5, perTier: 2, now })).toEqual(
            generateSyntheticHistory({ seed: 5, perTier: 2, now }),
        );
    });
});

describe('runTraining', () => {
    it('refuses to train on an empty in-memory history', async () => {
        const result = await runTraining({ storage: memoryStorageConfig(), now }, logger);

        expect(result.ok).toBe(false);
        expect(result.samples).toBe(0);
        expect(result.report).toBeNull();
        expect(result.probes.struggling).toEqual({ label: 'novice', probabilities: null, source: 'heuristic' });
        expect(result.probes.fluent).toEqual({ label: 'expert', probabilities: null, source: 'heuristic' });
    });

    it('trains on the synthetic history with a stratified holdout', async () => {
        const result = await runTraining({ storage: memoryStorageConfig(), synthetic: true, seed: 4, now }, logger);

        expect(result.ok).toBe(true);
        expect(result.distribution).toEqual({ novice: 15, intermediate: 15, expert: 15 });
        expect(result.report?.trainSize).toBe(36);
        expect(result.report?.testSize).toBe(9);
        expect(result.probes.fluent.source).toBe('model');
    });
});

describe('seedHistory', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'leapwise-train-'));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('appends the synthetic rows to the history file', async () => {
        const storage = diskStorageConfig(root);

        const result = await seedHistory({ storage, seed: 8, perTier: 4, now }, logger);

        expect(result).toEqual({ ok: true, appended: 12, historySize: 12 });
        expect(createHistoryStore(storage, { logger }).length()).toBe(12);
    });

    it('feeds a later training run from disk', async () => {
        const storage = diskStorageConfig(root);
        await seedHistory({ storage, seed: 8, now }, logger);

        const result = await runTraining({ storage, now }, logger);

        expect(result.ok).toBe(true);
        expect(result.samples).toBe(45);
        expect(fs.existsSync(path.join(root, 'models', 'skill-forest.json'))).toBe(true);
    });
});
