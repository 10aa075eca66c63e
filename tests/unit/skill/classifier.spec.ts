import { describe, expect, it, vi } from 'vitest';

import { generateSyntheticHistory } from 'cli/synthetic';
import { createSkillClassifier } from 'skill/classifier';
import { createModelStore } from 'storage/model-store';
import { memoryStorageConfig } from 'storage/config';
import { createLogger } from 'util/log';

const quietLogger = () => createLogger('test', { writer: vi.fn() });
const history = generateSyntheticHistory({ seed: 7, now: () => 0 });

const expertRun = {
    completionTime: 20,
    jumps: 25,
    deaths: 0,
    coinsCollected: 15,
    enemiesDefeated: 6,
    totalDistance: 3000,
    preciseLandings: 11,
    maxSpeed: 12,
    airTimeRatio: 0.5,
    completionSpeed: 100,
};

const noviceRun = {
    completionTime: 90,
    jumps: 80,
    deaths: 6,
    coinsCollected: 2,
    enemiesDefeated: 0,
    totalDistance: 1500,
    preciseLandings: 1,
    maxSpeed: 6,
    airTimeRatio: 0.3,
    completionSpeed: 20,
};

describe('createSkillClassifier', () => {
    it('falls back to the standalone heuristic while untrained', () => {
        const classifier = createSkillClassifier({ logger: quietLogger() });

        expect(classifier.isTrained()).toBe(false);
        expect(classifier.predict(noviceRun)).toEqual({ label: 'novice', probabilities: null, source: 'heuristic' });
    });

    it('refuses to train below the minimum sample count', () => {
        const classifier = createSkillClassifier({ logger: quietLogger() });

        expect(classifier.train(history.slice(0, 9))).toBe(false);
        expect(classifier.isTrained()).toBe(false);
        expect(classifier.lastReport()).toBeNull();
    });

    it('fits on every sample below the holdout threshold', () => {
        const classifier = createSkillClassifier({ logger: quietLogger() });

        expect(classifier.train([...history.slice(0, 6), ...history.slice(30, 36)])).toBe(true);
        expect(classifier.lastReport()).toMatchObject({ samples: 12, trainSize: 12, testSize: 0, accuracy: null });
    });

    it('holds out a stratified fifth once twenty samples exist', () => {
        const classifier = createSkillClassifier({ logger: quietLogger(), now: () => 0 });

        expect(classifier.train(history)).toBe(true);

        const report = classifier.lastReport();
        expect(report?.samples).toBe(45);
        expect(report?.trainSize).toBe(36);
        expect(report?.testSize).toBe(9);
        expect(report?.accuracy).toBeGreaterThanOrEqual(0);
        expect(report?.accuracy).toBeLessThanOrEqual(1);
    });

    it('predicts from the model with per-class probabilities', () => {
        const classifier = createSkillClassifier({ logger: quietLogger() });
        classifier.train(history);

        const expert = classifier.predict(expertRun);
        const novice = classifier.predict(noviceRun);

        expect(expert.source).toBe('model');
        expect(expert.label).toBe('expert');
        expect(novice.label).toBe('novice');
        const probabilities = expert.probabilities;
        expect(probabilities).not.toBeNull();
        if (probabilities) {
            expect(probabilities.novice + probabilities.intermediate + probabilities.expert).toBeCloseTo(1, 10);
        }
    });

    it('tolerates non-finite features at inference time', () => {
        const classifier = createSkillClassifier({ logger: quietLogger() });
        classifier.train(history);

        const prediction = classifier.predict({ ...expertRun, maxSpeed: Number.NaN, jumps: Number.POSITIVE_INFINITY });

        expect(prediction.source).toBe('model');
    });

    it('exposes normalized feature importances once trained', () => {
        const classifier = createSkillClassifier({ logger: quietLogger() });
        expect(classifier.featureImportances()).toBeNull();

        classifier.train(history);
        const importances = classifier.featureImportances();

        expect(importances).not.toBeNull();
        if (importances) {
            const total = Object.values(importances).reduce((sum, value) => sum + value, 0);
            expect(total).toBeCloseTo(1, 10);
        }
    });

    it('keeps the previous model when training throws', () => {
        const writer = vi.fn();
        const classifier = createSkillClassifier({
            logger: createLogger('test', { writer }),
            training: { holdoutFraction: 1.5 },
        });
        expect(classifier.train(history.slice(0, 12))).toBe(true);
        const before = classifier.predict(expertRun);

        expect(classifier.train(history)).toBe(false);

        expect(classifier.isTrained()).toBe(true);
        expect(classifier.predict(expertRun)).toEqual(before);
        expect(writer).toHaveBeenCalledWith(expect.objectContaining({ level: 'error' }));
    });

    it('persists after training and reloads into a fresh classifier', () => {
        const store = createModelStore(memoryStorageConfig());
        const trained = createSkillClassifier({ store, logger: quietLogger() });
        trained.train(history);

        const reloaded = createSkillClassifier({ store, logger: quietLogger() });

        expect(reloaded.load()).toBe(true);
        expect(reloaded.isTrained()).toBe(true);
        expect(reloaded.predict(expertRun)).toEqual(trained.predict(expertRun));
    });

    it('stays untrained when nothing is stored', () => {
        const classifier = createSkillClassifier({ store: createModelStore(memoryStorageConfig()), logger: quietLogger() });

        expect(classifier.load()).toBe(false);
        expect(classifier.isTrained()).toBe(false);
    });
});
