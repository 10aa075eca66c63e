import { createSkillClassifier, type SkillPrediction, type TrainingReport } from 'skill/classifier';
import type { SkillFeatures } from 'skill/features';
import { SKILL_LABELS, type SkillLabel } from 'skill/labels';
import type { StorageConfig } from 'storage/config';
import { createHistoryStore } from 'storage/history-store';
import { createModelStore } from 'storage/model-store';
import { rootLogger, type Logger } from 'util/log';
import { generateSyntheticHistory } from './synthetic';

export interface TrainInput {
    readonly storage: StorageConfig;
    /** Adds the synthetic history to the stored one before fitting. */
    readonly synthetic?: boolean;
    readonly seed?: number;
    readonly now?: () => number;
}

export interface TrainResult {
    readonly ok: boolean;
    readonly samples: number;
    readonly distribution: Readonly<Record<SkillLabel, number>>;
    readonly report: TrainingReport | null;
    readonly probes: Readonly<Record<'struggling' | 'fluent', SkillPrediction>>;
}

export interface SeedHistoryInput {
    readonly storage: StorageConfig;
    readonly seed?: number;
    readonly perTier?: number;
    readonly now?: () => number;
}

export interface SeedHistoryResult {
    readonly ok: true;
    readonly appended: number;
    readonly historySize: number;
}

const DEFAULT_SEED = 42;

// Two hand-picked attempts used to sanity-check a fresh model.
const PROBES: Readonly<Record<'struggling' | 'fluent', SkillFeatures>> = {
    struggling: {
        completionTime: 95,
        jumps: 40,
        deaths: 4,
        coinsCollected: 3,
        enemiesDefeated: 0,
        totalDistance: 2600,
        preciseLandings: 2,
        maxSpeed: 8,
        airTimeRatio: 0.2,
        completionSpeed: 27,
    },
    fluent: {
        completionTime: 22,
        jumps: 24,
        deaths: 0,
        coinsCollected: 14,
        enemiesDefeated: 3,
        totalDistance: 3100,
        preciseLandings: 14,
        maxSpeed: 12,
        airTimeRatio: 0.45,
        completionSpeed: 140,
    },
};

export const runTraining = async (input: TrainInput, logger: Logger = rootLogger.child('cli:train')): Promise<TrainResult> => {
    const history = createHistoryStore(input.storage, { logger: logger.child('history') });
    const samples = [
        ...history.samples(),
        ...(input.synthetic ? generateSyntheticHistory({ seed: input.seed ?? DEFAULT_SEED, now: input.now }) : []),
    ];

    const distribution: Record<SkillLabel, number> = { novice: 0, intermediate: 0, expert: 0 };
    for (const sample of samples) {
        distribution[sample.skillLabel] += 1;
    }
    logger.info('Training set', { samples: samples.length, ...distribution });

    const classifier = createSkillClassifier({
        store: createModelStore(input.storage, { logger: logger.child('models') }),
        now: input.now,
        logger: logger.child('classifier'),
    });
    const ok = classifier.train(samples);

    return {
        ok,
        samples: samples.length,
        distribution,
        report: classifier.lastReport(),
        probes: {
            struggling: classifier.predict(PROBES.struggling),
            fluent: classifier.predict(PROBES.fluent),
        },
    };
};

export const seedHistory = async (
    input: SeedHistoryInput,
    logger: Logger = rootLogger.child('cli:seed-history'),
): Promise<SeedHistoryResult> => {
    const history = createHistoryStore(input.storage, { logger: logger.child('history') });
    const samples = generateSyntheticHistory({ seed: input.seed ?? DEFAULT_SEED, perTier: input.perTier, now: input.now });
    samples.forEach((sample) => history.append(sample));
    logger.info('Synthetic history appended', { appended: samples.length, labels: SKILL_LABELS.length });
    return { ok: true, appended: samples.length, historySize: history.length() };
};
