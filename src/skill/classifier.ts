import { gameConfig, type GameConfig } from 'config/game';
import { evaluate, stratifiedSplit } from 'skill/dataset';
import { FEATURE_NAMES, toFeatureRow, type FeatureName, type SkillFeatures } from 'skill/features';
import {
    mostLikelyLabel,
    predictProbabilities,
    trainForest,
    type LabelProbabilities,
    type LabeledRow,
} from 'skill/forest';
import { predictHeuristicSkill } from 'skill/heuristics';
import type { SkillLabel } from 'skill/labels';
import type { SkillModel } from 'skill/model';
import { fitScaler, transformRow } from 'skill/scaler';
import type { ModelStore } from 'storage/model-store';
import type { PerformanceSample } from 'telemetry/sample';
import { rootLogger, type Logger } from 'util/log';
import { mulberry32 } from 'util/random';

type TrainingConfig = GameConfig['training'];

export interface SkillPrediction {
    readonly label: SkillLabel;
    readonly probabilities: LabelProbabilities | null;
    readonly source: 'model' | 'heuristic';
}

export interface TrainingReport {
    readonly samples: number;
    readonly trainSize: number;
    readonly testSize: number;
    readonly accuracy: number | null;
    readonly importances: Readonly<Record<FeatureName, number>>;
}

export interface SkillClassifier {
    readonly isTrained: () => boolean;
    readonly train: (history: readonly PerformanceSample[]) => boolean;
    readonly predict: (features: Partial<SkillFeatures>) => SkillPrediction;
    /** Loads the stored model if one is present and compatible. */
    readonly load: () => boolean;
    readonly lastReport: () => TrainingReport | null;
    readonly featureImportances: () => Readonly<Record<FeatureName, number>> | null;
}

export interface SkillClassifierOptions {
    readonly store?: ModelStore;
    readonly training?: Partial<TrainingConfig>;
    readonly now?: () => number;
    readonly logger?: Logger;
}

const toImportanceRecord = (values: readonly number[]): Record<FeatureName, number> => {
    const at = (name: FeatureName): number => values[FEATURE_NAMES.indexOf(name)] ?? 0;
    return {
        completionTime: at('completionTime'),
        jumps: at('jumps'),
        deaths: at('deaths'),
        coinsCollected: at('coinsCollected'),
        enemiesDefeated: at('enemiesDefeated'),
        totalDistance: at('totalDistance'),
        preciseLandings: at('preciseLandings'),
        maxSpeed: at('maxSpeed'),
        airTimeRatio: at('airTimeRatio'),
        completionSpeed: at('completionSpeed'),
    };
};

export const createSkillClassifier = (options: SkillClassifierOptions = {}): SkillClassifier => {
    const config: TrainingConfig = { ...gameConfig.training, ...options.training };
    const logger = options.logger ?? rootLogger.child('skill:classifier');
    const now = options.now ?? Date.now;
    const store = options.store;

    // Replaced in one assignment; readers always see a complete model.
    let model: SkillModel | null = null;
    let report: TrainingReport | null = null;

    const fit = (history: readonly PerformanceSample[]): { model: SkillModel; report: TrainingReport } => {
        const random = mulberry32(config.seed);
        const useHoldout = history.length >= config.holdoutThreshold;
        const split = useHoldout
            ? stratifiedSplit(history, (sample) => sample.skillLabel, config.holdoutFraction, random)
            : { train: history, test: [] };

        const trainRows = split.train.map((sample) => toFeatureRow(sample));
        const scaler = fitScaler(trainRows);
        const examples: LabeledRow[] = split.train.map((sample, index) => ({
            features: transformRow(scaler, trainRows[index]),
            label: sample.skillLabel,
        }));

        const forest = trainForest(examples, {
            trees: config.trees,
            maxDepth: config.maxDepth,
            minSamplesSplit: config.minSamplesSplit,
            seed: config.seed,
        });

        const accuracy =
            split.test.length > 0
                ? evaluate(
                      split.test,
                      (sample) => sample.skillLabel,
                      (sample) => mostLikelyLabel(predictProbabilities(forest, transformRow(scaler, toFeatureRow(sample)))),
                  ).accuracy
                : null;

        return {
            model: {
                forest,
                scaler,
                trainedAt: new Date(now()).toISOString(),
                sampleCount: history.length,
                accuracy,
            },
            report: {
                samples: history.length,
                trainSize: split.train.length,
                testSize: split.test.length,
                accuracy,
                importances: toImportanceRecord(forest.importances),
            },
        };
    };

    const train: SkillClassifier['train'] = (history) => {
        if (history.length < config.minSamples) {
            logger.info('Not enough samples to train', { samples: history.length, required: config.minSamples });
            return false;
        }

        let result: { model: SkillModel; report: TrainingReport };
        try {
            result = fit(history);
        } catch (error) {
            logger.error('Training failed; keeping the previous model', { error: String(error) });
            return false;
        }

        model = result.model;
        report = result.report;
        store?.save(result.model);

        logger.info('Skill model trained', {
            samples: report.samples,
            trainSize: report.trainSize,
            testSize: report.testSize,
            accuracy: report.accuracy,
        });
        logger.debug('Feature importances', { ...report.importances });
        return true;
    };

    const predict: SkillClassifier['predict'] = (features) => {
        const current = model;
        if (!current) {
            return { label: predictHeuristicSkill(features), probabilities: null, source: 'heuristic' };
        }

        try {
            const row = transformRow(current.scaler, toFeatureRow(features));
            const probabilities = predictProbabilities(current.forest, row);
            const label = mostLikelyLabel(probabilities);
            logger.debug('Skill predicted', { label, ...probabilities });
            return { label, probabilities, source: 'model' };
        } catch (error) {
            logger.warn('Model inference failed; using the heuristic', { error: String(error) });
            return { label: predictHeuristicSkill(features), probabilities: null, source: 'heuristic' };
        }
    };

    const load: SkillClassifier['load'] = () => {
        const stored = store?.load() ?? null;
        if (!stored) {
            return false;
        }
        model = stored;
        logger.info('Loaded stored skill model', { trainedAt: stored.trainedAt, samples: stored.sampleCount });
        return true;
    };

    return {
        isTrained: () => model !== null,
        train,
        predict,
        load,
        lastReport: () => report,
        featureImportances: () => (model ? toImportanceRecord(model.forest.importances) : null),
    };
};
