import type { SessionState } from 'app/events';
import { createSkillClassifier } from 'skill/classifier';
import type { SkillLabel } from 'skill/labels';
import { diskStorageConfig, memoryStorageConfig, type StorageConfig } from 'storage/config';
import { createHistoryStore } from 'storage/history-store';
import { createModelStore } from 'storage/model-store';
import { rootLogger, type Logger } from 'util/log';
import { roundTo } from 'util/math';
import { runHeadlessSession, type HeadlessSessionResult } from './headless-engine';

export interface SimulationInput {
    readonly mode: 'simulate';
    readonly seed?: number;
    readonly runs?: number;
    readonly profile?: SkillLabel;
    readonly maxLevels?: number;
    readonly attemptCapSeconds?: number;
    /** Persist history and model under this directory; in-memory otherwise. */
    readonly dataDir?: string;
    readonly includeRuns?: boolean;
}

export interface SimulationRunSummary {
    readonly seed: number;
    readonly state: SessionState;
    readonly score: number;
    readonly levelsCleared: number;
    readonly deaths: number;
    readonly predictions: readonly SkillLabel[];
}

export interface SimulationResult {
    readonly ok: true;
    readonly seed: number;
    readonly profile: SkillLabel;
    readonly runCount: number;
    readonly averageScore: number;
    readonly bestScore: number;
    readonly completedRuns: number;
    readonly historySize: number;
    readonly modelTrained: boolean;
    readonly runs: readonly SimulationRunSummary[];
    readonly sessions?: readonly HeadlessSessionResult[];
}

const DEFAULT_SEED = 1;
const DEFAULT_RUNS = 1;
const DEFAULT_PROFILE: SkillLabel = 'intermediate';

const summarize = (result: HeadlessSessionResult): SimulationRunSummary => ({
    seed: result.seed,
    state: result.state,
    score: result.score,
    levelsCleared: result.levels.length,
    deaths: result.deaths.fall + result.deaths.enemy + result.deaths.timeout,
    predictions: result.levels.map((level) => level.predicted),
});

/**
 * Plays `runs` sessions back to back with seeds `seed`, `seed + 1`, ... over
 * one shared history and classifier, so later runs see the model earlier
 * runs trained.
 */
export const runSimulation = async (input: SimulationInput, logger: Logger = rootLogger.child('cli:simulate')): Promise<SimulationResult> => {
    const seed = input.seed ?? DEFAULT_SEED;
    const runs = input.runs ?? DEFAULT_RUNS;
    const profile = input.profile ?? DEFAULT_PROFILE;
    if (!Number.isInteger(runs) || runs < 1) {
        throw new RangeError(`runs must be a positive integer, received ${runs}`);
    }

    const storage: StorageConfig = input.dataDir ? diskStorageConfig(input.dataDir) : memoryStorageConfig();
    const history = createHistoryStore(storage, { logger: logger.child('history') });
    const classifier = createSkillClassifier({
        store: createModelStore(storage, { logger: logger.child('models') }),
        logger: logger.child('classifier'),
    });

    const sessions: HeadlessSessionResult[] = [];
    for (let index = 0; index < runs; index += 1) {
        const result = runHeadlessSession({
            seed: seed + index,
            profile,
            maxLevels: input.maxLevels,
            attemptCapSeconds: input.attemptCapSeconds,
            storage,
            history,
            classifier,
            logger,
        });
        logger.info('Simulated session finished', {
            seed: result.seed,
            state: result.state,
            score: result.score,
            levels: result.levels.length,
        });
        sessions.push(result);
    }

    const scores = sessions.map((session) => session.score);
    return {
        ok: true,
        seed,
        profile,
        runCount: runs,
        averageScore: roundTo(scores.reduce((sum, score) => sum + score, 0) / runs, 2),
        bestScore: Math.max(...scores),
        completedRuns: sessions.filter((session) => session.state === 'game-complete').length,
        historySize: history.length(),
        modelTrained: classifier.isTrained(),
        runs: sessions.map(summarize),
        ...(input.includeRuns ? { sessions } : {}),
    };
};
