import { gameConfig } from 'config/game';
import type { PerformanceSample } from 'telemetry/sample';
import { rootLogger, type Logger } from 'util/log';

export type RetrainExecutor = (task: () => void) => void;

export const immediateExecutor: RetrainExecutor = (task) => {
    setImmediate(task);
};

export const inlineExecutor: RetrainExecutor = (task) => {
    task();
};

/** Full refit once the history holds enough samples and lands on an interval boundary. */
export const shouldRetrain = (
    historyLength: number,
    policy: { readonly minSamples: number; readonly retrainInterval: number } = gameConfig.training,
): boolean => {
    return historyLength >= policy.minSamples && historyLength % policy.retrainInterval === 0;
};

export interface RetrainResult {
    readonly success: boolean;
    readonly samples: number;
}

export interface RetrainScheduler {
    /** Stores the snapshot in the single slot; a pending snapshot is replaced. */
    readonly request: (history: readonly PerformanceSample[]) => void;
    readonly pending: () => boolean;
}

export interface RetrainSchedulerOptions {
    readonly train: (history: readonly PerformanceSample[]) => boolean;
    readonly executor?: RetrainExecutor;
    readonly onComplete?: (result: RetrainResult) => void;
    readonly logger?: Logger;
}

export const createRetrainScheduler = (options: RetrainSchedulerOptions): RetrainScheduler => {
    const executor = options.executor ?? immediateExecutor;
    const logger = options.logger ?? rootLogger.child('skill:retrain');

    let slot: readonly PerformanceSample[] | null = null;
    let scheduled = false;

    const run = (): void => {
        scheduled = false;
        const snapshot = slot;
        slot = null;
        if (!snapshot) {
            return;
        }

        let success = false;
        try {
            success = options.train(snapshot);
        } catch (error) {
            logger.error('Retrain task threw', { error: String(error) });
        }
        options.onComplete?.({ success, samples: snapshot.length });
    };

    const request: RetrainScheduler['request'] = (history) => {
        slot = history.slice();
        if (scheduled) {
            logger.debug('Replacing pending retrain snapshot', { samples: history.length });
            return;
        }
        scheduled = true;
        executor(run);
    };

    return {
        request,
        pending: () => slot !== null,
    };
};
