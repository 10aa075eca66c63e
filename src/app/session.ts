import { gameConfig } from 'config/game';
import { createDifficultyModulator, type DifficultyModulator } from 'difficulty/modulator';
import type { DifficultyVector } from 'difficulty/vector';
import type { LevelLayout } from 'levels/contracts';
import { createLevelGenerator, type LevelGenerator } from 'levels/generator';
import { createSkillClassifier, type SkillClassifier, type SkillPrediction } from 'skill/classifier';
import { createRetrainScheduler, shouldRetrain, type RetrainExecutor } from 'skill/retrain';
import { memoryStorageConfig, type StorageConfig } from 'storage/config';
import { createHistoryStore, type HistoryStore } from 'storage/history-store';
import { createModelStore } from 'storage/model-store';
import { createTelemetryAggregator, type TelemetryAggregator } from 'telemetry/aggregator';
import type { LevelFrame, PlayerFrame, Vector2 } from 'telemetry/contracts';
import type { PerformanceSample } from 'telemetry/sample';
import { createHighScoreTable, type HighScoreTable, type RecordHighScoreResult } from 'util/high-scores';
import { rootLogger, type Logger } from 'util/log';
import { mulberry32, randomInt, type RandomSource } from 'util/random';
import { createEventBus, type LeapwiseEventBus, type LifeLostCause, type SessionState } from './events';

export interface SessionFrame {
    readonly player: PlayerFrame;
    readonly level: LevelFrame;
}

export interface SessionTotals {
    readonly coins: number;
    readonly enemies: number;
}

export interface SessionSnapshot {
    readonly state: SessionState;
    readonly playerName: string | null;
    readonly levelIndex: number;
    readonly lives: number;
    readonly score: number;
    readonly totals: SessionTotals;
    /** Seconds spent playing the current level, pauses excluded. */
    readonly levelElapsed: number;
    readonly sessionElapsed: number;
    readonly layout: LevelLayout | null;
    readonly vector: DifficultyVector;
    readonly lastPrediction: SkillPrediction | null;
    readonly lastSample: PerformanceSample | null;
    readonly lastHighScore: RecordHighScoreResult | null;
}

export interface SessionOrchestrator {
    readonly submitName: (name: string) => boolean;
    readonly togglePause: () => SessionState;
    readonly update: (deltaSeconds: number, frame?: SessionFrame) => void;
    /** Spawn point to respawn at, or null once the session is over or not playing. */
    readonly handleDeath: (cause: LifeLostCause) => Vector2 | null;
    readonly completeLevel: () => PerformanceSample | null;
    readonly advanceLevel: () => LevelLayout | null;
    readonly restartLevel: () => LevelLayout | null;
    readonly restart: () => boolean;
    readonly snapshot: () => SessionSnapshot;
    readonly events: LeapwiseEventBus;
    readonly classifier: SkillClassifier;
    readonly modulator: DifficultyModulator;
    readonly history: HistoryStore;
}

export interface SessionOrchestratorOptions {
    readonly storage?: StorageConfig;
    readonly classifier?: SkillClassifier;
    readonly history?: HistoryStore;
    readonly modulator?: DifficultyModulator;
    readonly generator?: LevelGenerator;
    readonly aggregator?: TelemetryAggregator;
    readonly highScores?: HighScoreTable;
    readonly eventBus?: LeapwiseEventBus;
    readonly retrainExecutor?: RetrainExecutor;
    /** Seeds the per-level layout seeds. */
    readonly random?: RandomSource;
    readonly maxLevels?: number;
    readonly startingLives?: number;
    readonly now?: () => number;
    readonly logger?: Logger;
}

type Mutable<T> = { -readonly [Key in keyof T]: T[Key] };

interface LevelCheckpoint {
    readonly score: number;
    readonly totals: SessionTotals;
}

const MAX_LAYOUT_SEED = 0x7fffffff;

export const createSessionOrchestrator = (options: SessionOrchestratorOptions = {}): SessionOrchestrator => {
    const logger = options.logger ?? rootLogger.child('session');
    const now = options.now ?? Date.now;
    const storage = options.storage ?? memoryStorageConfig();
    const maxLevels = options.maxLevels ?? gameConfig.session.maxLevels;
    const startingLives = options.startingLives ?? gameConfig.session.startingLives;
    const random = options.random ?? mulberry32(now());

    const events = options.eventBus ?? createEventBus({ now });
    const history = options.history ?? createHistoryStore(storage, { logger: logger.child('history') });
    const classifier =
        options.classifier ??
        createSkillClassifier({ store: createModelStore(storage), now, logger: logger.child('classifier') });
    const modulator = options.modulator ?? createDifficultyModulator({ logger: logger.child('difficulty') });
    const generator = options.generator ?? createLevelGenerator({ logger: logger.child('levels') });
    const aggregator = options.aggregator ?? createTelemetryAggregator({ now, logger: logger.child('telemetry') });
    const highScores = options.highScores ?? createHighScoreTable({ now });

    const retrain = createRetrainScheduler({
        train: classifier.train,
        executor: options.retrainExecutor,
        logger: logger.child('retrain'),
        onComplete: (result) => {
            events.publish('ModelRetrained', result);
        },
    });

    classifier.load();

    let state: SessionState = 'start-menu';
    let playerName: string | null = null;
    let levelIndex = 0;
    let lives = startingLives;
    let score = 0;
    let totals: Mutable<SessionTotals> = { coins: 0, enemies: 0 };
    let levelCounts: Mutable<SessionTotals> = { coins: 0, enemies: 0 };
    let checkpoint: LevelCheckpoint = { score: 0, totals: { coins: 0, enemies: 0 } };
    let levelElapsed = 0;
    let sessionElapsed = 0;
    let advanceCountdown = 0;
    let layout: LevelLayout | null = null;
    let layoutSeed = 0;
    let lastPrediction: SkillPrediction | null = null;
    let lastSample: PerformanceSample | null = null;
    let lastHighScore: RecordHighScoreResult | null = null;

    const transition = (to: SessionState): void => {
        if (to === state) {
            return;
        }
        const from = state;
        state = to;
        logger.debug('State changed', { from, to });
        events.publish('SessionStateChanged', { from, to });
    };

    const beginLevel = (index: number, seed: number): LevelLayout => {
        const vector = modulator.target();
        levelIndex = index;
        layoutSeed = seed;
        layout = generator.generate(index, vector, { seed });
        levelCounts = { coins: 0, enemies: 0 };
        levelElapsed = 0;
        checkpoint = { score, totals: { ...totals } };
        aggregator.reset();
        transition('playing');
        events.publish('LevelStarted', {
            levelIndex: index,
            source: layout.metadata.source,
            seed,
            vector,
        });
        return layout;
    };

    const nextSeed = (): number => randomInt(random, 1, MAX_LAYOUT_SEED);

    const recordFinalScore = (): void => {
        lastHighScore = highScores.record(score, { name: playerName ?? undefined, level: levelIndex + 1, achievedAt: now() });
        logger.info('Session finished', {
            state,
            score,
            level: levelIndex + 1,
            highScorePosition: lastHighScore.position,
        });
    };

    const submitName: SessionOrchestrator['submitName'] = (name) => {
        if (state !== 'start-menu') {
            return false;
        }
        const trimmed = name.trim();
        if (trimmed.length === 0) {
            return false;
        }

        playerName = trimmed.slice(0, gameConfig.session.maxNameLength);
        lives = startingLives;
        score = 0;
        totals = { coins: 0, enemies: 0 };
        sessionElapsed = 0;
        lastPrediction = null;
        lastSample = null;
        lastHighScore = null;
        levelIndex = 0;
        modulator.reset();
        beginLevel(0, nextSeed());
        logger.info('Session started', { player: playerName, seed: layoutSeed });
        return true;
    };

    const togglePause: SessionOrchestrator['togglePause'] = () => {
        if (state === 'playing') {
            transition('paused');
        } else if (state === 'paused') {
            transition('playing');
        }
        return state;
    };

    const accrue = (level: LevelFrame): void => {
        const coins = level.coinsCollected - levelCounts.coins;
        const enemies = level.enemiesDefeated - levelCounts.enemies;
        if (coins > 0) {
            totals.coins += coins;
            score += coins * gameConfig.scoring.coin;
            levelCounts.coins = level.coinsCollected;
        }
        if (enemies > 0) {
            totals.enemies += enemies;
            score += enemies * gameConfig.scoring.enemy;
            levelCounts.enemies = level.enemiesDefeated;
        }
    };

    const advanceLevel: SessionOrchestrator['advanceLevel'] = () => {
        if (state !== 'level-complete') {
            return null;
        }
        advanceCountdown = 0;
        return beginLevel(levelIndex + 1, nextSeed());
    };

    const update: SessionOrchestrator['update'] = (deltaSeconds, frame) => {
        if (!(deltaSeconds > 0)) {
            return;
        }

        if (state === 'playing') {
            levelElapsed += deltaSeconds;
            sessionElapsed += deltaSeconds;
            if (frame) {
                aggregator.onTick(frame.player, frame.level);
                accrue(frame.level);
            }
            modulator.tick(deltaSeconds);
            return;
        }

        if (state === 'level-complete') {
            modulator.tick(deltaSeconds);
            advanceCountdown -= deltaSeconds;
            if (advanceCountdown <= 0) {
                advanceLevel();
            }
        }
    };

    const handleDeath: SessionOrchestrator['handleDeath'] = (cause) => {
        if (state !== 'playing' || !layout) {
            return null;
        }

        aggregator.recordDeath();
        lives -= 1;
        events.publish('LifeLost', { levelIndex, livesRemaining: lives, cause });
        logger.info('Life lost', { level: levelIndex, cause, lives });

        if (lives > 0) {
            return layout.spawnPoint;
        }

        transition('game-over');
        recordFinalScore();
        return null;
    };

    const completeLevel: SessionOrchestrator['completeLevel'] = () => {
        if (state !== 'playing') {
            return null;
        }

        const sample = aggregator.finalize(levelIndex, levelElapsed);
        history.append(sample);
        const prediction = classifier.predict(sample);
        lastSample = sample;
        lastPrediction = prediction;

        score += gameConfig.scoring.levelClear;
        events.publish('LevelCompleted', {
            levelIndex,
            completionTime: sample.completionTime,
            scoreAwarded: score - checkpoint.score,
            totalScore: score,
        });
        events.publish('SkillPredicted', { levelIndex, label: prediction.label, source: prediction.source });

        const upcoming = levelIndex + 1;
        const target = modulator.computeNextVector(prediction.label, upcoming);
        events.publish('DifficultyRetargeted', { label: prediction.label, upcomingLevelIndex: upcoming, target });
        aggregator.reset();

        const length = history.length();
        if (shouldRetrain(length)) {
            logger.info('Requesting retrain', { samples: length });
            retrain.request(history.samples());
        }

        if (upcoming >= maxLevels) {
            transition('game-complete');
            recordFinalScore();
        } else {
            advanceCountdown = gameConfig.session.levelCompleteDelaySeconds;
            transition('level-complete');
        }
        return sample;
    };

    const restartLevel: SessionOrchestrator['restartLevel'] = () => {
        if (state !== 'playing' && state !== 'paused') {
            return null;
        }
        score = checkpoint.score;
        totals = { ...checkpoint.totals };
        lives = startingLives;
        logger.info('Level restarted', { level: levelIndex, seed: layoutSeed });
        return beginLevel(levelIndex, layoutSeed);
    };

    const restart: SessionOrchestrator['restart'] = () => {
        if (state !== 'game-over' && state !== 'game-complete') {
            return false;
        }
        playerName = null;
        levelIndex = 0;
        lives = startingLives;
        score = 0;
        totals = { coins: 0, enemies: 0 };
        levelCounts = { coins: 0, enemies: 0 };
        levelElapsed = 0;
        sessionElapsed = 0;
        layout = null;
        lastPrediction = null;
        lastSample = null;
        modulator.reset();
        aggregator.reset();
        transition('start-menu');
        return true;
    };

    const snapshot: SessionOrchestrator['snapshot'] = () =>
        Object.freeze({
            state,
            playerName,
            levelIndex,
            lives,
            score,
            totals: Object.freeze({ ...totals }),
            levelElapsed,
            sessionElapsed,
            layout,
            vector: modulator.current(),
            lastPrediction,
            lastSample,
            lastHighScore,
        });

    return {
        submitName,
        togglePause,
        update,
        handleDeath,
        completeLevel,
        advanceLevel,
        restartLevel,
        restart,
        snapshot,
        events,
        classifier,
        modulator,
        history,
    };
};
