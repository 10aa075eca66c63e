import { createSessionOrchestrator } from 'app/session';
import type { SessionState } from 'app/events';
import { gameConfig } from 'config/game';
import type { DifficultyVector } from 'difficulty/vector';
import type { LevelLayout } from 'levels/contracts';
import { createPlatformerWorld, type PlatformerWorld, type StepOutcome } from 'physics/world';
import type { SkillClassifier } from 'skill/classifier';
import type { SkillLabel } from 'skill/labels';
import { inlineExecutor } from 'skill/retrain';
import { memoryStorageConfig, type StorageConfig } from 'storage/config';
import type { HistoryStore } from 'storage/history-store';
import { rootLogger, type Logger } from 'util/log';
import { roundTo } from 'util/math';
import { mulberry32 } from 'util/random';
import { AUTOPILOT_PROFILES, createAutopilot } from './autopilot';

const STEP_MS = gameConfig.physics.stepMs;
const STEP_SECONDS = STEP_MS / 1000;
const DEFAULT_ATTEMPT_CAP_SECONDS = 90;
const DEFAULT_EPOCH = Date.UTC(2026, 0, 1);
// Hard stop for a session that somehow never reaches a terminal state.
const MAX_SESSION_SECONDS = 60 * 60;

export interface HeadlessSessionOptions {
    readonly seed: number;
    readonly profile: SkillLabel;
    readonly maxLevels?: number;
    /** Attempt length after which the run counts as a timeout death. */
    readonly attemptCapSeconds?: number;
    readonly storage?: StorageConfig;
    readonly history?: HistoryStore;
    readonly classifier?: SkillClassifier;
    /** Wall-clock origin for sample timestamps; the clock then advances one step per frame. */
    readonly epoch?: number;
    readonly logger?: Logger;
}

export interface HeadlessLevelSummary {
    readonly levelIndex: number;
    readonly completionTime: number;
    readonly deaths: number;
    readonly estimate: SkillLabel;
    readonly predicted: SkillLabel;
    readonly source: 'model' | 'heuristic';
}

export interface HeadlessSessionResult {
    readonly seed: number;
    readonly profile: SkillLabel;
    readonly state: SessionState;
    readonly frames: number;
    readonly elapsedSeconds: number;
    readonly score: number;
    readonly lives: number;
    readonly deaths: Readonly<Record<Exclude<StepOutcome, 'running' | 'goal'> | 'timeout', number>>;
    readonly coins: number;
    readonly enemies: number;
    readonly levels: readonly HeadlessLevelSummary[];
    readonly finalVector: DifficultyVector;
    readonly modelTrained: boolean;
}

const isTerminal = (state: SessionState): boolean => state === 'game-over' || state === 'game-complete';

export const runHeadlessSession = (options: HeadlessSessionOptions): HeadlessSessionResult => {
    const logger = options.logger ?? rootLogger.child('cli:headless');
    const attemptCap = options.attemptCapSeconds ?? DEFAULT_ATTEMPT_CAP_SECONDS;
    const epoch = options.epoch ?? DEFAULT_EPOCH;
    let frames = 0;
    const now = () => epoch + Math.round(frames * STEP_MS);

    const session = createSessionOrchestrator({
        storage: options.storage ?? memoryStorageConfig(),
        history: options.history,
        classifier: options.classifier,
        retrainExecutor: inlineExecutor,
        random: mulberry32(options.seed),
        maxLevels: options.maxLevels,
        now,
        logger: logger.child('session'),
    });
    const autopilot = createAutopilot(AUTOPILOT_PROFILES[options.profile], mulberry32(options.seed ^ 0x5bd1e995));

    const deaths = { fall: 0, enemy: 0, timeout: 0 };
    const levels: HeadlessLevelSummary[] = [];
    let world: PlatformerWorld | null = null;
    let worldLayout: LevelLayout | null = null;
    let attemptFrames = 0;
    let deathsThisLevel = 0;

    const ensureWorld = (layout: LevelLayout): PlatformerWorld => {
        if (world && worldLayout === layout) {
            return world;
        }
        world?.dispose();
        const bakedSpeed = session.modulator.target().enemySpeedMultiplier;
        world = createPlatformerWorld(layout, {
            stepMs: STEP_MS,
            enemySpeedScale: () => session.modulator.adaptiveEnemySpeed(1) / bakedSpeed,
            logger: logger.child('world'),
        });
        worldLayout = layout;
        attemptFrames = 0;
        return world;
    };

    const disposeWorld = (): void => {
        world?.dispose();
        world = null;
        worldLayout = null;
    };

    const die = (cause: 'fall' | 'enemy' | 'timeout', active: PlatformerWorld): void => {
        deaths[cause] += 1;
        deathsThisLevel += 1;
        attemptFrames = 0;
        const spawn = session.handleDeath(cause);
        if (spawn) {
            active.respawn(spawn);
        }
    };

    session.submitName(`bot-${options.profile}`);
    const frameLimit = Math.round(MAX_SESSION_SECONDS / STEP_SECONDS);

    while (!isTerminal(session.snapshot().state) && frames < frameLimit) {
        frames += 1;
        const snapshot = session.snapshot();

        if (snapshot.state !== 'playing' || !snapshot.layout) {
            session.update(STEP_SECONDS);
            continue;
        }

        const active = ensureWorld(snapshot.layout);
        const input = autopilot.decide({
            player: active.playerFrame(),
            layout: snapshot.layout,
            enemies: active.enemies(),
        });
        const result = active.step(input);
        session.update(STEP_SECONDS, { player: result.player, level: result.level });
        attemptFrames += 1;

        if (result.outcome === 'goal') {
            const sample = session.completeLevel();
            const prediction = session.snapshot().lastPrediction;
            if (sample && prediction) {
                levels.push({
                    levelIndex: sample.levelIndex,
                    completionTime: sample.completionTime,
                    deaths: deathsThisLevel,
                    estimate: sample.skillLabel,
                    predicted: prediction.label,
                    source: prediction.source,
                });
            }
            deathsThisLevel = 0;
        } else if (result.outcome === 'fall' || result.outcome === 'enemy') {
            die(result.outcome, active);
        } else if (attemptFrames * STEP_SECONDS >= attemptCap) {
            die('timeout', active);
        }
    }

    disposeWorld();
    const final = session.snapshot();
    if (!isTerminal(final.state)) {
        logger.warn('Headless session hit the frame limit', { seed: options.seed, frames });
    }

    return {
        seed: options.seed,
        profile: options.profile,
        state: final.state,
        frames,
        elapsedSeconds: roundTo(final.sessionElapsed, 2),
        score: final.score,
        lives: final.lives,
        deaths,
        coins: final.totals.coins,
        enemies: final.totals.enemies,
        levels,
        finalVector: session.modulator.target(),
        modelTrained: session.classifier.isTrained(),
    };
};
