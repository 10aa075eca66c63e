import type { DifficultyVector } from 'difficulty/vector';
import type { LayoutSource } from 'levels/contracts';
import type { SkillLabel } from 'skill/labels';

export type SessionState = 'start-menu' | 'playing' | 'paused' | 'level-complete' | 'game-over' | 'game-complete';
export type LifeLostCause = 'fall' | 'enemy' | 'timeout';

export interface SessionStateChangedPayload {
    readonly from: SessionState;
    readonly to: SessionState;
}

export interface LevelStartedPayload {
    readonly levelIndex: number;
    readonly source: LayoutSource;
    readonly seed: number;
    readonly vector: DifficultyVector;
}

export interface LevelCompletedPayload {
    readonly levelIndex: number;
    readonly completionTime: number;
    readonly scoreAwarded: number;
    readonly totalScore: number;
}

export interface SkillPredictedPayload {
    readonly levelIndex: number;
    readonly label: SkillLabel;
    readonly source: 'model' | 'heuristic';
}

export interface DifficultyRetargetedPayload {
    readonly label: SkillLabel;
    readonly upcomingLevelIndex: number;
    readonly target: DifficultyVector;
}

export interface LifeLostPayload {
    readonly levelIndex: number;
    readonly livesRemaining: number;
    readonly cause: LifeLostCause;
}

export interface ModelRetrainedPayload {
    readonly success: boolean;
    readonly samples: number;
}

export interface LeapwiseEventMap {
    readonly SessionStateChanged: SessionStateChangedPayload;
    readonly LevelStarted: LevelStartedPayload;
    readonly LevelCompleted: LevelCompletedPayload;
    readonly SkillPredicted: SkillPredictedPayload;
    readonly DifficultyRetargeted: DifficultyRetargetedPayload;
    readonly LifeLost: LifeLostPayload;
    readonly ModelRetrained: ModelRetrainedPayload;
}

export type LeapwiseEventName = keyof LeapwiseEventMap;

export interface EventEnvelope<EventName extends LeapwiseEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: LeapwiseEventMap[EventName];
}

export type EventListener<EventName extends LeapwiseEventName> = (event: EventEnvelope<EventName>) => void;

export interface LeapwiseEventBus {
    publish<EventName extends LeapwiseEventName>(
        this: void,
        type: EventName,
        payload: LeapwiseEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends LeapwiseEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    unsubscribe<EventName extends LeapwiseEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): void;
}

// Listeners are stored type-erased per event name; publish only ever
// hands a listener the envelope for the name it subscribed under.
type StoredListener = (event: EventEnvelope<LeapwiseEventName>) => void;

export interface EventBusOptions {
    readonly now?: () => number;
}

export const createEventBus = (options: EventBusOptions = {}): LeapwiseEventBus => {
    const registry = new Map<LeapwiseEventName, Set<StoredListener>>();
    const resolveNow = options.now ?? Date.now;

    const listenersFor = (type: LeapwiseEventName): Set<StoredListener> => {
        const existing = registry.get(type);
        if (existing) {
            return existing;
        }
        const created = new Set<StoredListener>();
        registry.set(type, created);
        return created;
    };

    const publish: LeapwiseEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const listeners = registry.get(type);
        if (!listeners || listeners.size === 0) {
            return;
        }

        const envelope: EventEnvelope<typeof type> = { type, payload, timestamp };
        // Snapshot so a listener may unsubscribe itself mid-dispatch.
        for (const listener of Array.from(listeners)) {
            listener(envelope);
        }
    };

    const unsubscribe: LeapwiseEventBus['unsubscribe'] = (type, listener) => {
        const listeners = registry.get(type);
        if (!listeners) {
            return;
        }

        listeners.delete(listener as StoredListener);
        if (listeners.size === 0) {
            registry.delete(type);
        }
    };

    const subscribe: LeapwiseEventBus['subscribe'] = (type, listener) => {
        listenersFor(type).add(listener as StoredListener);
        return () => unsubscribe(type, listener);
    };

    return {
        publish,
        subscribe,
        unsubscribe,
    };
};
