import { rootLogger, type Logger } from 'util/log';

const STORAGE_KEY = 'leapwise::high-scores::v1';
const MAX_ENTRIES = 10;
const DEFAULT_NAME = 'PLAYER';
const MAX_NAME_LENGTH = 16;

/** Minimal key/value surface; a Web Storage object satisfies it. */
export interface KeyValueStorage {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
}

export interface HighScoreEntry {
    readonly name: string;
    readonly score: number;
    readonly level: number;
    readonly achievedAt: number;
}

export interface RecordHighScoreOptions {
    readonly name?: string;
    readonly level?: number;
    readonly achievedAt?: number;
    readonly minScore?: number;
}

export interface RecordHighScoreResult {
    readonly accepted: boolean;
    readonly position: number | null;
    readonly entries: readonly HighScoreEntry[];
}

export interface HighScoreTable {
    readonly list: () => readonly HighScoreEntry[];
    readonly record: (score: number, options?: RecordHighScoreOptions) => RecordHighScoreResult;
    readonly clear: () => void;
}

export interface HighScoreTableOptions {
    readonly storage?: KeyValueStorage;
    readonly now?: () => number;
    readonly logger?: Logger;
}

export const createMemoryStorage = (): KeyValueStorage => {
    const values = new Map<string, string>();
    return {
        getItem: (key) => values.get(key) ?? null,
        setItem: (key, value) => {
            values.set(key, value);
        },
    };
};

const normalizeName = (name: string): string => {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
        return DEFAULT_NAME;
    }
    return trimmed.slice(0, MAX_NAME_LENGTH);
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null;
};

const finiteOr = (value: unknown, fallback: number): number => {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
};

const sortScores = (entries: HighScoreEntry[]): HighScoreEntry[] => {
    return entries.sort((a, b) => {
        if (b.score !== a.score) {
            return b.score - a.score;
        }
        return a.achievedAt - b.achievedAt;
    });
};

export const createHighScoreTable = (options: HighScoreTableOptions = {}): HighScoreTable => {
    const storage = options.storage ?? createMemoryStorage();
    const now = options.now ?? Date.now;
    const logger = options.logger ?? rootLogger.child('high-scores');

    const readScores = (): HighScoreEntry[] => {
        const serialized = storage.getItem(STORAGE_KEY);
        if (!serialized) {
            return [];
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(serialized);
        } catch (error) {
            logger.warn('Failed to parse high score storage, clearing', { error: String(error) });
            storage.setItem(STORAGE_KEY, JSON.stringify([]));
            return [];
        }

        if (!Array.isArray(parsed)) {
            return [];
        }

        const entries: HighScoreEntry[] = [];
        for (const candidate of parsed) {
            if (!isRecord(candidate) || typeof candidate.score !== 'number' || !Number.isFinite(candidate.score)) {
                continue;
            }
            entries.push({
                name: typeof candidate.name === 'string' ? candidate.name : DEFAULT_NAME,
                score: candidate.score,
                level: finiteOr(candidate.level, 1),
                achievedAt: finiteOr(candidate.achievedAt, 0),
            });
        }
        return entries;
    };

    const persistScores = (entries: readonly HighScoreEntry[]): void => {
        try {
            storage.setItem(STORAGE_KEY, JSON.stringify(entries));
        } catch (error) {
            logger.warn('Failed to persist high scores', { error: String(error) });
        }
    };

    const list: HighScoreTable['list'] = () => sortScores(readScores());

    const record: HighScoreTable['record'] = (score, recordOptions = {}) => {
        if (!Number.isFinite(score) || score < 0 || score < (recordOptions.minScore ?? 0)) {
            return { accepted: false, position: null, entries: list() };
        }

        const level = recordOptions.level;
        const achievedAt = recordOptions.achievedAt;
        const insertion = {
            name: normalizeName(recordOptions.name ?? DEFAULT_NAME),
            score: Math.floor(score),
            level: typeof level === 'number' && Number.isFinite(level) ? Math.max(1, Math.floor(level)) : 1,
            achievedAt: typeof achievedAt === 'number' && Number.isFinite(achievedAt) ? Math.floor(achievedAt) : now(),
        } satisfies HighScoreEntry;

        const next = sortScores([...readScores(), insertion]).slice(0, MAX_ENTRIES);
        const position = next.indexOf(insertion);

        if (position === -1) {
            return { accepted: false, position: null, entries: next };
        }

        persistScores(next);
        return { accepted: true, position, entries: next };
    };

    const clear: HighScoreTable['clear'] = () => {
        persistScores([]);
    };

    return { list, record, clear };
};
