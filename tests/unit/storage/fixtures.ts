import { createPerformanceSample, type PerformanceSample } from 'telemetry/sample';
import { createLogger, type LogEntry, type Logger } from 'util/log';

export const recordingLogger = (): { logger: Logger; entries: LogEntry[] } => {
    const entries: LogEntry[] = [];
    const logger = createLogger('test', { writer: (entry) => entries.push(entry), minLevel: 'debug' });
    return { logger, entries };
};

export const warningsOf = (entries: readonly LogEntry[]): string[] =>
    entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message);

export const makeSample = (overrides: Partial<PerformanceSample> = {}): PerformanceSample =>
    createPerformanceSample({
        timestamp: '2026-01-01T00:00:00.000Z',
        levelIndex: 2,
        completionTime: 42.5,
        jumps: 30,
        deaths: 1,
        coinsCollected: 12,
        enemiesDefeated: 3,
        totalDistance: 2800.25,
        preciseLandings: 6,
        maxSpeed: 11.5,
        airTimeRatio: 0.35,
        completionSpeed: 65.89,
        skillLabel: 'intermediate',
        ...overrides,
    });
