import fs from 'node:fs';
import path from 'node:path';

import { isSkillLabel } from 'skill/labels';
import { createPerformanceSample, type PerformanceSample } from 'telemetry/sample';
import { formatCsvRow, parseCsvLines, type CsvRow } from 'util/csv';
import { rootLogger, type Logger } from 'util/log';
import type { StorageConfig } from './config';

export const HISTORY_COLUMNS = [
    'timestamp',
    'level',
    'completion_time',
    'jumps',
    'deaths',
    'coins_collected',
    'enemies_defeated',
    'total_distance',
    'precise_landings',
    'max_speed',
    'air_time_ratio',
    'completion_speed',
    'skill_level',
] as const;

type HistoryColumn = (typeof HISTORY_COLUMNS)[number];

export interface HistoryStore {
    readonly samples: () => readonly PerformanceSample[];
    readonly length: () => number;
    /** Keeps the sample in memory even when the disk write fails. */
    readonly append: (sample: PerformanceSample) => void;
}

export interface HistoryStoreOptions {
    readonly logger?: Logger;
    readonly initial?: readonly PerformanceSample[];
}

const HEADER_LINE = HISTORY_COLUMNS.join(',');

export const sampleToRow = (sample: PerformanceSample): string => {
    return formatCsvRow([
        sample.timestamp,
        sample.levelIndex,
        sample.completionTime,
        sample.jumps,
        sample.deaths,
        sample.coinsCollected,
        sample.enemiesDefeated,
        sample.totalDistance,
        sample.preciseLandings,
        sample.maxSpeed,
        sample.airTimeRatio,
        sample.completionSpeed,
        sample.skillLabel,
    ]);
};

const parseNumber = (cell: string | undefined): number => {
    if (cell === undefined || cell.length === 0) {
        return Number.NaN;
    }
    return Number(cell);
};

/** Returns a sample, or the reason the row was rejected. */
export const rowToSample = (row: CsvRow, header: readonly string[]): PerformanceSample | string => {
    if (row.length !== header.length) {
        return `expected ${header.length} cells, found ${row.length}`;
    }

    const cell = (column: HistoryColumn): string | undefined => row[header.indexOf(column)];
    const label = cell('skill_level');
    if (!isSkillLabel(label)) {
        return `unknown skill label ${String(label)}`;
    }

    try {
        return createPerformanceSample({
            timestamp: cell('timestamp') ?? '',
            levelIndex: parseNumber(cell('level')),
            completionTime: parseNumber(cell('completion_time')),
            jumps: parseNumber(cell('jumps')),
            deaths: parseNumber(cell('deaths')),
            coinsCollected: parseNumber(cell('coins_collected')),
            enemiesDefeated: parseNumber(cell('enemies_defeated')),
            totalDistance: parseNumber(cell('total_distance')),
            preciseLandings: parseNumber(cell('precise_landings')),
            maxSpeed: parseNumber(cell('max_speed')),
            airTimeRatio: parseNumber(cell('air_time_ratio')),
            completionSpeed: parseNumber(cell('completion_speed')),
            skillLabel: label,
        });
    } catch (error) {
        return error instanceof Error ? error.message : String(error);
    }
};

const readHistoryFile = (file: string, logger: Logger): PerformanceSample[] => {
    if (!fs.existsSync(file)) {
        return [];
    }

    let text: string;
    try {
        text = fs.readFileSync(file, 'utf8');
    } catch (error) {
        logger.warn('History file could not be read; starting from an empty history', {
            file,
            error: String(error),
        });
        return [];
    }

    const [first, ...body] = parseCsvLines(text);
    if (!first) {
        return [];
    }
    if ('error' in first) {
        logger.warn('History header could not be parsed; ignoring file contents', { file, reason: first.error });
        return [];
    }
    const header = first.row;
    const missing = HISTORY_COLUMNS.filter((column) => !header.includes(column));
    if (missing.length > 0) {
        logger.warn('History header is missing columns; ignoring file contents', { file, missing });
        return [];
    }

    const samples: PerformanceSample[] = [];
    for (const entry of body) {
        const parsed = 'error' in entry ? entry.error : rowToSample(entry.row, header);
        if (typeof parsed === 'string') {
            logger.warn('Skipping malformed history row', { file, row: entry.line, reason: parsed });
            continue;
        }
        samples.push(parsed);
    }
    return samples;
};

export const createHistoryStore = (config: StorageConfig, options: HistoryStoreOptions = {}): HistoryStore => {
    const logger = options.logger ?? rootLogger.child('storage:history');
    const samples: PerformanceSample[] = [...(options.initial ?? [])];

    if (config.kind === 'disk') {
        samples.push(...readHistoryFile(config.historyFile, logger));
        logger.info('History loaded', { file: config.historyFile, samples: samples.length });
    }

    const writeRow = (sample: PerformanceSample): void => {
        if (config.kind !== 'disk') {
            return;
        }
        try {
            fs.mkdirSync(path.dirname(config.historyFile), { recursive: true });
            const needsHeader = !fs.existsSync(config.historyFile) || fs.statSync(config.historyFile).size === 0;
            const prefix = needsHeader ? `${HEADER_LINE}\n` : '';
            fs.appendFileSync(config.historyFile, `${prefix}${sampleToRow(sample)}\n`, 'utf8');
        } catch (error) {
            logger.warn('Failed to persist history row; keeping it in memory', {
                file: config.historyFile,
                error: String(error),
            });
        }
    };

    return {
        samples: () => samples.slice(),
        length: () => samples.length,
        append: (sample) => {
            samples.push(sample);
            writeRow(sample);
        },
    };
};
