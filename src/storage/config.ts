import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { gameConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';

export type StorageConfig =
    | {
          readonly kind: 'disk';
          readonly dataDir: string;
          readonly historyFile: string;
          readonly modelDir: string;
      }
    | { readonly kind: 'memory' };

export interface ResolveStorageOptions {
    /** Defaults to `data` under the working directory. */
    readonly preferredDir?: string;
    readonly homeDir?: string;
    readonly logger?: Logger;
}

export const memoryStorageConfig = (): StorageConfig => Object.freeze({ kind: 'memory' });

export const diskStorageConfig = (dataDir: string): StorageConfig => {
    const resolved = path.resolve(dataDir);
    return Object.freeze({
        kind: 'disk',
        dataDir: resolved,
        historyFile: path.join(resolved, gameConfig.storage.historyFile),
        modelDir: path.join(resolved, gameConfig.storage.modelDir),
    });
};

const probeWritable = (dir: string): void => {
    fs.mkdirSync(dir, { recursive: true });
    const probe = path.join(dir, `.write-probe-${process.pid}`);
    fs.writeFileSync(probe, '');
    fs.rmSync(probe, { force: true });
};

/**
 * Picks the first writable data directory: the preferred one, then
 * `~/.leapwise/data`, then an in-memory configuration.
 */
export const resolveStorageConfig = (options: ResolveStorageOptions = {}): StorageConfig => {
    const logger = options.logger ?? rootLogger.child('storage');
    const candidates = [
        options.preferredDir ?? path.resolve(gameConfig.storage.dataDir),
        path.join(options.homeDir ?? os.homedir(), gameConfig.storage.fallbackDirName, gameConfig.storage.dataDir),
    ];

    for (const candidate of candidates) {
        try {
            probeWritable(candidate);
            return diskStorageConfig(candidate);
        } catch (error) {
            logger.warn('Data directory is not writable, trying the next location', {
                dir: candidate,
                error: String(error),
            });
        }
    }

    logger.warn('No writable data directory found; history and models will not persist');
    return memoryStorageConfig();
};
