import fs from 'node:fs';
import path from 'node:path';

import { gameConfig } from 'config/game';
import { fromArtifacts, toArtifacts, type ModelArtifacts, type SkillModel } from 'skill/model';
import { rootLogger, type Logger } from 'util/log';
import type { StorageConfig } from './config';

export interface ModelStore {
    /** Null when nothing is stored or the stored pair is unusable. */
    readonly load: () => SkillModel | null;
    readonly save: (model: SkillModel) => boolean;
}

export interface ModelStoreOptions {
    readonly logger?: Logger;
}

const writeJsonAtomic = (file: string, value: unknown): void => {
    const temporary = `${file}.tmp`;
    fs.writeFileSync(temporary, `${JSON.stringify(value)}\n`, 'utf8');
    fs.renameSync(temporary, file);
};

const readJson = (file: string): unknown => JSON.parse(fs.readFileSync(file, 'utf8'));

const createMemoryModelStore = (): ModelStore => {
    let stored: string | null = null;
    return {
        load: () => {
            if (stored === null) {
                return null;
            }
            const artifacts: unknown = JSON.parse(stored);
            if (typeof artifacts !== 'object' || artifacts === null || !('forest' in artifacts) || !('scaler' in artifacts)) {
                return null;
            }
            return fromArtifacts(artifacts.forest, artifacts.scaler);
        },
        save: (model) => {
            const artifacts: ModelArtifacts = toArtifacts(model);
            stored = JSON.stringify(artifacts);
            return true;
        },
    };
};

export const createModelStore = (config: StorageConfig, options: ModelStoreOptions = {}): ModelStore => {
    if (config.kind === 'memory') {
        return createMemoryModelStore();
    }

    const logger = options.logger ?? rootLogger.child('storage:models');
    const forestFile = path.join(config.modelDir, gameConfig.storage.forestFile);
    const scalerFile = path.join(config.modelDir, gameConfig.storage.scalerFile);

    const load: ModelStore['load'] = () => {
        if (!fs.existsSync(forestFile) || !fs.existsSync(scalerFile)) {
            logger.debug('No stored model found', { modelDir: config.modelDir });
            return null;
        }

        try {
            const model = fromArtifacts(readJson(forestFile), readJson(scalerFile));
            if (!model) {
                logger.warn('Stored model is incompatible; starting untrained', { modelDir: config.modelDir });
            }
            return model;
        } catch (error) {
            logger.warn('Stored model could not be read; starting untrained', {
                modelDir: config.modelDir,
                error: String(error),
            });
            return null;
        }
    };

    const save: ModelStore['save'] = (model) => {
        const artifacts = toArtifacts(model);
        try {
            fs.mkdirSync(config.modelDir, { recursive: true });
            writeJsonAtomic(scalerFile, artifacts.scaler);
            writeJsonAtomic(forestFile, artifacts.forest);
            return true;
        } catch (error) {
            logger.warn('Failed to persist model; it stays active in memory only', {
                modelDir: config.modelDir,
                error: String(error),
            });
            return false;
        }
    };

    return { load, save };
};
