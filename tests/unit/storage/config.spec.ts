import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { diskStorageConfig, resolveStorageConfig } from 'storage/config';
import { recordingLogger, warningsOf } from './fixtures';

describe('resolveStorageConfig', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'leapwise-config-'));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('uses the preferred directory when it is writable', () => {
        const preferred = path.join(root, 'data');
        const { logger, entries } = recordingLogger();

        const config = resolveStorageConfig({ preferredDir: preferred, homeDir: root, logger });

        expect(config).toEqual({
            kind: 'disk',
            dataDir: preferred,
            historyFile: path.join(preferred, 'player_metrics.csv'),
            modelDir: path.join(preferred, 'models'),
        });
        expect(fs.existsSync(preferred)).toBe(true);
        expect(fs.readdirSync(preferred)).toEqual([]);
        expect(warningsOf(entries)).toEqual([]);
    });

    it('falls back to the home directory when the preferred one cannot be created', () => {
        const blocker = path.join(root, 'blocker');
        fs.writeFileSync(blocker, 'not a directory');
        const home = path.join(root, 'home');
        const { logger, entries } = recordingLogger();

        const config = resolveStorageConfig({ preferredDir: path.join(blocker, 'data'), homeDir: home, logger });

        expect(config).toEqual(diskStorageConfig(path.join(home, '.leapwise', 'data')));
        expect(warningsOf(entries)).toEqual(['Data directory is not writable, trying the next location']);
    });

    it('ends in memory when no directory is writable', () => {
        const blocker = path.join(root, 'blocker');
        fs.writeFileSync(blocker, 'not a directory');
        const { logger, entries } = recordingLogger();

        const config = resolveStorageConfig({ preferredDir: path.join(blocker, 'a'), homeDir: blocker, logger });

        expect(config).toEqual({ kind: 'memory' });
        expect(warningsOf(entries)).toHaveLength(3);
    });
});
