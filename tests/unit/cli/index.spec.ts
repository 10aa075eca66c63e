import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('cli/simulate', () => ({
    runSimulation: vi.fn(),
}));

vi.mock('cli/train', () => ({
    runTraining: vi.fn(),
    seedHistory: vi.fn(),
}));

import { createCli, USAGE } from 'cli/index';
import { runSimulation, type SimulationResult } from 'cli/simulate';
import { runTraining, seedHistory, type TrainResult } from 'cli/train';
import { createLogger } from 'util/log';

const originalArgv = [...process.argv];
const logger = createLogger('cli-test', { writer: () => undefined });

const setArgv = (...args: string[]) => {
    process.argv = ['node', 'leapwise', ...args];
};

beforeEach(() => {
    vi.clearAllMocks();
    process.argv = [...originalArgv];
});

afterEach(() => {
    process.argv = [...originalArgv];
    vi.restoreAllMocks();
});

describe('createCli', () => {
    it('prints usage when no command is given', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        setArgv();

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(1);
        expect(runSimulation).not.toHaveBeenCalled();
        expect(errorSpy).toHaveBeenCalledWith('Usage: leapwise <simulate|seed-history|train> [options]');
    });

    it('runs the simulation and prints its summary', async () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const result: SimulationResult = {
            ok: true,
            seed: 24,
            profile: 'expert',
            runCount: 3,
            averageScore: 1210,
            bestScore: 1630,
            completedRuns: 1,
            historySize: 8,
            modelTrained: false,
            runs: [],
        };
        vi.mocked(runSimulation).mockResolvedValue(result);
        setArgv('simulate', '--seed', '24', '--runs', '3', '--profile', 'expert', '--levels', '2', '--cap', '30');

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(0);
        expect(runSimulation).toHaveBeenCalledWith(
            {
                mode: 'simulate',
                seed: 24,
                runs: 3,
                profile: 'expert',
                maxLevels: 2,
                attemptCapSeconds: 30,
            },
            expect.anything(),
        );
        expect(logSpy).toHaveBeenCalledWith(JSON.stringify(result));
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('returns an error code when the simulation throws', async () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.mocked(runSimulation).mockRejectedValue(new Error('boom'));
        setArgv('simulate');

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(1);
        expect(runSimulation).toHaveBeenCalledWith({ mode: 'simulate' }, expect.anything());
        expect(errorSpy).toHaveBeenCalledWith('Simulation failed: boom');
        expect(logSpy).not.toHaveBeenCalled();
    });

    it('rejects an unknown profile before running anything', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        setArgv('simulate', '--profile', 'wizard');

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(1);
        expect(runSimulation).not.toHaveBeenCalled();
        expect(errorSpy).toHaveBeenNthCalledWith(
            1,
            '--profile expects novice, intermediate or expert, received "wizard"',
        );
        expect(errorSpy).toHaveBeenNthCalledWith(2, USAGE);
    });

    it('rejects a non-numeric seed', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        setArgv('train', '--seed', 'abc');

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(1);
        expect(runTraining).not.toHaveBeenCalled();
        expect(errorSpy).toHaveBeenNthCalledWith(1, '--seed expects an integer, received "abc"');
    });

    it('seeds history into in-memory storage when asked to', async () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.mocked(seedHistory).mockResolvedValue({ ok: true, appended: 45, historySize: 45 });
        setArgv('seed-history', '--memory', '--seed', '9', '--per-tier', '5');

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(0);
        expect(seedHistory).toHaveBeenCalledWith({ storage: { kind: 'memory' }, seed: 9, perTier: 5 }, expect.anything());
        expect(logSpy).toHaveBeenCalledWith('{"ok":true,"appended":45,"historySize":45}');
    });

    it('exits with code 2 when training has too few samples', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const result: TrainResult = {
            ok: false,
            samples: 4,
            distribution: { novice: 1, intermediate: 2, expert: 1 },
            report: null,
            probes: {
                struggling: { label: 'novice', probabilities: null, source: 'heuristic' },
                fluent: { label: 'expert', probabilities: null, source: 'heuristic' },
            },
        };
        vi.mocked(runTraining).mockResolvedValue(result);
        setArgv('train', '--memory', '--synthetic');

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(2);
        expect(runTraining).toHaveBeenCalledWith(
            { storage: { kind: 'memory' }, synthetic: true, seed: undefined },
            expect.anything(),
        );
    });

    it('prints usage for an unknown command', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        setArgv('tune');

        const exitCode = await createCli({ logger }).execute();

        expect(exitCode).toBe(1);
        expect(errorSpy).toHaveBeenCalledWith(USAGE);
    });
});
