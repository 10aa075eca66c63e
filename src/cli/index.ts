import { isSkillLabel, type SkillLabel } from 'skill/labels';
import { diskStorageConfig, memoryStorageConfig, resolveStorageConfig, type StorageConfig } from 'storage/config';
import { createLineLogWriter, createLogger, parseLogLevel, type Logger } from 'util/log';
import { runSimulation, type SimulationInput } from './simulate';
import { runTraining, seedHistory } from './train';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

export interface CliOptions {
    /** Defaults to a logger writing one line per entry to stderr. */
    readonly logger?: Logger;
}

export const USAGE = 'Usage: leapwise <simulate|seed-history|train> [options]';

interface ParsedArgs {
    seed?: number;
    runs?: number;
    profile?: SkillLabel;
    maxLevels?: number;
    attemptCapSeconds?: number;
    perTier?: number;
    dataDir?: string;
    memory?: boolean;
    synthetic?: boolean;
    verbose?: boolean;
}

const INTEGER_FLAGS = {
    '--seed': 'seed',
    '--runs': 'runs',
    '--levels': 'maxLevels',
    '--cap': 'attemptCapSeconds',
    '--per-tier': 'perTier',
} as const satisfies Record<string, keyof ParsedArgs>;

const isIntegerFlag = (arg: string): arg is keyof typeof INTEGER_FLAGS => arg in INTEGER_FLAGS;

const parseArgs = (args: readonly string[]): ParsedArgs => {
    const options: ParsedArgs = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const value = i + 1 < args.length ? args[i + 1] : undefined;
        if (isIntegerFlag(arg) && value !== undefined) {
            const parsed = Number.parseInt(value, 10);
            if (!Number.isFinite(parsed)) {
                throw new Error(`${arg} expects an integer, received "${value}"`);
            }
            options[INTEGER_FLAGS[arg]] = parsed;
            i++;
        } else if (arg === '--profile' && value !== undefined) {
            if (!isSkillLabel(value)) {
                throw new Error(`--profile expects novice, intermediate or expert, received "${value}"`);
            }
            options.profile = value;
            i++;
        } else if (arg === '--data-dir' && value !== undefined) {
            options.dataDir = value;
            i++;
        } else if (arg === '--memory') {
            options.memory = true;
        } else if (arg === '--synthetic') {
            options.synthetic = true;
        } else if (arg === '--verbose') {
            options.verbose = true;
        }
    }
    return options;
};

const storageFor = (parsed: ParsedArgs, logger: Logger): StorageConfig => {
    if (parsed.memory) {
        return memoryStorageConfig();
    }
    if (parsed.dataDir) {
        return diskStorageConfig(parsed.dataDir);
    }
    return resolveStorageConfig({ logger: logger.child('storage') });
};

const stderrLogger = (verbose: boolean): Logger =>
    createLogger('cli', {
        writer: createLineLogWriter((line) => {
            process.stderr.write(`${line}\n`);
        }),
        minLevel: verbose ? 'debug' : (parseLogLevel(process.env.LEAPWISE_LOG_LEVEL) ?? 'warn'),
    });

export function createCli(options: CliOptions = {}): CliCommand {
    const execute = async (): Promise<number> => {
        const args = process.argv.slice(2);
        if (args.length === 0) {
            console.error(USAGE);
            return 1;
        }

        const command = args[0];
        let parsed: ParsedArgs;
        try {
            parsed = parseArgs(args.slice(1));
        } catch (error) {
            console.error(error instanceof Error ? error.message : String(error));
            console.error(USAGE);
            return 1;
        }
        const logger = options.logger ?? stderrLogger(parsed.verbose ?? false);

        if (command === 'simulate') {
            const input = {
                mode: 'simulate' as const,
                ...(parsed.seed !== undefined ? { seed: parsed.seed } : {}),
                ...(parsed.runs !== undefined ? { runs: parsed.runs } : {}),
                ...(parsed.profile ? { profile: parsed.profile } : {}),
                ...(parsed.maxLevels !== undefined ? { maxLevels: parsed.maxLevels } : {}),
                ...(parsed.attemptCapSeconds !== undefined ? { attemptCapSeconds: parsed.attemptCapSeconds } : {}),
                ...(parsed.dataDir && !parsed.memory ? { dataDir: parsed.dataDir } : {}),
            } satisfies SimulationInput;

            try {
                const result = await runSimulation(input, logger.child('simulate'));
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Simulation failed: ${error instanceof Error ? error.message : String(error)}`);
                return 1;
            }
        }

        if (command === 'seed-history') {
            try {
                const result = await seedHistory(
                    { storage: storageFor(parsed, logger), seed: parsed.seed, perTier: parsed.perTier },
                    logger.child('seed-history'),
                );
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Seeding history failed: ${error instanceof Error ? error.message : String(error)}`);
                return 1;
            }
        }

        if (command === 'train') {
            try {
                const result = await runTraining(
                    { storage: storageFor(parsed, logger), synthetic: parsed.synthetic, seed: parsed.seed },
                    logger.child('train'),
                );
                console.log(JSON.stringify(result));
                return result.ok ? 0 : 2;
            } catch (error) {
                console.error(`Training failed: ${error instanceof Error ? error.message : String(error)}`);
                return 1;
            }
        }

        console.error(USAGE);
        return 1;
    };

    return {
        execute,
    };
}
