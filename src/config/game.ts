import type { SkillLabel } from 'skill/labels';

export interface NumericRange {
    readonly min: number;
    readonly max: number;
}

export interface DifficultyFields {
    readonly enemySpeedMultiplier: number;
    readonly enemySpawnRate: number;
    readonly platformGapMultiplier: number;
    readonly coinFrequency: number;
    readonly trapDensity: number;
    readonly checkpointFrequency: number;
}

interface DifficultyScalingConfig {
    readonly perLevel: number;
    readonly maxScaling: number;
    readonly maxTrapDensity: number;
    readonly minCheckpointFrequency: number;
    readonly smoothingRatePerSecond: number;
}

interface TrainingConfig {
    readonly minSamples: number;
    readonly retrainInterval: number;
    readonly holdoutThreshold: number;
    readonly holdoutFraction: number;
    readonly trees: number;
    readonly maxDepth: number;
    readonly minSamplesSplit: number;
    readonly seed: number;
}

interface StairsChunkConfig {
    readonly steps: NumericRange;
    readonly width: NumericRange;
    readonly rise: NumericRange;
    readonly spacing: number;
    readonly coinChance: number;
    readonly enemyChance: number;
}

interface GapsChunkConfig {
    readonly platforms: NumericRange;
    readonly width: NumericRange;
    readonly gap: NumericRange;
    readonly coinLift: number;
}

interface FloatingChunkConfig {
    readonly platforms: NumericRange;
    readonly width: NumericRange;
    readonly offset: NumericRange;
    readonly spacing: NumericRange;
    readonly coinLift: number;
}

interface GroundChunkConfig {
    readonly length: NumericRange;
    readonly trailingGap: number;
    readonly coinSpacing: number;
    readonly enemySpacing: number;
    readonly edgeInset: number;
    readonly enemyInset: number;
}

export interface GameConfig {
    readonly difficulty: {
        readonly tiers: Readonly<Record<SkillLabel, DifficultyFields>>;
        readonly defaultTier: SkillLabel;
        readonly scaling: DifficultyScalingConfig;
    };
    readonly training: TrainingConfig;
    readonly telemetry: {
        readonly preciseLandingEdge: number;
    };
    readonly levels: {
        readonly tutorialThreshold: number;
        readonly baseChunks: number;
        readonly width: number;
        readonly height: number;
        readonly widthPadding: number;
        readonly safeBand: NumericRange;
        readonly platformThickness: number;
        readonly groundThickness: number;
        readonly startPlatform: { readonly x: number; readonly y: number; readonly width: number };
        readonly spawnPlatform: { readonly x: number; readonly y: number; readonly width: number };
        readonly cursorStart: { readonly x: number; readonly y: number };
        readonly coin: { readonly size: number; readonly lift: number };
        readonly enemy: { readonly size: number; readonly baseSpeed: number; readonly patrol: number };
        readonly goal: {
            readonly width: number;
            readonly height: number;
            readonly backoff: number;
            readonly lift: number;
            readonly padWidth: number;
            readonly padLead: number;
        };
        readonly chunks: {
            readonly stairs: StairsChunkConfig;
            readonly gaps: GapsChunkConfig;
            readonly floating: FloatingChunkConfig;
            readonly ground: GroundChunkConfig;
        };
    };
    readonly session: {
        readonly maxLevels: number;
        readonly startingLives: number;
        readonly maxNameLength: number;
        readonly levelCompleteDelaySeconds: number;
    };
    readonly scoring: {
        readonly coin: number;
        readonly enemy: number;
        readonly levelClear: number;
    };
    readonly player: {
        readonly width: number;
        readonly height: number;
        readonly acceleration: number;
        readonly maxSpeed: number;
        readonly jumpPower: number;
        readonly stompBounce: number;
    };
    readonly physics: {
        readonly gravityPerFrame: number;
        readonly stepMs: number;
        readonly fallMargin: number;
        readonly groundTolerance: number;
    };
    readonly storage: {
        readonly dataDir: string;
        readonly fallbackDirName: string;
        readonly historyFile: string;
        readonly modelDir: string;
        readonly forestFile: string;
        readonly scalerFile: string;
    };
}

/**
 * Static tuning for the difficulty loop. Values are read once; components take partial overrides
 * through their options instead of mutating this object.
 */
export const gameConfig = {
    difficulty: {
        tiers: {
            novice: {
                enemySpeedMultiplier: 0.6,
                enemySpawnRate: 0.5,
                platformGapMultiplier: 0.7,
                coinFrequency: 1.5,
                trapDensity: 0.3,
                checkpointFrequency: 1.5,
            },
            intermediate: {
                enemySpeedMultiplier: 1,
                enemySpawnRate: 1,
                platformGapMultiplier: 1,
                coinFrequency: 1,
                trapDensity: 0.6,
                checkpointFrequency: 1,
            },
            expert: {
                enemySpeedMultiplier: 1.5,
                enemySpawnRate: 1.5,
                platformGapMultiplier: 1.3,
                coinFrequency: 0.7,
                trapDensity: 1,
                checkpointFrequency: 0.7,
            },
        },
        defaultTier: 'intermediate',
        scaling: {
            perLevel: 0.05,
            maxScaling: 1.5,
            maxTrapDensity: 1.5,
            minCheckpointFrequency: 0.5,
            smoothingRatePerSecond: 0.5,
        },
    },
    training: {
        minSamples: 10,
        retrainInterval: 5,
        holdoutThreshold: 20,
        holdoutFraction: 0.2,
        trees: 100,
        maxDepth: 10,
        minSamplesSplit: 2,
        seed: 42,
    },
    telemetry: {
        preciseLandingEdge: 20,
    },
    levels: {
        tutorialThreshold: 3,
        baseChunks: 8,
        width: 5000,
        height: 720,
        widthPadding: 200,
        safeBand: { min: 300, max: 650 },
        platformThickness: 20,
        groundThickness: 70,
        startPlatform: { x: 0, y: 650, width: 300 },
        spawnPlatform: { x: 50, y: 520, width: 200 },
        cursorStart: { x: 350, y: 650 },
        coin: { size: 20, lift: 50 },
        enemy: { size: 32, baseSpeed: 2, patrol: 90 },
        goal: { width: 50, height: 100, backoff: 100, lift: 100, padWidth: 250, padLead: 100 },
        chunks: {
            stairs: {
                steps: { min: 3, max: 6 },
                width: { min: 100, max: 150 },
                rise: { min: 40, max: 70 },
                spacing: 50,
                coinChance: 0.8,
                enemyChance: 0.3,
            },
            gaps: {
                platforms: { min: 4, max: 7 },
                width: { min: 80, max: 130 },
                gap: { min: 120, max: 200 },
                coinLift: 80,
            },
            floating: {
                platforms: { min: 3, max: 6 },
                width: { min: 90, max: 140 },
                offset: { min: -150, max: 50 },
                spacing: { min: 100, max: 180 },
                coinLift: 40,
            },
            ground: {
                length: { min: 400, max: 800 },
                trailingGap: 100,
                coinSpacing: 100,
                enemySpacing: 300,
                edgeInset: 50,
                enemyInset: 100,
            },
        },
    },
    session: {
        maxLevels: 5,
        startingLives: 3,
        maxNameLength: 16,
        levelCompleteDelaySeconds: 3,
    },
    scoring: {
        coin: 10,
        enemy: 50,
        levelClear: 500,
    },
    player: {
        width: 48,
        height: 64,
        acceleration: 0.6,
        maxSpeed: 12,
        jumpPower: 16,
        stompBounce: 0.6,
    },
    physics: {
        gravityPerFrame: 0.8,
        stepMs: 1000 / 60,
        fallMargin: 100,
        groundTolerance: 3,
    },
    storage: {
        dataDir: 'data',
        fallbackDirName: '.leapwise',
        historyFile: 'player_metrics.csv',
        modelDir: 'models',
        forestFile: 'skill-forest.json',
        scalerFile: 'feature-scaler.json',
    },
} as const satisfies GameConfig;
