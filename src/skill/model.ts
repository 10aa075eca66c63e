import { FEATURE_NAMES } from 'skill/features';
import type { SkillForest, TreeNode } from 'skill/forest';
import { SKILL_LABELS } from 'skill/labels';
import type { FeatureScaler } from 'skill/scaler';

export const MODEL_FORMAT_VERSION = 1;

export interface SkillModel {
    readonly forest: SkillForest;
    readonly scaler: FeatureScaler;
    readonly trainedAt: string;
    readonly sampleCount: number;
    /** Holdout accuracy; null when the model was fit on every sample. */
    readonly accuracy: number | null;
}

export interface ForestArtifact {
    readonly version: number;
    readonly features: readonly string[];
    readonly labels: readonly string[];
    readonly trainedAt: string;
    readonly sampleCount: number;
    readonly accuracy: number | null;
    readonly importances: readonly number[];
    readonly trees: readonly TreeNode[];
}

export interface ScalerArtifact {
    readonly version: number;
    readonly features: readonly string[];
    readonly means: readonly number[];
    readonly scales: readonly number[];
}

export interface ModelArtifacts {
    readonly forest: ForestArtifact;
    readonly scaler: ScalerArtifact;
}

export const toArtifacts = (model: SkillModel): ModelArtifacts => ({
    forest: {
        version: MODEL_FORMAT_VERSION,
        features: FEATURE_NAMES,
        labels: SKILL_LABELS,
        trainedAt: model.trainedAt,
        sampleCount: model.sampleCount,
        accuracy: model.accuracy,
        importances: model.forest.importances,
        trees: model.forest.trees,
    },
    scaler: {
        version: MODEL_FORMAT_VERSION,
        features: FEATURE_NAMES,
        means: model.scaler.means,
        scales: model.scaler.scales,
    },
});

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const isNumberList = (value: unknown, length: number): value is number[] => {
    return Array.isArray(value) && value.length === length && value.every(isFiniteNumber);
};

const sameList = (value: unknown, expected: readonly string[]): boolean => {
    return (
        Array.isArray(value) &&
        value.length === expected.length &&
        value.every((entry, index) => entry === expected[index])
    );
};

const parseTree = (value: unknown, depth: number): TreeNode | null => {
    if (!isRecord(value) || depth > 64) {
        return null;
    }
    if (value.kind === 'leaf') {
        return isNumberList(value.distribution, SKILL_LABELS.length)
            ? { kind: 'leaf', distribution: value.distribution }
            : null;
    }
    if (value.kind !== 'split') {
        return null;
    }
    const { feature, threshold } = value;
    if (!isFiniteNumber(feature) || !Number.isInteger(feature) || feature < 0 || feature >= FEATURE_NAMES.length) {
        return null;
    }
    if (!isFiniteNumber(threshold)) {
        return null;
    }
    const left = parseTree(value.left, depth + 1);
    const right = parseTree(value.right, depth + 1);
    if (!left || !right) {
        return null;
    }
    return { kind: 'split', feature, threshold, left, right };
};

/**
 * Rebuilds a model from both artifact payloads. Returns null when either one is
 * from another format version, has a different feature order, or is malformed.
 */
export const fromArtifacts = (forestValue: unknown, scalerValue: unknown): SkillModel | null => {
    if (!isRecord(forestValue) || !isRecord(scalerValue)) {
        return null;
    }
    if (forestValue.version !== MODEL_FORMAT_VERSION || scalerValue.version !== MODEL_FORMAT_VERSION) {
        return null;
    }
    if (!sameList(forestValue.features, FEATURE_NAMES) || !sameList(scalerValue.features, FEATURE_NAMES)) {
        return null;
    }
    if (!sameList(forestValue.labels, SKILL_LABELS)) {
        return null;
    }

    const { means, scales } = scalerValue;
    if (!isNumberList(means, FEATURE_NAMES.length) || !isNumberList(scales, FEATURE_NAMES.length)) {
        return null;
    }
    if (scales.some((scale) => scale <= 0)) {
        return null;
    }

    const { trainedAt, sampleCount, accuracy, importances, trees } = forestValue;
    if (typeof trainedAt !== 'string' || !isFiniteNumber(sampleCount)) {
        return null;
    }
    const parsedAccuracy = accuracy === null ? null : isFiniteNumber(accuracy) ? accuracy : undefined;
    if (parsedAccuracy === undefined) {
        return null;
    }
    if (!isNumberList(importances, FEATURE_NAMES.length) || !Array.isArray(trees) || trees.length === 0) {
        return null;
    }

    const parsedTrees: TreeNode[] = [];
    for (const tree of trees) {
        const parsed = parseTree(tree, 0);
        if (!parsed) {
            return null;
        }
        parsedTrees.push(parsed);
    }

    return {
        forest: { trees: parsedTrees, featureCount: FEATURE_NAMES.length, importances },
        scaler: { means, scales },
        trainedAt,
        sampleCount,
        accuracy: parsedAccuracy,
    };
};
