import { SKILL_LABELS, type SkillLabel } from 'skill/labels';
import type { FeatureRow } from 'skill/features';
import { mulberry32, randomInt, shuffled, type RandomSource } from 'util/random';

/** Per-class weight shares, indexed like SKILL_LABELS. */
export type ClassDistribution = readonly number[];

export type TreeNode =
    | { readonly kind: 'leaf'; readonly distribution: ClassDistribution }
    | {
          readonly kind: 'split';
          readonly feature: number;
          readonly threshold: number;
          readonly left: TreeNode;
          readonly right: TreeNode;
      };

export interface SkillForest {
    readonly trees: readonly TreeNode[];
    readonly featureCount: number;
    /** Weighted impurity decrease per feature, normalized to sum 1. */
    readonly importances: readonly number[];
}

export interface ForestOptions {
    readonly trees: number;
    readonly maxDepth: number;
    readonly minSamplesSplit: number;
    readonly seed: number;
    /** Candidate features per split; defaults to floor(sqrt(featureCount)). */
    readonly maxFeatures?: number;
}

export interface LabeledRow {
    readonly features: FeatureRow;
    readonly label: SkillLabel;
}

export type LabelProbabilities = Readonly<Record<SkillLabel, number>>;

interface WeightedRow {
    readonly features: FeatureRow;
    readonly classIndex: number;
    readonly weight: number;
}

interface SplitCandidate {
    readonly feature: number;
    readonly threshold: number;
    readonly left: WeightedRow[];
    readonly right: WeightedRow[];
    readonly childImpurity: number;
}

const CLASS_COUNT = SKILL_LABELS.length;

const classIndexOf = (label: SkillLabel): number => SKILL_LABELS.indexOf(label);

/** Balanced weights n / (k * n_c) over the classes present in the rows. */
export const balancedClassWeights = (labels: readonly SkillLabel[]): number[] => {
    const counts = new Array<number>(CLASS_COUNT).fill(0);
    for (const label of labels) {
        counts[classIndexOf(label)] += 1;
    }
    const present = counts.filter((count) => count > 0).length;
    return counts.map((count) => (count > 0 ? labels.length / (present * count) : 0));
};

const weightTotals = (rows: readonly WeightedRow[]): number[] => {
    const totals = new Array<number>(CLASS_COUNT).fill(0);
    for (const row of rows) {
        totals[row.classIndex] += row.weight;
    }
    return totals;
};

const sum = (values: readonly number[]): number => values.reduce((total, value) => total + value, 0);

export const giniImpurity = (totals: readonly number[]): number => {
    const total = sum(totals);
    if (total <= 0) {
        return 0;
    }
    let impurity = 1;
    for (const value of totals) {
        const share = value / total;
        impurity -= share * share;
    }
    return impurity;
};

const toLeaf = (rows: readonly WeightedRow[]): TreeNode => {
    const totals = weightTotals(rows);
    const total = sum(totals);
    return {
        kind: 'leaf',
        distribution: totals.map((value) => (total > 0 ? value / total : 1 / CLASS_COUNT)),
    };
};

const findBestSplit = (
    rows: readonly WeightedRow[],
    features: readonly number[],
    parentImpurity: number,
): SplitCandidate | null => {
    const parentWeight = sum(weightTotals(rows));
    let best: SplitCandidate | null = null;

    for (const feature of features) {
        const ordered = [...rows].sort((a, b) => a.features[feature] - b.features[feature]);
        const leftTotals = new Array<number>(CLASS_COUNT).fill(0);
        const rightTotals = weightTotals(ordered);

        for (let index = 0; index < ordered.length - 1; index += 1) {
            const row = ordered[index];
            leftTotals[row.classIndex] += row.weight;
            rightTotals[row.classIndex] -= row.weight;

            const current = row.features[feature];
            const next = ordered[index + 1].features[feature];
            if (current === next) {
                continue;
            }

            const leftWeight = sum(leftTotals);
            const rightWeight = parentWeight - leftWeight;
            const childImpurity =
                (leftWeight / parentWeight) * giniImpurity(leftTotals) +
                (rightWeight / parentWeight) * giniImpurity(rightTotals);

            if (childImpurity < parentImpurity && (best === null || childImpurity < best.childImpurity)) {
                best = {
                    feature,
                    threshold: (current + next) / 2,
                    left: ordered.slice(0, index + 1),
                    right: ordered.slice(index + 1),
                    childImpurity,
                };
            }
        }
    }

    return best;
};

interface TreeBuildContext {
    readonly options: ForestOptions;
    readonly random: RandomSource;
    readonly featureCount: number;
    readonly maxFeatures: number;
    readonly importances: number[];
    readonly rootWeight: number;
}

const buildTree = (rows: readonly WeightedRow[], depth: number, context: TreeBuildContext): TreeNode => {
    const totals = weightTotals(rows);
    const impurity = giniImpurity(totals);

    if (depth >= context.options.maxDepth || rows.length < context.options.minSamplesSplit || impurity === 0) {
        return toLeaf(rows);
    }

    const allFeatures = Array.from({ length: context.featureCount }, (_, index) => index);
    const candidates = shuffled(context.random, allFeatures).slice(0, context.maxFeatures);
    const split = findBestSplit(rows, candidates, impurity);
    if (!split) {
        return toLeaf(rows);
    }

    const nodeWeight = sum(totals);
    context.importances[split.feature] += (nodeWeight / context.rootWeight) * (impurity - split.childImpurity);

    return {
        kind: 'split',
        feature: split.feature,
        threshold: split.threshold,
        left: buildTree(split.left, depth + 1, context),
        right: buildTree(split.right, depth + 1, context),
    };
};

const bootstrap = (rows: readonly WeightedRow[], random: RandomSource): WeightedRow[] => {
    return Array.from({ length: rows.length }, () => rows[randomInt(random, 0, rows.length - 1)]);
};

export const trainForest = (examples: readonly LabeledRow[], options: ForestOptions): SkillForest => {
    if (examples.length === 0) {
        throw new RangeError('Cannot train a forest on zero rows');
    }

    const featureCount = examples[0].features.length;
    const maxFeatures = Math.max(1, Math.min(featureCount, options.maxFeatures ?? Math.floor(Math.sqrt(featureCount))));
    const classWeights = balancedClassWeights(examples.map((example) => example.label));
    const rows: WeightedRow[] = examples.map((example) => {
        const classIndex = classIndexOf(example.label);
        return { features: example.features, classIndex, weight: classWeights[classIndex] };
    });

    const random = mulberry32(options.seed);
    const importances = new Array<number>(featureCount).fill(0);
    const trees: TreeNode[] = [];

    for (let index = 0; index < options.trees; index += 1) {
        const sample = bootstrap(rows, random);
        const treeImportances = new Array<number>(featureCount).fill(0);
        trees.push(
            buildTree(sample, 0, {
                options,
                random,
                featureCount,
                maxFeatures,
                importances: treeImportances,
                rootWeight: sum(weightTotals(sample)),
            }),
        );

        const treeTotal = sum(treeImportances);
        if (treeTotal > 0) {
            treeImportances.forEach((value, feature) => {
                importances[feature] += value / treeTotal;
            });
        }
    }

    const importanceTotal = sum(importances);
    return {
        trees,
        featureCount,
        importances: importances.map((value) => (importanceTotal > 0 ? value / importanceTotal : 0)),
    };
};

const leafFor = (node: TreeNode, row: FeatureRow): ClassDistribution => {
    let current = node;
    while (current.kind === 'split') {
        current = row[current.feature] <= current.threshold ? current.left : current.right;
    }
    return current.distribution;
};

export const predictProbabilities = (forest: SkillForest, row: FeatureRow): LabelProbabilities => {
    if (row.length !== forest.featureCount) {
        throw new RangeError(`Expected ${forest.featureCount} features, received ${row.length}`);
    }
    if (forest.trees.length === 0) {
        throw new RangeError('Forest has no trees');
    }

    const totals = new Array<number>(CLASS_COUNT).fill(0);
    for (const tree of forest.trees) {
        leafFor(tree, row).forEach((share, classIndex) => {
            totals[classIndex] += share / forest.trees.length;
        });
    }

    return {
        novice: totals[0],
        intermediate: totals[1],
        expert: totals[2],
    };
};

/** Highest probability wins; ties go to the easier label. */
export const mostLikelyLabel = (probabilities: LabelProbabilities): SkillLabel => {
    let best: SkillLabel = SKILL_LABELS[0];
    for (const label of SKILL_LABELS) {
        if (probabilities[label] > probabilities[best]) {
            best = label;
        }
    }
    return best;
};
