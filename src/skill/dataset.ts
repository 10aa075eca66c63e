import { SKILL_LABELS, type SkillLabel } from 'skill/labels';
import { shuffled, type RandomSource } from 'util/random';

export interface DatasetSplit<T> {
    readonly train: readonly T[];
    readonly test: readonly T[];
}

/**
 * Per-label holdout of round(count * fraction) items, so every label keeps its
 * share on both sides. Labels with a single item stay entirely in training.
 */
export const stratifiedSplit = <T>(
    items: readonly T[],
    labelOf: (item: T) => SkillLabel,
    fraction: number,
    random: RandomSource,
): DatasetSplit<T> => {
    if (!(fraction > 0 && fraction < 1)) {
        throw new RangeError(`Holdout fraction must be inside (0, 1), received ${fraction}`);
    }

    const train: T[] = [];
    const test: T[] = [];

    for (const label of SKILL_LABELS) {
        const group = shuffled(
            random,
            items.filter((item) => labelOf(item) === label),
        );
        const holdout = group.length > 1 ? Math.min(group.length - 1, Math.round(group.length * fraction)) : 0;
        test.push(...group.slice(0, holdout));
        train.push(...group.slice(holdout));
    }

    return { train, test };
};

export type ConfusionMatrix = Readonly<Record<SkillLabel, Readonly<Record<SkillLabel, number>>>>;

export interface Evaluation {
    readonly accuracy: number;
    /** Rows are actual labels, columns predicted. */
    readonly confusion: ConfusionMatrix;
    readonly total: number;
}

const emptyRow = (): Record<SkillLabel, number> => ({ novice: 0, intermediate: 0, expert: 0 });

export const evaluate = <T>(
    items: readonly T[],
    labelOf: (item: T) => SkillLabel,
    predict: (item: T) => SkillLabel,
): Evaluation => {
    const confusion: Record<SkillLabel, Record<SkillLabel, number>> = {
        novice: emptyRow(),
        intermediate: emptyRow(),
        expert: emptyRow(),
    };

    let correct = 0;
    for (const item of items) {
        const actual = labelOf(item);
        const predicted = predict(item);
        confusion[actual][predicted] += 1;
        if (actual === predicted) {
            correct += 1;
        }
    }

    return {
        accuracy: items.length > 0 ? correct / items.length : 0,
        confusion,
        total: items.length,
    };
};
