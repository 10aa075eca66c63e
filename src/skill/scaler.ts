import type { FeatureRow } from 'skill/features';

export interface FeatureScaler {
    readonly means: readonly number[];
    readonly scales: readonly number[];
}

/** Z-score parameters over the given rows. Population variance; zero variance scales by 1. */
export const fitScaler = (rows: readonly FeatureRow[]): FeatureScaler => {
    if (rows.length === 0) {
        throw new RangeError('Cannot fit a scaler on zero rows');
    }

    const width = rows[0].length;
    const means = new Array<number>(width).fill(0);
    const scales = new Array<number>(width).fill(0);

    for (const row of rows) {
        for (let column = 0; column < width; column += 1) {
            means[column] += row[column] / rows.length;
        }
    }

    for (const row of rows) {
        for (let column = 0; column < width; column += 1) {
            const delta = row[column] - means[column];
            scales[column] += (delta * delta) / rows.length;
        }
    }

    return {
        means,
        scales: scales.map((variance) => {
            const deviation = Math.sqrt(variance);
            return deviation > 0 ? deviation : 1;
        }),
    };
};

export const transformRow = (scaler: FeatureScaler, row: FeatureRow): number[] => {
    if (row.length !== scaler.means.length) {
        throw new RangeError(`Expected ${scaler.means.length} features, received ${row.length}`);
    }
    return row.map((value, column) => (value - scaler.means[column]) / scaler.scales[column]);
};
