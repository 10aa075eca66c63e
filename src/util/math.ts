export const clamp = (value: number, min: number, max: number): number => {
    if (Number.isNaN(value)) {
        return min;
    }
    if (min > max) {
        return clamp(value, max, min);
    }
    if (value < min) {
        return min;
    }
    if (value > max) {
        return max;
    }
    return value;
};

export const lerp = (start: number, end: number, alpha: number): number => {
    return start + (end - start) * alpha;
};

export const finiteOrZero = (value: number | undefined | null): number => {
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
};

export const roundTo = (value: number, decimals: number): number => {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
};

export interface Rect {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

/** Edge contact counts as touching, so a body resting on a platform top touches it. */
export const rectsTouch = (a: Rect, b: Rect): boolean => {
    return a.x <= b.x + b.width && a.x + a.width >= b.x && a.y <= b.y + b.height && a.y + a.height >= b.y;
};

export const rectsOverlap = (a: Rect, b: Rect): boolean => {
    return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
};
