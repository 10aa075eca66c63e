export type RandomSource = () => number;

const DEFAULT_SEED = 1;

export const normalizeSeed = (seed: number): number => {
    if (!Number.isFinite(seed)) {
        return DEFAULT_SEED;
    }

    const normalized = seed >>> 0;
    return normalized === 0 ? DEFAULT_SEED : normalized;
};

/** Small 32-bit generator; every seeded stream in the game goes through it. */
export const mulberry32 = (seed: number): RandomSource => {
    let state = normalizeSeed(seed);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

/** Inclusive integer in [min, max]. */
export const randomInt = (random: RandomSource, min: number, max: number): number => {
    const low = Math.ceil(Math.min(min, max));
    const high = Math.floor(Math.max(min, max));
    return low + Math.floor(random() * (high - low + 1));
};

/** Uniform real in [min, max). */
export const randomBetween = (random: RandomSource, min: number, max: number): number => {
    return min + random() * (max - min);
};

export const pickOne = <T>(random: RandomSource, items: readonly T[]): T => {
    if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
    }
    const index = Math.min(items.length - 1, Math.floor(random() * items.length));
    return items[index];
};

/** Fisher-Yates over a copy; the input is left untouched. */
export const shuffled = <T>(random: RandomSource, items: readonly T[]): T[] => {
    const copy = [...items];
    for (let index = copy.length - 1; index > 0; index -= 1) {
        const swap = Math.floor(random() * (index + 1));
        const held = copy[index];
        copy[index] = copy[swap];
        copy[swap] = held;
    }
    return copy;
};
