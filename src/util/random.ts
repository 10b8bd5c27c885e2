/** Uniform source in [0, 1), the shape of `Math.random`. */
export type RandomSource = () => number;

/**
 * Small seeded generator for reproducible picks. Seeds are taken as unsigned
 * 32-bit integers; non-finite seeds act as 0.
 */
export const mulberry32 = (seed: number): RandomSource => {
    let state = Number.isFinite(seed) ? seed >>> 0 : 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

/**
 * Index in [0, length) drawn from a source. Guards against sources that
 * return exactly 1.
 */
export const randomIndex = (random: RandomSource, length: number): number => {
    if (!Number.isInteger(length) || length < 1) {
        throw new RangeError('length must be a positive integer');
    }
    return Math.min(length - 1, Math.floor(random() * length));
};
