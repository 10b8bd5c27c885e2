import { randomIndex, type RandomSource } from './random';

export type WeightedEntry<T> = readonly [item: T, weight: number];

/**
 * A weighted bag built with Vose's alias method: O(n) construction,
 * O(1) sampling. Weights are fixed once built.
 *
 * https://www.keithschwarz.com/darts-dice-coins/
 */
export interface WeightedPicker<T> {
    readonly size: number;
    readonly items: readonly T[];
    readonly getIndex: (random: RandomSource) => number;
    readonly get: (random: RandomSource) => T;
    readonly getByIndex: (index: number) => T | undefined;
}

interface AliasTable {
    readonly probability: readonly number[];
    readonly alias: readonly number[];
}

const validateWeights = (weights: readonly number[]): number => {
    if (weights.length === 0) {
        throw new RangeError('Cannot build a weighted picker from no entries');
    }

    let total = 0;
    for (const [index, weight] of weights.entries()) {
        if (!Number.isFinite(weight) || weight < 0) {
            throw new RangeError(`Weight at index ${index} must be a finite, non-negative number (got ${weight})`);
        }
        total += weight;
    }

    if (total <= 0) {
        throw new RangeError('Total weight must be greater than zero');
    }
    return total;
};

const buildAliasTable = (weights: readonly number[], total: number): AliasTable => {
    const count = weights.length;
    const scaled = weights.map((weight) => (weight * count) / total);
    const probability = new Array<number>(count).fill(0);
    const alias = new Array<number>(count).fill(0);

    const small: number[] = [];
    const large: number[] = [];
    scaled.forEach((value, index) => {
        (value < 1 ? small : large).push(index);
    });

    let less = small.pop();
    let more = large.pop();
    while (less !== undefined && more !== undefined) {
        probability[less] = scaled[less];
        alias[less] = more;

        scaled[more] = scaled[more] + scaled[less] - 1;
        if (scaled[more] < 1) {
            small.push(more);
        } else {
            large.push(more);
        }

        less = small.pop();
        more = large.pop();
    }

    // Leftovers are 1 up to rounding error.
    for (const index of [less, more, ...small, ...large]) {
        if (index !== undefined) {
            probability[index] = 1;
        }
    }

    return { probability, alias };
};

export const createWeightedPicker = <T>(entries: readonly WeightedEntry<T>[]): WeightedPicker<T> => {
    const items = entries.map(([item]) => item);
    const weights = entries.map(([, weight]) => weight);
    const total = validateWeights(weights);
    const { probability, alias } = buildAliasTable(weights, total);

    const getIndex = (random: RandomSource): number => {
        const column = randomIndex(random, items.length);
        return random() < probability[column] ? column : alias[column];
    };

    return {
        size: items.length,
        items,
        getIndex,
        get: (random) => items[getIndex(random)],
        getByIndex: (index) => (Number.isInteger(index) && index >= 0 && index < items.length ? items[index] : undefined),
    };
};

/** Build a picker and sample it once. */
export const pickWeighted = <T>(entries: readonly WeightedEntry<T>[], random: RandomSource): T =>
    createWeightedPicker(entries).get(random);
