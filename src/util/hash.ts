/**
 * FNV-1a (32-bit) hashing for "random-ish but constant" values, such as
 * picking a tile variant from its grid coordinate. Results are stable across
 * runs and platforms.
 */

export const FNV_OFFSET = 2166136261;
export const FNV_PRIME = 16777619;

const mixHash = (seed: number, value: number): number => Math.imul(seed ^ value, FNV_PRIME) | 0;

const mixString = (seed: number, value: string): number => {
    let hash = seed;
    for (let index = 0; index < value.length; index += 1) {
        hash = mixHash(hash, value.charCodeAt(index));
    }
    return hash;
};

export const hashString = (value: string): number => mixString(FNV_OFFSET, value) >>> 0;

/** Hash a run of numbers; fractions are truncated and non-finite values count as 0. */
export const hashSequence = (...values: number[]): number => {
    let seed = FNV_OFFSET;
    for (const value of values) {
        const safe = Number.isFinite(value) ? Math.trunc(value) : 0;
        seed = mixHash(seed, safe);
    }
    return seed >>> 0;
};

// One tag per shape keeps `1`, `"1"` and `[1]` apart.
const TAG = {
    undefined: 'u',
    null: 'n',
    boolean: 'b',
    number: '#',
    bigint: 'i',
    string: 's',
    array: '[',
    object: '{',
} as const;

const encode = (value: unknown): string => {
    switch (typeof value) {
        case 'undefined':
            return TAG.undefined;
        case 'boolean':
            return `${TAG.boolean}${value ? 1 : 0}`;
        case 'number':
            return `${TAG.number}${Object.is(value, -0) ? '0' : String(value)};`;
        case 'bigint':
            return `${TAG.bigint}${value.toString()};`;
        case 'string':
            return `${TAG.string}${value.length}:${value}`;
        case 'object':
            break;
        default:
            throw new TypeError(`Cannot hash a value of type ${typeof value}`);
    }

    if (typeof value !== 'object' || value === null) {
        return TAG.null;
    }
    if (Array.isArray(value)) {
        return `${TAG.array}${value.map(encode).join('')}]`;
    }

    const fields = Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, field]) => `${key.length}:${key}${encode(field)}`);
    return `${TAG.object}${fields.join('')}}`;
};

/**
 * Hash a structural value: primitives, arrays and plain objects. Object key
 * order is ignored, so `{ x, y }` and `{ y, x }` hash alike.
 */
export const hashcode = (value: unknown): number => hashString(encode(value));
