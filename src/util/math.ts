export const TAU = Math.PI * 2;

/**
 * Modulo whose result is never negative,
 * so `euclideanModulo(-1, 4)` is 3 rather than -1.
 */
export const euclideanModulo = (value: number, divisor: number): number => {
    const remainder = value % divisor;
    if (remainder === 0) {
        // normalizes -0
        return 0;
    }
    return remainder < 0 ? remainder + Math.abs(divisor) : remainder;
};

export const isNonNegativeInteger = (value: number): boolean => Number.isInteger(value) && value >= 0;
