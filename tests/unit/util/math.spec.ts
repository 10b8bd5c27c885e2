import { describe, expect, it } from 'vitest';
import { TAU, euclideanModulo, isNonNegativeInteger } from 'util/math';

describe('math helpers', () => {
    it('wraps negative values onto the divisor range', () => {
        expect(euclideanModulo(-1, 4)).toBe(3);
        expect(euclideanModulo(9, 4)).toBe(1);
        expect(euclideanModulo(-4, 4)).toBe(0);
        expect(Object.is(euclideanModulo(-8, 4), 0)).toBe(true);
    });

    it('recognizes non-negative integers', () => {
        expect(isNonNegativeInteger(0)).toBe(true);
        expect(isNonNegativeInteger(3)).toBe(true);
        expect(isNonNegativeInteger(-1)).toBe(false);
        expect(isNonNegativeInteger(1.5)).toBe(false);
    });

    it('defines a full turn', () => {
        expect(TAU).toBeCloseTo(6.283185307, 9);
    });
});
