import { describe, expect, it } from 'vitest';
import {
    EASINGS,
    cubicInOut,
    cubicOut,
    interpolate,
    lerp,
    lerpTuple,
    linear,
    quadInOut,
    sineIn,
    type EasingName,
} from 'util/easing';

const NAMES = Object.keys(EASINGS).filter((name): name is EasingName => name in EASINGS);

describe('easing curves', () => {
    it.each(NAMES)('%s starts at 0 and ends at 1', (name) => {
        const curve = EASINGS[name];
        expect(curve(0)).toBeCloseTo(0, 10);
        expect(curve(1)).toBeCloseTo(1, 10);
    });

    it('shapes the midpoints', () => {
        expect(sineIn(0.5)).toBeCloseTo(1 - Math.SQRT1_2, 10);
        expect(quadInOut(0.25)).toBe(0.125);
        expect(quadInOut(0.75)).toBe(0.875);
        expect(cubicInOut(0.25)).toBe(0.0625);
        expect(cubicOut(0.5)).toBe(0.875);
    });

    it('passes progress outside the unit range through', () => {
        expect(linear(1.5)).toBe(1.5);
        expect(EASINGS.quadIn(-2)).toBe(4);
    });
});

describe('interpolation', () => {
    it('lerps numbers', () => {
        expect(lerp(10, 20, 0)).toBe(10);
        expect(lerp(10, 20, 1)).toBe(20);
        expect(lerp(-4, 4, 0.5)).toBe(0);
    });

    it('lerps tuples element-wise', () => {
        expect(lerpTuple([0, 100], [4, 200], 0.25)).toEqual([1, 125]);
    });

    it('rejects tuples of different lengths', () => {
        expect(() => lerpTuple([0, 1], [0, 1, 2], 0.5)).toThrow(RangeError);
    });

    it('interpolates through a curve given by name or function', () => {
        expect(interpolate('quadIn', 0.5, 10, 20)).toBe(12.5);
        expect(interpolate(linear, 0.25, [0, 100], [4, 200])).toEqual([1, 125]);
    });
});
