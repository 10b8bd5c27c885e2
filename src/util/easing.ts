/**
 * Easing curves and interpolation.
 *
 * A curve maps progress `t` to eased progress; `interpolate` then lerps
 * between two values with it. Progress outside [0, 1] is passed through
 * unclamped so overshooting curves stay expressible.
 *
 * See https://easings.net for the shapes.
 */

export type Easing = (t: number) => number;

export type NumericTuple = readonly number[];

export const lerp = (start: number, end: number, t: number): number => start * (1 - t) + end * t;

export function lerpTuple(start: NumericTuple, end: NumericTuple, t: number): number[] {
    if (start.length !== end.length) {
        throw new RangeError(`Cannot interpolate tuples of length ${start.length} and ${end.length}`);
    }
    return start.map((value, index) => lerp(value, end[index], t));
}

export const linear: Easing = (t) => t;

export const sineIn: Easing = (t) => 1 - Math.cos((t * Math.PI) / 2);
export const sineOut: Easing = (t) => Math.sin((t * Math.PI) / 2);
export const sineInOut: Easing = (t) => -(Math.cos(t * Math.PI) - 1) / 2;

export const quadIn: Easing = (t) => t * t;
export const quadOut: Easing = (t) => 1 - (1 - t) * (1 - t);
export const quadInOut: Easing = (t) => (t < 0.5 ? 2 * t * t : 1 - (-2 * t + 2) ** 2 / 2);

export const cubicIn: Easing = (t) => t * t * t;
export const cubicOut: Easing = (t) => 1 - (1 - t) ** 3;
export const cubicInOut: Easing = (t) => (t < 0.5 ? 4 * t * t * t : 1 - (-2 * t + 2) ** 3 / 2);

export const EASINGS = {
    linear,
    sineIn,
    sineOut,
    sineInOut,
    quadIn,
    quadOut,
    quadInOut,
    cubicIn,
    cubicOut,
    cubicInOut,
} as const satisfies Record<string, Easing>;

export type EasingName = keyof typeof EASINGS;

export function interpolate(easing: Easing | EasingName, t: number, start: number, end: number): number;
export function interpolate(easing: Easing | EasingName, t: number, start: NumericTuple, end: NumericTuple): number[];
export function interpolate(
    easing: Easing | EasingName,
    t: number,
    start: number | NumericTuple,
    end: number | NumericTuple,
): number | number[] {
    const curve = typeof easing === 'string' ? EASINGS[easing] : easing;
    const eased = curve(t);

    if (typeof start === 'number' && typeof end === 'number') {
        return lerp(start, end, eased);
    }
    if (typeof start !== 'number' && typeof end !== 'number') {
        return lerpTuple(start, end, eased);
    }
    throw new TypeError('start and end must both be numbers or both be tuples');
}
