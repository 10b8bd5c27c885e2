import { isNonNegativeInteger } from '../util/math';
import { direction8Deltas, type Direction8 } from './directions';

/** Unsigned integer grid position. */
export interface Coord {
    readonly x: number;
    readonly y: number;
}

/** Signed integer grid position or offset. */
export interface ICoord {
    readonly x: number;
    readonly y: number;
}

export type Quadrant = 1 | 2 | 3 | 4;

export const createCoord = (x: number, y: number): Coord => {
    if (!isNonNegativeInteger(x) || !isNonNegativeInteger(y)) {
        throw new RangeError(`Coord components must be non-negative integers (got ${x}, ${y})`);
    }
    return { x, y };
};

export const createICoord = (x: number, y: number): ICoord => {
    if (!Number.isInteger(x) || !Number.isInteger(y)) {
        throw new RangeError(`ICoord components must be integers (got ${x}, ${y})`);
    }
    return { x, y };
};

/** Row-major index into a flat array of the given width: `y * width + x`. */
export const coordToIndex = (coord: Coord, width: number): number => coord.y * width + coord.x;

export const coordFromIndex = (index: number, width: number): Coord => {
    if (!isNonNegativeInteger(index) || !Number.isInteger(width) || width < 1) {
        throw new RangeError(`Cannot locate index ${index} in rows of width ${width}`);
    }
    return { x: index % width, y: Math.floor(index / width) };
};

export const addCoords = (a: Coord, b: Coord): Coord => ({ x: a.x + b.x, y: a.y + b.y });

export const scaleCoord = (coord: Coord, factor: number): Coord => createCoord(coord.x * factor, coord.y * factor);

export const addICoords = (a: ICoord, b: ICoord): ICoord => ({ x: a.x + b.x, y: a.y + b.y });

export const scaleICoord = (coord: ICoord, factor: number): ICoord =>
    createICoord(coord.x * factor, coord.y * factor);

/** Step one cell in a direction. Four-way directions are accepted too. */
export const offsetICoord = (coord: ICoord, direction: Direction8, steps = 1): ICoord =>
    addICoords(coord, scaleICoord(direction8Deltas(direction), steps));

export const toICoord = (coord: Coord): ICoord => ({ x: coord.x, y: coord.y });

/** Null when either component is negative. */
export const tryToCoord = (coord: ICoord): Coord | null => {
    if (coord.x < 0 || coord.y < 0) {
        return null;
    }
    return { x: coord.x, y: coord.y };
};

/**
 * - 1: +x, +y
 * - 2: -x, +y
 * - 3: -x, -y
 * - 4: +x, -y
 *
 * Zero counts as positive.
 */
export const quadrant = (coord: ICoord): Quadrant => {
    const right = coord.x >= 0;
    const below = coord.y >= 0;
    if (below) {
        return right ? 1 : 2;
    }
    return right ? 4 : 3;
};

export const coordsEqual = (a: ICoord, b: ICoord): boolean => a.x === b.x && a.y === b.y;

/** Manhattan (taxicab) distance. */
export const manhattanDistance = (a: ICoord, b: ICoord): number => Math.abs(a.x - b.x) + Math.abs(a.y - b.y);

/** Chebyshev distance: steps needed when diagonal moves are allowed. */
export const chebyshevDistance = (a: ICoord, b: ICoord): number => Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
