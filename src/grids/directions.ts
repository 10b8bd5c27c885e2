/**
 * Four- and eight-way grid directions.
 *
 * Directions are ordered clockwise starting at north, so a direction's index
 * in `DIRECTIONS_4`/`DIRECTIONS_8` doubles as a rotation step count.
 * Screen convention throughout: +y points down.
 */

import { TAU, euclideanModulo } from '../util/math';
import type { ICoord } from './coords';

export type Direction4 = 'north' | 'east' | 'south' | 'west';

export type Direction8 =
    | 'north'
    | 'north-east'
    | 'east'
    | 'south-east'
    | 'south'
    | 'south-west'
    | 'west'
    | 'north-west';

export type Rotation = 'clockwise' | 'counter-clockwise';

export const DIRECTIONS_4: readonly Direction4[] = ['north', 'east', 'south', 'west'];

export const DIRECTIONS_8: readonly Direction8[] = [
    'north',
    'north-east',
    'east',
    'south-east',
    'south',
    'south-west',
    'west',
    'north-west',
];

const DELTAS_8: Record<Direction8, ICoord> = {
    north: { x: 0, y: -1 },
    'north-east': { x: 1, y: -1 },
    east: { x: 1, y: 0 },
    'south-east': { x: 1, y: 1 },
    south: { x: 0, y: 1 },
    'south-west': { x: -1, y: 1 },
    west: { x: -1, y: 0 },
    'north-west': { x: -1, y: -1 },
};

export const isDirection4 = (value: unknown): value is Direction4 =>
    DIRECTIONS_4.some((direction) => direction === value);

export const isDirection8 = (value: unknown): value is Direction8 =>
    DIRECTIONS_8.some((direction) => direction === value);

export const rotationSteps = (rotation: Rotation): number => (rotation === 'clockwise' ? 1 : -1);

const rotateWithin = <D extends Direction8>(order: readonly D[], direction: D, stepsClockwise: number): D => {
    if (!Number.isInteger(stepsClockwise)) {
        throw new RangeError(`Rotation steps must be an integer (got ${stepsClockwise})`);
    }
    const index = order.indexOf(direction);
    return order[euclideanModulo(index + stepsClockwise, order.length)];
};

// Index of east, which sits at 0 radians.
const radiansWithin = <D extends Direction8>(order: readonly D[], direction: D, eastIndex: number): number =>
    (euclideanModulo(order.indexOf(direction) - eastIndex, order.length) * TAU) / order.length;

/** Negative steps rotate counter-clockwise. */
export const rotateDirection4 = (direction: Direction4, stepsClockwise: number): Direction4 =>
    rotateWithin(DIRECTIONS_4, direction, stepsClockwise);

export const rotateDirection4By = (direction: Direction4, rotation: Rotation): Direction4 =>
    rotateDirection4(direction, rotationSteps(rotation));

export const flipDirection4 = (direction: Direction4): Direction4 => rotateDirection4(direction, 2);

/** 0 is east; angles grow clockwise, matching a y-down screen. */
export const direction4Radians = (direction: Direction4): number => radiansWithin(DIRECTIONS_4, direction, 1);

export const direction4Deltas = (direction: Direction4): ICoord => ({ ...DELTAS_8[direction] });

export const isHorizontal = (direction: Direction4): boolean => direction === 'east' || direction === 'west';

export const isVertical = (direction: Direction4): boolean => direction === 'north' || direction === 'south';

/** Negative steps rotate counter-clockwise. */
export const rotateDirection8 = (direction: Direction8, stepsClockwise: number): Direction8 =>
    rotateWithin(DIRECTIONS_8, direction, stepsClockwise);

export const rotateDirection8By = (direction: Direction8, rotation: Rotation): Direction8 =>
    rotateDirection8(direction, rotationSteps(rotation));

export const flipDirection8 = (direction: Direction8): Direction8 => rotateDirection8(direction, 4);

export const direction8Radians = (direction: Direction8): number => radiansWithin(DIRECTIONS_8, direction, 2);

export const direction8Deltas = (direction: Direction8): ICoord => ({ ...DELTAS_8[direction] });

/** The eight-way direction pointing the same way as a four-way one. */
export const toDirection8 = (direction: Direction4): Direction8 => direction;

/**
 * Direction a delta points toward, judged by the sign of each axis.
 * Null for the zero vector.
 */
export const direction8FromDeltas = (delta: ICoord): Direction8 | null => {
    const x = Math.sign(delta.x);
    const y = Math.sign(delta.y);
    if (x === 0 && y === 0) {
        return null;
    }
    return DIRECTIONS_8.find((direction) => DELTAS_8[direction].x === x && DELTAS_8[direction].y === y) ?? null;
};
