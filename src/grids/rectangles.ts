import { isNonNegativeInteger } from '../util/math';
import type { ICoord } from './coords';

/** Integer rectangle. `width` and `height` count cells, so a 1×1 rect covers one cell. */
export interface IRect {
    readonly left: number;
    readonly top: number;
    readonly width: number;
    readonly height: number;
}

export const createRect = (left: number, top: number, width: number, height: number): IRect => {
    if (!Number.isInteger(left) || !Number.isInteger(top)) {
        throw new RangeError(`Rect origin must be integers (got ${left}, ${top})`);
    }
    if (!isNonNegativeInteger(width) || !isNonNegativeInteger(height)) {
        throw new RangeError(`Rect size must be non-negative integers (got ${width}x${height})`);
    }
    return { left, top, width, height };
};

export const centeredRect = (center: ICoord, width: number, height: number): IRect =>
    createRect(center.x - Math.trunc(width / 2), center.y - Math.trunc(height / 2), width, height);

/** Last column inside the rect. */
export const rectRight = (rect: IRect): number => rect.left + rect.width - 1;

/** Last row inside the rect. */
export const rectBottom = (rect: IRect): number => rect.top + rect.height - 1;

export const rectArea = (rect: IRect): number => rect.width * rect.height;

/** Boundary cells count as inside. */
export const rectContains = (rect: IRect, position: ICoord): boolean =>
    rect.top <= position.y && rectBottom(rect) >= position.y && rect.left <= position.x && rectRight(rect) >= position.x;

export const shiftRect = (rect: IRect, by: ICoord): IRect => ({
    ...rect,
    left: rect.left + by.x,
    top: rect.top + by.y,
});

/** Every cell in reading order: left to right, then top to bottom. */
export function* rectCoords(rect: IRect): Generator<ICoord, void, undefined> {
    for (let y = rect.top; y <= rectBottom(rect); y += 1) {
        for (let x = rect.left; x <= rectRight(rect); x += 1) {
            yield { x, y };
        }
    }
}
