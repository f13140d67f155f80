import { Direction, ORIGIN, Point, ViewportSize, lerp } from './types';

/**
 * Displacements for one swipe direction.
 *
 * exit  : where the outgoing element ends up (it leaves toward the swipe heading)
 * entry : where the incoming element starts (mirror image of exit)
 */
export interface DisplacementPair {
    readonly exit: Point;
    readonly entry: Point;
}

export function exitVector(direction: Direction, size: ViewportSize): Point {
    switch (direction) {
        case 'LEFT':  return { x: -size.width, y: 0 };
        case 'RIGHT': return { x: size.width,  y: 0 };
        case 'UP':    return { x: 0, y: -size.height };
        case 'DOWN':  return { x: 0, y: size.height };
    }
}

export function entryVector(direction: Direction, size: ViewportSize): Point {
    const exit = exitVector(direction, size);
    // 0 - 0 would give -0 on the idle axis; keep it a plain zero.
    return { x: exit.x === 0 ? 0 : -exit.x, y: exit.y === 0 ? 0 : -exit.y };
}

export function displacementFor(direction: Direction, size: ViewportSize): DisplacementPair {
    return {
        exit:  exitVector(direction, size),
        entry: entryVector(direction, size),
    };
}

export function lerpPoint(a: Point, b: Point, t: number): Point {
    return { x: lerp(a.x, b.x, t), y: lerp(a.y, b.y, t) };
}

/** Position of the element leaving the screen at progress p. */
export function outgoingPosition(direction: Direction, size: ViewportSize, p: number): Point {
    return lerpPoint(ORIGIN, exitVector(direction, size), p);
}

/** Position of the element arriving on screen at progress p. */
export function incomingPosition(direction: Direction, size: ViewportSize, p: number): Point {
    return lerpPoint(entryVector(direction, size), ORIGIN, p);
}
