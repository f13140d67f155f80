// ── Regions and directions ───────────────────────────────────────────────────
//
// Star topology: CENTER ⇄ any peripheral, never peripheral ⇄ peripheral.
// A swipe is named after the finger's heading, which is the OPPOSITE of the
// region it reveals:
//
//   LEFT  swipe ──► RIGHT  region
//   RIGHT swipe ──► LEFT   region
//   UP    swipe ──► BOTTOM region
//   DOWN  swipe ──► TOP    region

export type Region = 'CENTER' | 'LEFT' | 'RIGHT' | 'TOP' | 'BOTTOM';

export type PeripheralRegion = Exclude<Region, 'CENTER'>;

export type Direction = 'LEFT' | 'RIGHT' | 'UP' | 'DOWN';

export type Axis = 'HORIZONTAL' | 'VERTICAL';

export const PERIPHERAL_REGIONS: ReadonlyArray<PeripheralRegion> = ['LEFT', 'RIGHT', 'TOP', 'BOTTOM'];

// ── Session phases ────────────────────────────────────────────────────────────

export type SessionPhase =
    | 'IDLE'
    | 'DRAGGING'
    | 'LOCKED'
    | 'COMMITTING_FORWARD'
    | 'COMMITTING_BACK'
    | 'PERIPHERAL_ACTIVE'
    | 'RETURNING';

/** Phases during which a running animation owns progress. No new input is accepted. */
export const BUSY_PHASES: ReadonlySet<SessionPhase> = new Set<SessionPhase>([
    'COMMITTING_FORWARD',
    'COMMITTING_BACK',
    'RETURNING',
]);

export type HapticIntensity = 'soft' | 'medium' | 'heavy';

export type ReturnSource = 'button' | 'programmatic' | 'platform_back';

// ── Geometry primitives ───────────────────────────────────────────────────────

export interface Point {
    readonly x: number;
    readonly y: number;
}

export interface ViewportSize {
    readonly width: number;
    readonly height: number;
}

export const ORIGIN: Point = { x: 0, y: 0 };

/** Where an overlay hugs the screen: middle of a side edge. */
export type EdgeAnchor = 'CENTER_LEFT' | 'CENTER_RIGHT' | 'TOP_CENTER' | 'BOTTOM_CENTER';

// ── Mappings ──────────────────────────────────────────────────────────────────

export function regionRevealedBy(direction: Direction): PeripheralRegion {
    switch (direction) {
        case 'LEFT':  return 'RIGHT';
        case 'RIGHT': return 'LEFT';
        case 'UP':    return 'BOTTOM';
        case 'DOWN':  return 'TOP';
    }
}

export function directionRevealing(region: PeripheralRegion): Direction {
    switch (region) {
        case 'LEFT':   return 'RIGHT';
        case 'RIGHT':  return 'LEFT';
        case 'TOP':    return 'DOWN';
        case 'BOTTOM': return 'UP';
    }
}

export function oppositeDirection(direction: Direction): Direction {
    switch (direction) {
        case 'LEFT':  return 'RIGHT';
        case 'RIGHT': return 'LEFT';
        case 'UP':    return 'DOWN';
        case 'DOWN':  return 'UP';
    }
}

/** Direction used to animate back to CENTER from a peripheral region. */
export function returnDirectionFor(region: PeripheralRegion): Direction {
    return oppositeDirection(directionRevealing(region));
}

export function axisOf(direction: Direction): Axis {
    return direction === 'LEFT' || direction === 'RIGHT' ? 'HORIZONTAL' : 'VERTICAL';
}

export function isPeripheral(region: Region): region is PeripheralRegion {
    return region !== 'CENTER';
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}
