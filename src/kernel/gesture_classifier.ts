/**
 * gesture_classifier.ts — raw drag stream → locked Direction (or none).
 *
 *   UNSET ──|Δ| > lockThreshold on either axis──►  LOCKED(direction)
 *     │                                              (immutable for the gesture)
 *     └───dominant axis sign/band invalid─────────►  INERT
 *                                                    (progress stays 0, release no-op)
 *
 * Band rules (start point, not current point):
 *   +Δx locks RIGHT only if start.x <  horizontalBandWidth            (left edge)
 *   -Δx locks LEFT  only if start.x >  width  - horizontalBandWidth   (right edge)
 *   +Δy locks DOWN  only if start.y <  verticalBandHeight             (top edge)
 *   -Δy locks UP    only if start.y >  height - verticalBandHeight    (bottom edge)
 * and only if the region that direction reveals is present.
 */

import type { DetectionZone } from './config';
import { Direction, PeripheralRegion, Point, ViewportSize, regionRevealedBy } from './types';

export type ClassifierStatus = 'UNSET' | 'LOCKED' | 'INERT';

export interface ClassifierOptions {
    readonly zone: DetectionZone;
    readonly lockThresholdPx: number;
    /** false for regions the host left empty; their direction never locks. */
    readonly isRegionPresent: (region: PeripheralRegion) => boolean;
}

export interface ClassifierUpdate {
    readonly status: ClassifierStatus;
    readonly direction: Direction | null;
    /** true only on the update that performed the lock. */
    readonly justLocked: boolean;
    /** Cumulative displacement from the origin. */
    readonly totalDelta: Point;
}

export class GestureClassifier {

    private _origin: Point | null = null;
    private _status: ClassifierStatus = 'UNSET';
    private _direction: Direction | null = null;

    constructor(private readonly options: ClassifierOptions) {}

    get status(): ClassifierStatus { return this._status; }

    begin(origin: Point): void {
        this._origin = origin;
        this._status = 'UNSET';
        this._direction = null;
    }

    reset(): void {
        this._origin = null;
        this._status = 'UNSET';
        this._direction = null;
    }

    /**
     * Feed the current pointer position.  Once LOCKED or INERT the status
     * never changes again until the next begin().
     */
    update(current: Point, viewport: ViewportSize): ClassifierUpdate {
        if (this._origin === null) {
            return { status: 'INERT', direction: null, justLocked: false, totalDelta: { x: 0, y: 0 } };
        }
        const totalDelta = { x: current.x - this._origin.x, y: current.y - this._origin.y };

        if (this._status !== 'UNSET') {
            return { status: this._status, direction: this._direction, justLocked: false, totalDelta };
        }

        const absX = Math.abs(totalDelta.x);
        const absY = Math.abs(totalDelta.y);
        const threshold = this.options.lockThresholdPx;
        if (absX <= threshold && absY <= threshold) {
            return { status: 'UNSET', direction: null, justLocked: false, totalDelta };
        }

        const candidate = absX > absY
            ? this._horizontalCandidate(totalDelta.x, viewport)
            : this._verticalCandidate(totalDelta.y, viewport);

        if (candidate !== null && this.options.isRegionPresent(regionRevealedBy(candidate))) {
            this._status = 'LOCKED';
            this._direction = candidate;
            return { status: 'LOCKED', direction: candidate, justLocked: true, totalDelta };
        }

        this._status = 'INERT';
        return { status: 'INERT', direction: null, justLocked: false, totalDelta };
    }

    // ── Band checks ───────────────────────────────────────────────────────────

    private _horizontalCandidate(dx: number, viewport: ViewportSize): Direction | null {
        const startX = this._origin?.x ?? 0;
        const band = this.options.zone.horizontalBandWidth;
        if (dx > 0 && startX < band) return 'RIGHT';
        if (dx < 0 && startX > viewport.width - band) return 'LEFT';
        return null;
    }

    private _verticalCandidate(dy: number, viewport: ViewportSize): Direction | null {
        const startY = this._origin?.y ?? 0;
        const band = this.options.zone.verticalBandHeight;
        if (dy > 0 && startY < band) return 'DOWN';
        if (dy < 0 && startY > viewport.height - band) return 'UP';
        return null;
    }
}
