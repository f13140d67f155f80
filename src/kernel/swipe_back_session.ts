/**
 * swipe_back_session.ts — the peripheral region's own return gesture.
 *
 * Same shape as TransitionSession, one axis and one direction only:
 *
 *   IDLE ──pointerDown inside the return edge band──► DRAGGING
 *   DRAGGING ──release, p ≥ 0.5──────────────────────► COMMITTING ──done──► onCommit(region)
 *   DRAGGING ──release, p < 0.5 / cancel─────────────► CANCELLING ──done──► IDLE
 *
 * Edge bands, as a fraction of the viewport dimension (default 0.2):
 *   LEFT   region: start near the right edge, drag left
 *   RIGHT  region: start near the left edge,  drag right
 *   TOP    region: start near the bottom edge, drag up
 *   BOTTOM region: start near the top edge,   drag down
 *
 * Progress is the displacement from the start point along that axis,
 * divided by the viewport dimension and clamped to [0, 1].  The commit and
 * haptic thresholds are fixed at 0.5, independent of swipeThreshold.
 */

import { NavigatorConfig } from './config';
import { EventBus, NavigatorEvents } from './event_bus';
import { EasingFn, ProgressAnimation, resolveEasing } from './progress_animation';
import { PeripheralRegion, Point, ViewportSize, clamp } from './types';
import type { ViewportSource } from './viewport';

export const SWIPE_BACK_COMMIT_THRESHOLD = 0.5;
export const SWIPE_BACK_HAPTIC_THRESHOLD = 0.5;
/** Above this progress the platform back signal is refused. */
export const PLATFORM_BACK_PROGRESS_LIMIT = 0.1;

export type SwipeBackPhase = 'IDLE' | 'DRAGGING' | 'COMMITTING' | 'CANCELLING';

export interface SwipeBackSnapshot {
    readonly region: PeripheralRegion;
    readonly phase: SwipeBackPhase;
    readonly progress: number;
}

export interface SwipeBackSessionOptions {
    readonly region: PeripheralRegion;
    readonly config: NavigatorConfig;
    readonly eventBus: EventBus<NavigatorEvents>;
    readonly viewport: ViewportSource;
    /** The owning navigator settles its TransitionSession here. */
    readonly onCommit?: (region: PeripheralRegion) => void;
}

export class PeripheralSwipeBackSession {

    public readonly region: PeripheralRegion;

    private readonly _config: NavigatorConfig;
    private readonly _bus: EventBus<NavigatorEvents>;
    private readonly _viewport: ViewportSource;
    private readonly _easing: EasingFn;
    private readonly _onCommit: ((region: PeripheralRegion) => void) | null;

    private _phase: SwipeBackPhase = 'IDLE';
    private _progress = 0;
    private _start = 0;
    private _animation: ProgressAnimation | null = null;
    private _hapticArmed = true;
    private _disposed = false;

    constructor(options: SwipeBackSessionOptions) {
        this.region = options.region;
        this._config = options.config;
        this._bus = options.eventBus;
        this._viewport = options.viewport;
        this._easing = resolveEasing(options.config.easing);
        this._onCommit = options.onCommit ?? null;
    }

    get phase(): SwipeBackPhase { return this._phase; }

    get progress(): number { return this._progress; }

    get snapshot(): SwipeBackSnapshot {
        return { region: this.region, phase: this._phase, progress: this._progress };
    }

    /** True while an external return would race this gesture's own commit. */
    blocksExternalReturn(): boolean {
        return this._phase !== 'IDLE' || this._progress >= PLATFORM_BACK_PROGRESS_LIMIT;
    }

    // ── Pointer input ─────────────────────────────────────────────────────────

    pointerDown(point: Point, _nowMs: number): boolean {
        if (this._disposed || this._phase !== 'IDLE') return false;
        if (!this._startsInReturnBand(point, this._viewport.size)) return false;

        this._start = this._axisCoordinate(point);
        this._progress = 0;
        this._hapticArmed = true;
        this._phase = 'DRAGGING';
        return true;
    }

    pointerMove(point: Point, _nowMs: number): void {
        if (this._phase !== 'DRAGGING') return;

        const size = this._viewport.size;
        const dimension = this._isHorizontal() ? size.width : size.height;
        const current = this._axisCoordinate(point);
        const displacement = this._towardCenterSign() * (current - this._start);
        this._progress = dimension > 0 ? clamp(displacement / dimension, 0, 1) : 0;

        if (this._progress >= SWIPE_BACK_HAPTIC_THRESHOLD && this._hapticArmed) {
            this._hapticArmed = false;
            this._bus.publish('HAPTIC_TRIGGER', {
                intensity: this._config.hapticIntensity,
                source: 'swipe_back_threshold',
            });
        } else if (this._progress < SWIPE_BACK_HAPTIC_THRESHOLD) {
            this._hapticArmed = true;
        }
    }

    pointerUp(nowMs: number): void {
        if (this._phase !== 'DRAGGING') return;
        const commit = this._progress >= SWIPE_BACK_COMMIT_THRESHOLD;
        this._animate(commit ? 'COMMITTING' : 'CANCELLING', commit ? 1 : 0, nowMs);
    }

    pointerCancel(nowMs: number): void {
        if (this._phase !== 'DRAGGING') return;
        this._animate('CANCELLING', 0, nowMs);
    }

    // ── Animation ─────────────────────────────────────────────────────────────

    tick(nowMs: number): SwipeBackSnapshot {
        const animation = this._animation;
        if (animation === null) return this.snapshot;

        const sample = animation.sample(nowMs);
        if (!sample.ok) {
            console.error(`[SwipeBack:${this.region}] animation failed, settling at nearest terminal value`, sample.error);
            if (this._progress >= SWIPE_BACK_COMMIT_THRESHOLD) this._commit();
            else this._reset();
            return this.snapshot;
        }

        this._progress = sample.value;
        if (sample.done) {
            if (this._phase === 'COMMITTING') this._commit();
            else this._reset();
        }
        return this.snapshot;
    }

    dispose(): void {
        this._disposed = true;
        this._animation = null;
        this._phase = 'IDLE';
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private _animate(phase: SwipeBackPhase, to: number, nowMs: number): void {
        this._hapticArmed = true;
        this._phase = phase;
        this._animation = new ProgressAnimation(
            this._progress,
            to,
            nowMs,
            this._config.transitionDurationMs,
            this._easing,
        );
    }

    private _commit(): void {
        this._animation = null;
        this._progress = 1;
        this._phase = 'IDLE';
        this._bus.publish('SWIPE_BACK_COMMITTED', { region: this.region });
        this._onCommit?.(this.region);
    }

    private _reset(): void {
        this._animation = null;
        this._progress = 0;
        this._phase = 'IDLE';
    }

    private _isHorizontal(): boolean {
        return this.region === 'LEFT' || this.region === 'RIGHT';
    }

    private _axisCoordinate(point: Point): number {
        return this._isHorizontal() ? point.x : point.y;
    }

    /** +1 when moving toward center means increasing the coordinate. */
    private _towardCenterSign(): 1 | -1 {
        return this.region === 'RIGHT' || this.region === 'BOTTOM' ? 1 : -1;
    }

    private _startsInReturnBand(point: Point, size: ViewportSize): boolean {
        const fraction = this._config.swipeBackEdgeFraction;
        const bandX = size.width * fraction;
        const bandY = size.height * fraction;
        switch (this.region) {
            case 'LEFT':   return point.x >= size.width - bandX;
            case 'RIGHT':  return point.x <= bandX;
            case 'TOP':    return point.y >= size.height - bandY;
            case 'BOTTOM': return point.y <= bandY;
        }
    }
}
