/**
 * transition_session.ts — the top-level gesture → animation state machine.
 *
 *   IDLE ──pointerDown (canSwipeFromCenter)──────────────► DRAGGING
 *   DRAGGING ──classifier locks──────────────────────────► LOCKED
 *   DRAGGING ──release / cancel (never locked)───────────► IDLE
 *   LOCKED ──release, p ≥ threshold, target present──────► COMMITTING_FORWARD
 *   LOCKED ──release otherwise / cancel──────────────────► COMMITTING_BACK
 *   IDLE ──navigate(direction)───────────────────────────► COMMITTING_FORWARD (from p = 0)
 *   COMMITTING_FORWARD ──animation done──────────────────► PERIPHERAL_ACTIVE
 *   COMMITTING_BACK ──animation done─────────────────────► IDLE
 *   PERIPHERAL_ACTIVE ──requestReturn────────────────────► RETURNING (p seeded at 1)
 *   PERIPHERAL_ACTIVE ──completeSwipeBack(region)────────► IDLE (no animation)
 *   RETURNING ──animation done───────────────────────────► IDLE
 *
 * COMMITTING_FORWARD, COMMITTING_BACK and RETURNING always run to completion.
 * Every call that would start something new while one of them is running
 * returns false and changes nothing.
 *
 * Time is injected (`nowMs`) on every call; tick(nowMs) pulls the running
 * animation and settles the phase when it is over.
 */

import { NavigatorConfig } from './config';
import { EventBus, NavigatorEvents } from './event_bus';
import { GestureClassifier } from './gesture_classifier';
import { EasingFn, ProgressAnimation, resolveEasing } from './progress_animation';
import {
    BUSY_PHASES,
    Direction,
    PeripheralRegion,
    Point,
    Region,
    ReturnSource,
    SessionPhase,
    ViewportSize,
    axisOf,
    clamp,
    regionRevealedBy,
    returnDirectionFor,
} from './types';
import type { ViewportSource } from './viewport';

// ── Snapshot ──────────────────────────────────────────────────────────────────

export interface SessionSnapshot {
    readonly phase: SessionPhase;
    /** Region shown as primary once settled.  Stays the old region until a transition completes. */
    readonly activeRegion: Region;
    /** TransitionProgress, always within [0, 1]. */
    readonly progress: number;
    /** Signed drag accumulator; [-1, 0] for LEFT/UP, [0, 1] for RIGHT/DOWN. */
    readonly signedProgress: number;
    /** Direction driving the interpolation, or null when nothing moves. */
    readonly direction: Direction | null;
    /** Region being revealed (forward) or left behind (return). */
    readonly peripheral: PeripheralRegion | null;
    readonly isBusy: boolean;
}

export interface TransitionSessionOptions {
    readonly config: NavigatorConfig;
    readonly eventBus: EventBus<NavigatorEvents>;
    readonly viewport: ViewportSource;
    readonly isRegionPresent: (region: PeripheralRegion) => boolean;
    /** Called on every phase change, before PHASE_CHANGED goes out on the bus. */
    readonly onPhaseChange?: (from: SessionPhase, to: SessionPhase) => void;
}

// ── TransitionSession ─────────────────────────────────────────────────────────

export class TransitionSession {

    private readonly _config: NavigatorConfig;
    private readonly _bus: EventBus<NavigatorEvents>;
    private readonly _viewport: ViewportSource;
    private readonly _isRegionPresent: (region: PeripheralRegion) => boolean;
    private readonly _easing: EasingFn;
    private readonly _classifier: GestureClassifier;
    private readonly _onPhaseChange: ((from: SessionPhase, to: SessionPhase) => void) | null;

    private _phase: SessionPhase = 'IDLE';
    private _activeRegion: Region = 'CENTER';
    private _progress = 0;
    private _signedProgress = 0;
    private _direction: Direction | null = null;
    private _peripheral: PeripheralRegion | null = null;
    private _animation: ProgressAnimation | null = null;
    private _lastPoint: Point | null = null;
    private _hapticArmed = true;
    private _returnBlocker: (() => boolean) | null = null;

    constructor(options: TransitionSessionOptions) {
        this._config = options.config;
        this._bus = options.eventBus;
        this._viewport = options.viewport;
        this._isRegionPresent = options.isRegionPresent;
        this._easing = resolveEasing(options.config.easing);
        this._classifier = new GestureClassifier({
            zone: options.config.detectionZone,
            lockThresholdPx: options.config.directionLockThresholdPx,
            isRegionPresent: options.isRegionPresent,
        });
        this._onPhaseChange = options.onPhaseChange ?? null;
    }

    // ── Queries ───────────────────────────────────────────────────────────────

    get phase(): SessionPhase { return this._phase; }

    get activeRegion(): Region { return this._activeRegion; }

    get progress(): number { return clamp(this._progress, 0, 1); }

    get isBusy(): boolean { return BUSY_PHASES.has(this._phase); }

    /** Whether requestReturn() would be accepted right now. */
    get canReturn(): boolean {
        return this._phase === 'PERIPHERAL_ACTIVE'
            && this._activeRegion !== 'CENTER'
            && this._returnBlocker?.() !== true;
    }

    get snapshot(): SessionSnapshot {
        return {
            phase:          this._phase,
            activeRegion:   this._activeRegion,
            progress:       this.progress,
            signedProgress: this._signedProgress,
            direction:      this._direction,
            peripheral:     this._peripheral,
            isBusy:         this.isBusy,
        };
    }

    /**
     * While the predicate returns true, external returns (button, facade,
     * platform back) are refused.  The navigator points it at the active
     * swipe-back session so the two return paths never both fire.
     */
    setReturnBlocker(blocker: (() => boolean) | null): void {
        this._returnBlocker = blocker;
    }

    // ── Pointer input ─────────────────────────────────────────────────────────

    pointerDown(point: Point, _nowMs: number): boolean {
        if (this._phase !== 'IDLE') {
            this._debug(`pointerDown ignored: phase ${this._phase}`);
            return false;
        }
        const canSwipe = this._config.canSwipeFromCenter?.() ?? true;
        if (!canSwipe) {
            this._debug('pointerDown ignored: canSwipeFromCenter returned false');
            return false;
        }
        this._classifier.begin(point);
        this._lastPoint = point;
        this._progress = 0;
        this._signedProgress = 0;
        this._direction = null;
        this._peripheral = null;
        this._hapticArmed = true;
        this._enterPhase('DRAGGING');
        return true;
    }

    pointerMove(point: Point, _nowMs: number): void {
        if (this._phase !== 'DRAGGING' && this._phase !== 'LOCKED') return;

        const previous = this._lastPoint ?? point;
        this._lastPoint = point;
        const viewport = this._viewport.size;

        if (this._phase === 'DRAGGING') {
            const update = this._classifier.update(point, viewport);
            if (!update.justLocked || update.direction === null) return;

            this._direction = update.direction;
            this._peripheral = regionRevealedBy(update.direction);
            this._enterPhase('LOCKED');
            // The displacement that earned the lock counts toward progress.
            this._accumulate(update.totalDelta, viewport);
            return;
        }

        this._accumulate({ x: point.x - previous.x, y: point.y - previous.y }, viewport);
    }

    pointerUp(nowMs: number): void {
        this._release(nowMs, false);
    }

    pointerCancel(nowMs: number): void {
        this._release(nowMs, true);
    }

    // ── Imperative input ──────────────────────────────────────────────────────

    /** Programmatic equivalent of a full drag in `direction`. Only from IDLE. */
    navigate(direction: Direction, nowMs: number): boolean {
        if (this._phase !== 'IDLE') {
            this._debug(`navigate(${direction}) ignored: phase ${this._phase}`);
            return false;
        }
        const target = regionRevealedBy(direction);
        if (!this._isRegionPresent(target)) {
            this._debug(`navigate(${direction}) ignored: ${target} region is absent`);
            return false;
        }
        this._direction = direction;
        this._peripheral = target;
        this._progress = 0;
        this._signedProgress = 0;
        this._startAnimation('COMMITTING_FORWARD', 1, nowMs);
        return true;
    }

    /** Button, facade or platform back.  Only from PERIPHERAL_ACTIVE. */
    requestReturn(source: ReturnSource, nowMs: number): boolean {
        const from = this._activeRegion;
        if (this._phase !== 'PERIPHERAL_ACTIVE' || from === 'CENTER') {
            this._debug(`return (${source}) ignored: phase ${this._phase}`);
            return false;
        }
        if (this._returnBlocker?.() === true) {
            this._debug(`return (${source}) ignored: swipe-back in flight`);
            return false;
        }
        this._peripheral = from;
        this._direction = returnDirectionFor(from);
        this._progress = 1;
        this._signedProgress = 0;
        this._startAnimation('RETURNING', 0, nowMs);
        this._bus.publish('PAGE_CHANGED', { region: 'CENTER' });
        return true;
    }

    /**
     * The peripheral region's own swipe-back finished its animation.  The
     * visual return already happened there, so this settles straight to IDLE.
     * Only the owner of that swipe-back session calls this; commits seen on a
     * shared bus may belong to another navigator.
     */
    completeSwipeBack(region: PeripheralRegion): boolean {
        if (this._phase !== 'PERIPHERAL_ACTIVE' || this._activeRegion !== region) {
            this._debug(`swipe-back commit from ${region} ignored: phase ${this._phase}`);
            return false;
        }
        this._settleAtCenter();
        this._bus.publish('PAGE_CHANGED', { region: 'CENTER' });
        this._bus.publish('RETURNED_TO_CENTER', null);
        return true;
    }

    // ── Animation ─────────────────────────────────────────────────────────────

    /** Pull the running animation forward to `nowMs`; settle if it is over. */
    tick(nowMs: number): SessionSnapshot {
        const animation = this._animation;
        if (animation === null) return this.snapshot;

        const sample = animation.sample(nowMs);
        if (!sample.ok) {
            console.error(`[Session] ${this._phase} animation failed, settling at nearest terminal value`, sample.error);
            this._recoverFromFailure();
            return this.snapshot;
        }

        this._progress = sample.value;
        if (sample.done) {
            this._finishAnimation();
        }
        return this.snapshot;
    }

    dispose(): void {
        this._animation = null;
        this._returnBlocker = null;
        this._classifier.reset();
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private _accumulate(delta: Point, viewport: ViewportSize): void {
        const direction = this._direction;
        if (direction === null) return;

        const horizontal = axisOf(direction) === 'HORIZONTAL';
        const dimension = horizontal ? viewport.width : viewport.height;
        const axisDelta = horizontal ? delta.x : delta.y;
        if (dimension <= 0) return;

        const next = this._signedProgress + axisDelta / dimension;
        this._signedProgress = direction === 'LEFT' || direction === 'UP'
            ? clamp(next, -1, 0)
            : clamp(next, 0, 1);
        this._progress = Math.abs(this._signedProgress);
        this._updateHaptic();
    }

    private _updateHaptic(): void {
        const threshold = this._config.swipeThreshold;
        if (this._progress >= threshold && this._hapticArmed) {
            this._hapticArmed = false;
            this._bus.publish('HAPTIC_TRIGGER', { intensity: this._config.hapticIntensity, source: 'threshold' });
        } else if (this._progress < threshold) {
            this._hapticArmed = true;
        }
    }

    private _release(nowMs: number, cancelled: boolean): void {
        if (this._phase === 'DRAGGING') {
            // Never locked (or inert): nothing moved, nothing to animate.
            this._clearGesture();
            this._enterPhase('IDLE');
            return;
        }
        if (this._phase !== 'LOCKED') return;

        const target = this._peripheral;
        const commit = !cancelled
            && target !== null
            && this._progress >= this._config.swipeThreshold
            && this._isRegionPresent(target);

        if (!commit && target !== null && !this._isRegionPresent(target)) {
            this._debug(`release toward absent ${target} region, cancelling`);
        }

        this._lastPoint = null;
        this._classifier.reset();
        this._startAnimation(commit ? 'COMMITTING_FORWARD' : 'COMMITTING_BACK', commit ? 1 : 0, nowMs);
    }

    private _startAnimation(phase: SessionPhase, to: number, nowMs: number): void {
        this._animation = new ProgressAnimation(
            this.progress,
            to,
            nowMs,
            this._config.transitionDurationMs,
            this._easing,
        );
        this._enterPhase(phase);
    }

    private _finishAnimation(): void {
        switch (this._phase) {
            case 'COMMITTING_FORWARD':
                this._settleAtPeripheral();
                break;
            case 'COMMITTING_BACK':
                this._settleBackToIdle();
                break;
            case 'RETURNING':
                this._settleAtCenter();
                this._bus.publish('RETURNED_TO_CENTER', null);
                break;
            default:
                this._animation = null;
        }
    }

    /**
     * Animation failure: commits and returns snap to the closer of 0 and 1
     * and settle the matching phase.  A failed cancel always settles IDLE.
     */
    private _recoverFromFailure(): void {
        const reachedFar = this.progress >= 0.5;
        switch (this._phase) {
            case 'COMMITTING_FORWARD':
                if (reachedFar) this._settleAtPeripheral();
                else this._settleBackToIdle();
                break;
            case 'RETURNING': {
                const from = this._peripheral;
                if (reachedFar && from !== null) {
                    this._animation = null;
                    this._progress = 1;
                    this._direction = null;
                    this._enterPhase('PERIPHERAL_ACTIVE');
                    // PAGE_CHANGED(CENTER) went out when the return began.
                    this._bus.publish('PAGE_CHANGED', { region: from });
                } else {
                    this._settleAtCenter();
                    this._bus.publish('RETURNED_TO_CENTER', null);
                }
                break;
            }
            default:
                // COMMITTING_BACK: a cancel lands on IDLE however far the drag got.
                this._settleBackToIdle();
        }
    }

    private _settleAtPeripheral(): void {
        const target = this._peripheral;
        if (target === null) {
            this._settleBackToIdle();
            return;
        }
        this._animation = null;
        this._progress = 1;
        this._signedProgress = 0;
        this._direction = null;
        this._activeRegion = target;
        this._clearGesture();
        this._enterPhase('PERIPHERAL_ACTIVE');
        this._bus.publish('PAGE_CHANGED', { region: target });
        this._bus.publish('REGION_OPENED', { region: target });
    }

    private _settleBackToIdle(): void {
        this._animation = null;
        this._progress = 0;
        this._signedProgress = 0;
        this._direction = null;
        this._peripheral = null;
        this._clearGesture();
        this._enterPhase('IDLE');
    }

    private _settleAtCenter(): void {
        this._activeRegion = 'CENTER';
        this._settleBackToIdle();
    }

    private _clearGesture(): void {
        this._lastPoint = null;
        this._hapticArmed = true;
        this._classifier.reset();
    }

    private _enterPhase(next: SessionPhase): void {
        if (next === this._phase) return;
        const from = this._phase;
        this._phase = next;
        this._onPhaseChange?.(from, next);
        this._bus.publish('PHASE_CHANGED', { from, to: next });
    }

    private _debug(message: string): void {
        if (this._config.debug) {
            console.warn(`[Session] ${message}`);
        }
    }
}
