/**
 * progress_animation.ts — pull-based animation of a single progress scalar.
 *
 * An animation is a value: { from, to, startMs, durationMs, easing }.
 * Nothing ticks it.  Callers ask for the value at a timestamp and the
 * animation answers, flagging `done` once the duration has elapsed.
 *
 * The easing may be supplied by the host.  If it throws or returns a
 * non-finite number the animation reports an AnimationFailure instead of a
 * value; the owner decides how to settle.
 */

export type EasingFn = (t: number) => number;

export type EasingName = 'linear' | 'easeIn' | 'easeOut' | 'easeInOut';

export const EASINGS: Readonly<Record<EasingName, EasingFn>> = {
    linear:    (t) => t,
    easeIn:    (t) => t * t * t,
    easeOut:   (t) => 1 - Math.pow(1 - t, 3),
    easeInOut: (t) => (t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2),
};

export function resolveEasing(easing: EasingName | EasingFn): EasingFn {
    return typeof easing === 'function' ? easing : EASINGS[easing];
}

export class AnimationFailure extends Error {
    constructor(public readonly reason: unknown) {
        super(`Animation failed: ${reason instanceof Error ? reason.message : String(reason)}`);
        this.name = 'AnimationFailure';
    }
}

export type AnimationSample =
    | { readonly ok: true;  readonly value: number; readonly done: boolean }
    | { readonly ok: false; readonly error: AnimationFailure };

export class ProgressAnimation {

    constructor(
        public readonly from: number,
        public readonly to: number,
        public readonly startMs: number,
        public readonly durationMs: number,
        private readonly easing: EasingFn,
    ) {}

    /** Linear time fraction in [0, 1]. */
    fractionAt(nowMs: number): number {
        if (this.durationMs <= 0) return 1;
        const t = (nowMs - this.startMs) / this.durationMs;
        return Math.min(1, Math.max(0, t));
    }

    sample(nowMs: number): AnimationSample {
        const t = this.fractionAt(nowMs);
        if (t >= 1) {
            // The end value is exact regardless of the curve.
            return { ok: true, value: this.to, done: true };
        }
        let eased: number;
        try {
            eased = this.easing(t);
        } catch (error) {
            return { ok: false, error: new AnimationFailure(error) };
        }
        if (!Number.isFinite(eased)) {
            return { ok: false, error: new AnimationFailure(`easing returned ${eased} at t=${t}`) };
        }
        const value = this.from + (this.to - this.from) * eased;
        return { ok: true, value: Math.min(1, Math.max(0, value)), done: false };
    }
}
