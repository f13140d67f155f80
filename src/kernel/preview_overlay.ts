/**
 * preview_overlay.ts — visuals of the optional destination preview.
 *
 * Shown only while the session is LOCKED and previews are enabled; the
 * content itself does not move in that mode.  Once COMMITTING_FORWARD
 * starts the real content slides instead and this engine returns null.
 *
 *   appearance = clamp(p / appearanceThreshold, 0, 1)     → opacity, scale min→max
 *   overscroll = clamp((p - t) / (1 - t), 0, 1), p > t    → scale × (1 → factor)
 *   jitter     = amplitude · overscroll · sin(2π · hz · seconds), across the swipe axis
 *
 * preview.customRenderer(region), when configured, supplies the host's own
 * preview content; the label chip is the fallback.
 */

import { NavigatorConfig, PreviewConfig, previewLabelFor } from './config';
import { Direction, EdgeAnchor, PeripheralRegion, Point, SessionPhase, axisOf, clamp, lerp, regionRevealedBy } from './types';

export interface PreviewFrame {
    readonly region: PeripheralRegion;
    readonly label: string;
    readonly anchor: EdgeAnchor;
    /** Inset from the anchored edge, px. */
    readonly edgeInsetPx: number;
    readonly opacity: number;
    readonly scale: number;
    /** Shake offset, perpendicular to the swipe axis. */
    readonly offset: Point;
    readonly appearanceRatio: number;
    readonly overscrollRatio: number;
    /** preview.customRenderer's output for this region, or null to draw the label. */
    readonly custom: unknown;
}

export interface PreviewInput {
    readonly phase: SessionPhase;
    readonly direction: Direction | null;
    readonly progress: number;
    readonly nowMs: number;
}

/** The preview sits on the edge its region lives behind. */
export function anchorFor(region: PeripheralRegion): EdgeAnchor {
    switch (region) {
        case 'LEFT':   return 'CENTER_LEFT';
        case 'RIGHT':  return 'CENTER_RIGHT';
        case 'TOP':    return 'TOP_CENTER';
        case 'BOTTOM': return 'BOTTOM_CENTER';
    }
}

export class PreviewOverlayEngine {

    private readonly preview: PreviewConfig;

    constructor(private readonly config: NavigatorConfig) {
        this.preview = config.preview;
    }

    get enabled(): boolean {
        return this.preview.enabled;
    }

    appearanceRatio(progress: number): number {
        return clamp(progress / this.preview.appearanceThreshold, 0, 1);
    }

    overscrollRatio(progress: number): number {
        const threshold = this.config.swipeThreshold;
        if (progress <= threshold) return 0;
        return clamp((progress - threshold) / (1 - threshold), 0, 1);
    }

    /** Perpendicular shake magnitude at `nowMs`; 0 below the commit threshold. */
    jitter(overscroll: number, nowMs: number): number {
        if (overscroll <= 0) return 0;
        const seconds = nowMs / 1000;
        return this.preview.shakeAmplitudePx * overscroll * Math.sin(2 * Math.PI * this.preview.shakeFrequencyHz * seconds);
    }

    compute(input: PreviewInput): PreviewFrame | null {
        if (!this.preview.enabled || input.phase !== 'LOCKED' || input.direction === null) {
            return null;
        }
        const progress = clamp(input.progress, 0, 1);
        if (progress <= 0) return null;

        const region = regionRevealedBy(input.direction);
        const appearance = this.appearanceRatio(progress);
        const overscroll = this.overscrollRatio(progress);

        let scale = lerp(this.preview.minScale, this.preview.maxScale, appearance);
        scale *= lerp(1, this.preview.overscrollScaleFactor, overscroll);

        const shake = this.jitter(overscroll, input.nowMs);
        const offset = axisOf(input.direction) === 'HORIZONTAL'
            ? { x: 0, y: shake }
            : { x: shake, y: 0 };

        return {
            region,
            label:           previewLabelFor(this.config, region),
            anchor:          anchorFor(region),
            edgeInsetPx:     this.preview.offsetFromEdgePx,
            opacity:         appearance,
            scale,
            offset,
            appearanceRatio: appearance,
            overscrollRatio: overscroll,
            custom:          this.preview.customRenderer?.(region) ?? null,
        };
    }
}
