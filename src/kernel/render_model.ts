/**
 * render_model.ts — session state → what the host should draw.
 *
 * Pure: same input, same frame.  Layers are listed bottom → top; the
 * peripheral region is always stacked above CENTER.
 *
 * Interpolation, progress p, direction d:
 *   outgoing: position lerp(origin, exit(d), p)   opacity lerp(1, floor, p)   scale lerp(1, zoomOut, p)
 *   incoming: position lerp(entry(d), origin, p)  opacity lerp(floor, 1, p)   scale 1
 * On the way back (RETURNING, swipe-back) CENTER is incoming, the
 * peripheral region is outgoing, d is the return direction and p is the
 * fraction of the return already travelled.
 */

import type { NavigatorConfig, ReturnButtonRenderer } from './config';
import { incomingPosition, outgoingPosition } from './geometry_mapper';
import type { PreviewFrame } from './preview_overlay';
import type { SwipeBackSnapshot } from './swipe_back_session';
import type { SessionSnapshot } from './transition_session';
import {
    Direction,
    EdgeAnchor,
    ORIGIN,
    PeripheralRegion,
    Point,
    Region,
    SessionPhase,
    ViewportSize,
    lerp,
    returnDirectionFor,
} from './types';

export type LayerRole = 'PRIMARY' | 'OUTGOING' | 'INCOMING';

export interface LayerFrame {
    readonly region: Region;
    readonly role: LayerRole;
    readonly offset: Point;
    readonly opacity: number;
    readonly scale: number;
}

export type ReturnIcon = 'chevron_left' | 'chevron_right' | 'expand_less' | 'expand_more';

export interface ReturnButtonFrame {
    readonly region: PeripheralRegion;
    readonly icon: ReturnIcon;
    readonly anchor: EdgeAnchor;
    readonly edgeOffsetPx: number;
    readonly sizePx: number;
    readonly iconSizePx: number;
    readonly onPress: () => void;
    /** Whatever the host's customRenderer returned, or null without one. */
    readonly custom: unknown;
}

export interface RenderDescription {
    readonly phase: SessionPhase;
    readonly activeRegion: Region;
    readonly progress: number;
    readonly layers: ReadonlyArray<LayerFrame>;
    readonly preview: PreviewFrame | null;
    readonly returnButton: ReturnButtonFrame | null;
}

export interface FrameInput {
    readonly session: SessionSnapshot;
    readonly swipeBack: SwipeBackSnapshot | null;
    readonly preview: PreviewFrame | null;
    readonly viewport: ViewportSize;
    readonly config: NavigatorConfig;
    /** Center fade-in multiplier; 1 when the entrance animation is off or done. */
    readonly centerEntranceOpacity: number;
    readonly onReturnPress: () => void;
}

// ── Return affordance ─────────────────────────────────────────────────────────

/** The button points back toward CENTER, from the edge CENTER sits behind. */
export function returnButtonPlacement(region: PeripheralRegion): { icon: ReturnIcon; anchor: EdgeAnchor } {
    switch (region) {
        case 'LEFT':   return { icon: 'chevron_right', anchor: 'CENTER_RIGHT' };
        case 'RIGHT':  return { icon: 'chevron_left',  anchor: 'CENTER_LEFT' };
        case 'TOP':    return { icon: 'expand_more',   anchor: 'BOTTOM_CENTER' };
        case 'BOTTOM': return { icon: 'expand_less',   anchor: 'TOP_CENTER' };
    }
}

function describeReturnButton(input: FrameInput, region: PeripheralRegion): ReturnButtonFrame | null {
    const cfg = input.config.returnButton;
    if (!cfg.visible) return null;
    if (input.swipeBack !== null && input.swipeBack.phase === 'DRAGGING') return null;

    const renderer: ReturnButtonRenderer | undefined = cfg.customRenderer;
    return {
        region,
        ...returnButtonPlacement(region),
        edgeOffsetPx: cfg.edgeOffsetPx,
        sizePx:       cfg.buttonSizePx,
        iconSizePx:   cfg.iconSizePx,
        onPress:      input.onReturnPress,
        custom:       renderer ? renderer(input.onReturnPress, region) : null,
    };
}

// ── Layers ────────────────────────────────────────────────────────────────────

function primary(region: Region, opacity = 1): LayerFrame {
    return { region, role: 'PRIMARY', offset: ORIGIN, opacity, scale: 1 };
}

function transitionLayers(
    outgoing: Region,
    incoming: Region,
    direction: Direction,
    p: number,
    input: FrameInput,
): { outgoing: LayerFrame; incoming: LayerFrame } {
    const floor = input.config.opacityFloor;
    return {
        outgoing: {
            region:  outgoing,
            role:    'OUTGOING',
            offset:  outgoingPosition(direction, input.viewport, p),
            opacity: lerp(1, floor, p),
            scale:   lerp(1, input.config.zoomOutScale, p),
        },
        incoming: {
            region:  incoming,
            role:    'INCOMING',
            offset:  incomingPosition(direction, input.viewport, p),
            opacity: lerp(floor, 1, p),
            scale:   1,
        },
    };
}

/** CENTER coming back over a leaving peripheral region, `travelled` ∈ [0, 1]. */
function returnLayers(region: PeripheralRegion, direction: Direction, travelled: number, input: FrameInput): LayerFrame[] {
    const frames = transitionLayers(region, 'CENTER', direction, travelled, input);
    return [frames.incoming, frames.outgoing];
}

export function describeFrame(input: FrameInput): RenderDescription {
    const { session } = input;
    const base = {
        phase:        session.phase,
        activeRegion: session.activeRegion,
        progress:     session.progress,
    };
    const center = primary('CENTER', input.centerEntranceOpacity);

    switch (session.phase) {
        case 'LOCKED':
        case 'COMMITTING_FORWARD':
        case 'COMMITTING_BACK': {
            const direction = session.direction;
            const target = session.peripheral;
            // Preview mode keeps the content still until a commit actually starts.
            const previewMode = input.config.preview.enabled && session.phase !== 'COMMITTING_FORWARD';
            if (direction === null || target === null || previewMode) {
                return { ...base, layers: [center], preview: input.preview, returnButton: null };
            }
            const frames = transitionLayers('CENTER', target, direction, session.progress, input);
            return { ...base, layers: [frames.outgoing, frames.incoming], preview: null, returnButton: null };
        }

        case 'PERIPHERAL_ACTIVE': {
            const region = session.activeRegion;
            if (region === 'CENTER') {
                return { ...base, layers: [center], preview: null, returnButton: null };
            }
            const swipeBack = input.swipeBack;
            const layers = swipeBack !== null && (swipeBack.phase !== 'IDLE' || swipeBack.progress > 0)
                ? returnLayers(region, returnDirectionFor(region), swipeBack.progress, input)
                : [primary(region)];
            return { ...base, layers, preview: null, returnButton: describeReturnButton(input, region) };
        }

        case 'RETURNING': {
            const region = session.peripheral;
            const direction = session.direction;
            if (region === null || direction === null) {
                return { ...base, layers: [center], preview: null, returnButton: null };
            }
            return {
                ...base,
                layers: returnLayers(region, direction, 1 - session.progress, input),
                preview: null,
                returnButton: null,
            };
        }

        case 'IDLE':
        case 'DRAGGING':
            return { ...base, layers: [center], preview: null, returnButton: null };
    }
}
