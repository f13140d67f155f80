import { z } from 'zod';
import type { EasingFn } from './progress_animation';
import type { PeripheralRegion } from './types';

// Runtime validation of everything the host can pass in.  Parsed output
// always carries every default, so the kernel never reads an optional.

export type ReturnButtonRenderer = (onPress: () => void, region: PeripheralRegion) => unknown;
/** Host-drawn preview for a region; null or undefined falls back to the label chip. */
export type PreviewRenderer = (region: PeripheralRegion) => unknown;

const isFunction = (v: unknown): boolean => typeof v === 'function';

const fraction = z.number().gt(0).lt(1);
const nonNegative = z.number().finite().nonnegative();

export const DetectionZoneSchema = z.object({
    horizontalBandWidth: nonNegative.default(100),
    verticalBandHeight:  nonNegative.default(200),
}).strict();

export const SwipeBackSchema = z.object({
    left:   z.boolean().default(false),
    right:  z.boolean().default(false),
    top:    z.boolean().default(false),
    bottom: z.boolean().default(false),
}).strict();

export const PreviewConfigSchema = z.object({
    enabled:               z.boolean().default(false),
    appearanceThreshold:   fraction.default(0.15),
    minScale:              z.number().positive().default(0.8),
    maxScale:              z.number().positive().default(1.0),
    overscrollScaleFactor: z.number().min(1).default(1.1),
    shakeAmplitudePx:      nonNegative.default(3),
    shakeFrequencyHz:      nonNegative.default(10),
    offsetFromEdgePx:      nonNegative.default(20),
    labels: z.object({
        left:   z.string().default('Left'),
        right:  z.string().default('Right'),
        top:    z.string().default('Top'),
        bottom: z.string().default('Bottom'),
    }).strict().default({}),
    customRenderer: z.custom<PreviewRenderer>(isFunction, 'customRenderer must be a function').optional(),
}).strict().refine((p) => p.minScale <= p.maxScale, {
    message: 'minScale must not exceed maxScale',
    path: ['minScale'],
});

export const ReturnButtonConfigSchema = z.object({
    visible:        z.boolean().default(false),
    buttonSizePx:   z.number().positive().default(48),
    iconSizePx:     z.number().positive().default(30),
    edgeOffsetPx:   nonNegative.default(6),
    customRenderer: z.custom<ReturnButtonRenderer>(isFunction, 'customRenderer must be a function').optional(),
}).strict();

export const CenterEntranceSchema = z.object({
    enabled:    z.boolean().default(false),
    durationMs: nonNegative.default(200),
}).strict();

export const NavigatorConfigSchema = z.object({
    swipeThreshold:           fraction.default(0.25),
    detectionZone:            DetectionZoneSchema.default({}),
    directionLockThresholdPx: nonNegative.default(5),
    transitionDurationMs:     nonNegative.default(300),
    easing: z.union([
        z.enum(['linear', 'easeIn', 'easeOut', 'easeInOut']),
        z.custom<EasingFn>(isFunction, 'easing must be a curve name or a function'),
    ]).default('easeOut'),
    zoomOutScale:          z.number().positive().default(1.0),
    opacityFloor:          z.number().min(0).lt(1).default(0.1),
    swipeBack:             SwipeBackSchema.default({}),
    swipeBackEdgeFraction: z.number().gt(0).max(1).default(0.2),
    preview:               PreviewConfigSchema.default({}),
    returnButton:          ReturnButtonConfigSchema.default({}),
    canSwipeFromCenter:    z.custom<() => boolean>(isFunction, 'canSwipeFromCenter must be a function').optional(),
    hapticIntensity:       z.enum(['soft', 'medium', 'heavy']).default('heavy'),
    centerEntrance:        CenterEntranceSchema.default({}),
    debug:                 z.boolean().default(false),
}).strict();

export type NavigatorConfigInput = z.input<typeof NavigatorConfigSchema>;
export type NavigatorConfig = z.output<typeof NavigatorConfigSchema>;
export type PreviewConfig = NavigatorConfig['preview'];
export type ReturnButtonConfig = NavigatorConfig['returnButton'];
export type DetectionZone = NavigatorConfig['detectionZone'];

/** Thrown when the host passes configuration the schema rejects. */
export class NavigatorConfigError extends Error {
    constructor(public readonly issues: ReadonlyArray<string>) {
        super(`[Navigator] Invalid configuration:\n  ${issues.join('\n  ')}`);
        this.name = 'NavigatorConfigError';
    }
}

export function parseNavigatorConfig(input: unknown = {}): NavigatorConfig {
    const result = NavigatorConfigSchema.safeParse(input ?? {});
    if (!result.success) {
        throw new NavigatorConfigError(
            result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        );
    }
    return result.data;
}

export function swipeBackEnabledFor(config: NavigatorConfig, region: PeripheralRegion): boolean {
    switch (region) {
        case 'LEFT':   return config.swipeBack.left;
        case 'RIGHT':  return config.swipeBack.right;
        case 'TOP':    return config.swipeBack.top;
        case 'BOTTOM': return config.swipeBack.bottom;
    }
}

export function previewLabelFor(config: NavigatorConfig, region: PeripheralRegion): string {
    switch (region) {
        case 'LEFT':   return config.preview.labels.left;
        case 'RIGHT':  return config.preview.labels.right;
        case 'TOP':    return config.preview.labels.top;
        case 'BOTTOM': return config.preview.labels.bottom;
    }
}
