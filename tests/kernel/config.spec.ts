import { describe, it, expect } from '@jest/globals';
import {
    NavigatorConfigError,
    parseNavigatorConfig,
    previewLabelFor,
    swipeBackEnabledFor,
} from '../../src/kernel/config';

function issuesOf(input: unknown): ReadonlyArray<string> {
    try {
        parseNavigatorConfig(input);
    } catch (error) {
        if (error instanceof NavigatorConfigError) return error.issues;
        throw error;
    }
    throw new Error('expected the configuration to be rejected');
}

describe('parseNavigatorConfig — defaults', () => {

    it('Given no input, Then every default is filled in', () => {
        const config = parseNavigatorConfig();
        expect(config.swipeThreshold).toBe(0.25);
        expect(config.detectionZone).toEqual({ horizontalBandWidth: 100, verticalBandHeight: 200 });
        expect(config.directionLockThresholdPx).toBe(5);
        expect(config.transitionDurationMs).toBe(300);
        expect(config.easing).toBe('easeOut');
        expect(config.zoomOutScale).toBe(1);
        expect(config.opacityFloor).toBe(0.1);
        expect(config.swipeBack).toEqual({ left: false, right: false, top: false, bottom: false });
        expect(config.swipeBackEdgeFraction).toBe(0.2);
        expect(config.hapticIntensity).toBe('heavy');
        expect(config.centerEntrance).toEqual({ enabled: false, durationMs: 200 });
        expect(config.debug).toBe(false);
        expect(config.canSwipeFromCenter).toBeUndefined();
    });

    it('Given no preview input, Then the preview defaults carry the edge labels', () => {
        const { preview } = parseNavigatorConfig({});
        expect(preview).toEqual({
            enabled: false,
            appearanceThreshold: 0.15,
            minScale: 0.8,
            maxScale: 1.0,
            overscrollScaleFactor: 1.1,
            shakeAmplitudePx: 3,
            shakeFrequencyHz: 10,
            offsetFromEdgePx: 20,
            labels: { left: 'Left', right: 'Right', top: 'Top', bottom: 'Bottom' },
        });
    });

    it('Given no return button input, Then it is hidden with the stock dimensions', () => {
        const { returnButton } = parseNavigatorConfig(null);
        expect(returnButton).toEqual({ visible: false, buttonSizePx: 48, iconSizePx: 30, edgeOffsetPx: 6 });
    });

    it('Given partial nested input, Then only the given keys change', () => {
        const config = parseNavigatorConfig({ detectionZone: { horizontalBandWidth: 60 }, preview: { labels: { top: 'Search' } } });
        expect(config.detectionZone).toEqual({ horizontalBandWidth: 60, verticalBandHeight: 200 });
        expect(previewLabelFor(config, 'TOP')).toBe('Search');
        expect(previewLabelFor(config, 'LEFT')).toBe('Left');
    });

    it('Given host functions, Then they pass through untouched', () => {
        const easing = (t: number): number => t * t;
        const canSwipeFromCenter = (): boolean => false;
        const config = parseNavigatorConfig({ easing, canSwipeFromCenter });
        expect(config.easing).toBe(easing);
        expect(config.canSwipeFromCenter).toBe(canSwipeFromCenter);
    });
});

describe('parseNavigatorConfig — rejection', () => {

    it('Given a threshold outside (0, 1), Then NavigatorConfigError names the path', () => {
        const issues = issuesOf({ swipeThreshold: 1.5 });
        expect(issues).toHaveLength(1);
        expect(issues[0]).toMatch(/^swipeThreshold: /);
    });

    it('Given an unknown key, Then it is reported against the root', () => {
        const issues = issuesOf({ swipeThreshhold: 0.3 });
        expect(issues[0]).toMatch(/^<root>: Unrecognized key/);
    });

    it('Given minScale above maxScale, Then the refinement message is reported', () => {
        expect(issuesOf({ preview: { minScale: 1.2, maxScale: 1.0 } }))
            .toEqual(['preview.minScale: minScale must not exceed maxScale']);
    });

    it('Given an unknown easing name, Then easing is reported', () => {
        const issues = issuesOf({ easing: 'bouncy' });
        expect(issues[0]).toMatch(/^easing: /);
    });

    it('Given a non-function customRenderer, Then its custom message is reported', () => {
        expect(issuesOf({ returnButton: { customRenderer: 'button.png' } }))
            .toEqual(['returnButton.customRenderer: customRenderer must be a function']);
        expect(issuesOf({ preview: { customRenderer: 42 } }))
            .toEqual(['preview.customRenderer: customRenderer must be a function']);
    });

    it('Given several problems, Then the error message lists each on its own line', () => {
        let message = '';
        try {
            parseNavigatorConfig({ transitionDurationMs: -1, hapticIntensity: 'loud' });
        } catch (error) {
            if (error instanceof Error) message = error.message;
        }
        const lines = message.split('\n');
        expect(lines[0]).toBe('[Navigator] Invalid configuration:');
        expect(lines).toHaveLength(3);
    });
});

describe('swipeBackEnabledFor', () => {

    it('Given only top enabled, Then TOP is on and BOTTOM stays off', () => {
        const config = parseNavigatorConfig({ swipeBack: { top: true } });
        expect(swipeBackEnabledFor(config, 'TOP')).toBe(true);
        expect(swipeBackEnabledFor(config, 'BOTTOM')).toBe(false);
        expect(swipeBackEnabledFor(config, 'LEFT')).toBe(false);
    });
});
