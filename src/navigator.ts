/**
 * navigator.ts — composition root.
 *
 * Owns one of everything: bus, viewport, plugin supervisor, the top-level
 * TransitionSession, the active region's PeripheralSwipeBackSession (when
 * that region has swipe-back enabled) and the NavigationFacade handed to
 * host code.  The host feeds pointer events and frame timestamps in and
 * draws whatever render(nowMs) describes.
 *
 * Pointer routing: a gesture belongs to whichever session accepted its
 * pointerDown.  While a peripheral region is active that is the swipe-back
 * session; otherwise the TransitionSession.
 *
 * Time: render() and the pointer calls carry the host's frame clock.  Calls
 * without a timestamp (facade, return button, platform back) use the
 * `clock` option when given, else the last timestamp seen, so every
 * animation is sampled on the same timeline that started it.
 *
 * The sessions report to this navigator through direct callbacks.  The bus
 * only carries notifications outward and may be shared between navigators.
 */

import { NavigatorConfig, NavigatorConfigInput, parseNavigatorConfig, swipeBackEnabledFor } from './kernel/config';
import { EventBus, NavigatorEvents } from './kernel/event_bus';
import { NavigatorPlugin, PluginSupervisor } from './kernel/plugin_supervisor';
import { PreviewOverlayEngine } from './kernel/preview_overlay';
import { EASINGS, ProgressAnimation } from './kernel/progress_animation';
import { RenderDescription, describeFrame } from './kernel/render_model';
import { PeripheralSwipeBackSession } from './kernel/swipe_back_session';
import { SessionSnapshot, TransitionSession } from './kernel/transition_session';
import { Direction, PERIPHERAL_REGIONS, PeripheralRegion, Point, Region, ViewportSize } from './kernel/types';
import { Viewport } from './kernel/viewport';
import { NavigationFacade, NavigationTarget } from './navigation_facade';
import { HapticActuator, HapticFeedbackPlugin } from './plugins/haptic_feedback_plugin';
import { RegionCallbacks, RegionCallbacksPlugin } from './plugins/region_callbacks_plugin';

export type RegionPresence = Partial<Record<PeripheralRegion, boolean>>;

export interface SpatialNavigatorOptions {
    config?: NavigatorConfigInput;
    /** Peripheral regions the host supplies content for.  Omitted regions count as present. */
    regions?: RegionPresence;
    /** A Viewport to share, or a fixed starting size. */
    viewport?: Viewport | ViewportSize;
    eventBus?: EventBus<NavigatorEvents>;
    haptics?: HapticActuator;
    callbacks?: RegionCallbacks;
    plugins?: ReadonlyArray<NavigatorPlugin>;
    /** Timestamp source for calls that carry no explicit time; must match render()'s clock. */
    clock?: () => number;
}

type PointerOwner = 'SESSION' | 'SWIPE_BACK';

export class SpatialNavigator implements NavigationTarget {

    public readonly config: NavigatorConfig;
    public readonly eventBus: EventBus<NavigatorEvents>;
    public readonly viewport: Viewport;
    public readonly supervisor: PluginSupervisor;
    public readonly facade: NavigationFacade = new NavigationFacade();

    private readonly session: TransitionSession;
    private readonly preview: PreviewOverlayEngine;
    private readonly clock: (() => number) | null;
    private readonly ownsViewport: boolean;
    private readonly presence: Record<PeripheralRegion, boolean>;

    private swipeBack: PeripheralSwipeBackSession | null = null;
    private pointerOwner: PointerOwner | null = null;
    private entrance: ProgressAnimation | null = null;
    private entrancePending = false;
    private entranceOpacity = 1;
    private lastNowMs = 0;
    private destroyed = false;

    constructor(options: SpatialNavigatorOptions = {}) {
        this.config = parseNavigatorConfig(options.config ?? {});
        this.eventBus = options.eventBus ?? new EventBus<NavigatorEvents>();
        this.clock = options.clock ?? null;

        if (options.viewport instanceof Viewport) {
            this.viewport = options.viewport;
            this.ownsViewport = false;
        } else {
            this.viewport = new Viewport(options.viewport);
            this.ownsViewport = true;
        }

        this.presence = { LEFT: true, RIGHT: true, TOP: true, BOTTOM: true };
        for (const region of PERIPHERAL_REGIONS) {
            const present = options.regions?.[region];
            if (present !== undefined) this.presence[region] = present;
        }

        this.session = new TransitionSession({
            config: this.config,
            eventBus: this.eventBus,
            viewport: this.viewport,
            isRegionPresent: (region) => this.presence[region],
            onPhaseChange: (from, to) => {
                if (from === 'PERIPHERAL_ACTIVE') this.closeSwipeBack();
                if (to === 'PERIPHERAL_ACTIVE') this.openSwipeBack();
            },
        });
        this.session.setReturnBlocker(() => this.swipeBack?.blocksExternalReturn() ?? false);
        this.preview = new PreviewOverlayEngine(this.config);

        this.supervisor = new PluginSupervisor(this.eventBus, this.viewport);
        if (options.haptics) this.supervisor.registerPlugin(new HapticFeedbackPlugin(options.haptics));
        if (options.callbacks) this.supervisor.registerPlugin(new RegionCallbacksPlugin(options.callbacks));
        for (const plugin of options.plugins ?? []) {
            this.supervisor.registerPlugin(plugin);
        }

        this.facade.attach(this);
    }

    // ── Lifecycle ─────────────────────────────────────────────────────────────

    public async start(nowMs?: number): Promise<void> {
        await this.supervisor.initAll();
        await this.supervisor.startAll();

        if (this.config.centerEntrance.enabled) {
            this.entranceOpacity = 0;
            const at = nowMs ?? this.clock?.();
            // Untimed start: the fade begins on the first rendered frame.
            if (at === undefined) this.entrancePending = true;
            else this.beginEntrance(at);
        }
        console.log('[Navigator] Started');
    }

    public async destroy(): Promise<void> {
        if (this.destroyed) return;
        this.destroyed = true;

        this.closeSwipeBack();
        this.session.dispose();
        this.facade.detach();
        this.pointerOwner = null;
        this.entrance = null;
        this.entrancePending = false;

        await this.supervisor.destroyAll();
        if (this.ownsViewport) this.viewport.destroy();
        console.log('[Navigator] Destroyed');
    }

    // ── Queries ───────────────────────────────────────────────────────────────

    get activeRegion(): Region {
        return this.session.activeRegion;
    }

    get snapshot(): SessionSnapshot {
        return this.session.snapshot;
    }

    /** The active region's swipe-back session, if it has one. */
    get swipeBackSession(): PeripheralSwipeBackSession | null {
        return this.swipeBack;
    }

    public isRegionPresent(region: PeripheralRegion): boolean {
        return this.presence[region];
    }

    /** Content may come and go at runtime; an absent target cancels any drag toward it. */
    public setRegionPresent(region: PeripheralRegion, present: boolean): void {
        this.presence[region] = present;
    }

    // ── Pointer input ─────────────────────────────────────────────────────────

    public pointerDown(point: Point, nowMs: number): boolean {
        this.observe(nowMs);
        if (this.destroyed || this.pointerOwner !== null) return false;

        if (this.session.phase === 'PERIPHERAL_ACTIVE') {
            const swipeBack = this.swipeBack;
            if (swipeBack !== null && swipeBack.pointerDown(point, nowMs)) {
                this.pointerOwner = 'SWIPE_BACK';
                return true;
            }
            return false;
        }

        if (this.session.pointerDown(point, nowMs)) {
            this.pointerOwner = 'SESSION';
            return true;
        }
        return false;
    }

    public pointerMove(point: Point, nowMs: number): void {
        this.observe(nowMs);
        switch (this.pointerOwner) {
            case 'SESSION':    this.session.pointerMove(point, nowMs); break;
            case 'SWIPE_BACK': this.swipeBack?.pointerMove(point, nowMs); break;
            case null:         break;
        }
    }

    public pointerUp(nowMs: number): void {
        this.observe(nowMs);
        const owner = this.pointerOwner;
        this.pointerOwner = null;
        switch (owner) {
            case 'SESSION':    this.session.pointerUp(nowMs); break;
            case 'SWIPE_BACK': this.swipeBack?.pointerUp(nowMs); break;
            case null:         break;
        }
    }

    public pointerCancel(nowMs: number): void {
        this.observe(nowMs);
        const owner = this.pointerOwner;
        this.pointerOwner = null;
        switch (owner) {
            case 'SESSION':    this.session.pointerCancel(nowMs); break;
            case 'SWIPE_BACK': this.swipeBack?.pointerCancel(nowMs); break;
            case null:         break;
        }
    }

    // ── Imperative input ──────────────────────────────────────────────────────

    public navigate(direction: Direction, nowMs: number = this.now()): boolean {
        if (this.destroyed) return false;
        return this.session.navigate(direction, this.observe(nowMs));
    }

    public returnToCenter(nowMs: number = this.now()): boolean {
        if (this.destroyed) return false;
        return this.session.requestReturn('programmatic', this.observe(nowMs));
    }

    /** Tap on the return affordance: haptic first, then the animated return. */
    public pressReturnButton(nowMs: number = this.now()): boolean {
        if (this.destroyed || !this.session.canReturn) return false;
        this.eventBus.publish('HAPTIC_TRIGGER', {
            intensity: this.config.hapticIntensity,
            source: 'return_button',
        });
        return this.session.requestReturn('button', this.observe(nowMs));
    }

    /**
     * Platform "pop".  Refused while the region's own swipe-back is dragging,
     * animating or past 0.1 progress, so one physical gesture never returns twice.
     */
    public handlePlatformBack(nowMs: number = this.now()): boolean {
        if (this.destroyed) return false;
        return this.session.requestReturn('platform_back', this.observe(nowMs));
    }

    // ── Frame ─────────────────────────────────────────────────────────────────

    /** Advance every running animation to `nowMs` and describe the frame. */
    public render(nowMs: number): RenderDescription {
        this.observe(nowMs);
        this.tickEntrance(nowMs);
        // Swipe-back first: its commit settles the session synchronously.
        this.swipeBack?.tick(nowMs);
        const session = this.session.tick(nowMs);

        return describeFrame({
            session,
            swipeBack: this.swipeBack?.snapshot ?? null,
            preview: this.preview.compute({
                phase: session.phase,
                direction: session.direction,
                progress: session.progress,
                nowMs,
            }),
            viewport: this.viewport.size,
            config: this.config,
            centerEntranceOpacity: this.entranceOpacity,
            onReturnPress: () => {
                this.pressReturnButton();
            },
        });
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private now(): number {
        return this.clock?.() ?? this.lastNowMs;
    }

    private observe(nowMs: number): number {
        this.lastNowMs = nowMs;
        return nowMs;
    }

    private beginEntrance(nowMs: number): void {
        this.entrance = new ProgressAnimation(0, 1, nowMs, this.config.centerEntrance.durationMs, EASINGS.easeIn);
    }

    private tickEntrance(nowMs: number): void {
        if (this.entrancePending) {
            this.entrancePending = false;
            this.beginEntrance(nowMs);
        }
        const entrance = this.entrance;
        if (entrance === null) return;

        const sample = entrance.sample(nowMs);
        if (!sample.ok) {
            console.error('[Navigator] Center entrance animation failed, showing center', sample.error);
            this.entrance = null;
            this.entranceOpacity = 1;
            return;
        }
        this.entranceOpacity = sample.value;
        if (sample.done) this.entrance = null;
    }

    private openSwipeBack(): void {
        const region = this.session.activeRegion;
        if (region === 'CENTER' || !swipeBackEnabledFor(this.config, region)) return;

        this.closeSwipeBack();
        this.swipeBack = new PeripheralSwipeBackSession({
            region,
            config: this.config,
            eventBus: this.eventBus,
            viewport: this.viewport,
            onCommit: (committed) => {
                this.session.completeSwipeBack(committed);
            },
        });
        this.debug(`Swipe-back armed for ${region}`);
    }

    private closeSwipeBack(): void {
        if (this.swipeBack === null) return;
        this.swipeBack.dispose();
        this.swipeBack = null;
        if (this.pointerOwner === 'SWIPE_BACK') this.pointerOwner = null;
    }

    private debug(message: string): void {
        if (this.config.debug) {
            console.warn(`[Navigator] ${message}`);
        }
    }
}
