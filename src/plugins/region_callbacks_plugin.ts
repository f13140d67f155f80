import type { NavigatorEvents } from '../kernel/event_bus';
import type { NavigatorPlugin, PluginContext } from '../kernel/plugin_supervisor';
import { PeripheralRegion, Region } from '../kernel/types';

/** Plain host callbacks, for hosts that would rather not touch the bus. */
export interface RegionCallbacks {
    onPageChanged?: (region: Region) => void;
    onLeftOpened?: () => void;
    onRightOpened?: () => void;
    onTopOpened?: () => void;
    onBottomOpened?: () => void;
    onReturnToCenter?: () => void;
}

export class RegionCallbacksPlugin implements NavigatorPlugin {
    public readonly name = 'RegionCallbacksPlugin';

    private unsubscribers: Array<() => void> = [];

    constructor(private readonly callbacks: RegionCallbacks) {}

    public init(context: PluginContext): void {
        const bus = context.eventBus;
        this.unsubscribers.push(
            bus.subscribe('PAGE_CHANGED', (payload: NavigatorEvents['PAGE_CHANGED']) => {
                this.callbacks.onPageChanged?.(payload.region);
            }),
            bus.subscribe('REGION_OPENED', (payload: NavigatorEvents['REGION_OPENED']) => {
                this.openedCallbackFor(payload.region)?.();
            }),
            bus.subscribe('RETURNED_TO_CENTER', () => {
                this.callbacks.onReturnToCenter?.();
            }),
        );
    }

    private openedCallbackFor(region: PeripheralRegion): (() => void) | undefined {
        switch (region) {
            case 'LEFT':   return this.callbacks.onLeftOpened;
            case 'RIGHT':  return this.callbacks.onRightOpened;
            case 'TOP':    return this.callbacks.onTopOpened;
            case 'BOTTOM': return this.callbacks.onBottomOpened;
        }
    }

    public destroy(): void {
        for (const unsubscribe of this.unsubscribers) {
            unsubscribe();
        }
        this.unsubscribers = [];
    }
}
