import { HapticIntensity, PeripheralRegion, Region, SessionPhase } from './types';

export type HapticSource = 'threshold' | 'swipe_back_threshold' | 'return_button';

export interface NavigatorEvents {
    PAGE_CHANGED:         { region: Region };
    REGION_OPENED:        { region: PeripheralRegion };
    RETURNED_TO_CENTER:   null;
    HAPTIC_TRIGGER:       { intensity: HapticIntensity; source: HapticSource };
    SWIPE_BACK_COMMITTED: { region: PeripheralRegion };
    PHASE_CHANGED:        { from: SessionPhase; to: SessionPhase };
}

type Listener<T> = (payload: T) => void;

/**
 * Synchronous typed channel bus.  Listeners run in subscription order on the
 * publishing call stack.  A listener that throws is logged and skipped; the
 * rest of the channel still receives the payload.
 */
export class EventBus<Events extends object = NavigatorEvents> {
    private subscribers: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

    public subscribe<K extends keyof Events>(
        channel: K,
        listener: Listener<Events[K]>
    ): () => void {
        let channelSubscribers = this.subscribers[channel];
        if (!channelSubscribers) {
            channelSubscribers = new Set<Listener<Events[K]>>();
            this.subscribers[channel] = channelSubscribers;
        }
        channelSubscribers.add(listener);

        return () => {
            const subs = this.subscribers[channel];
            if (subs) {
                subs.delete(listener);
            }
        };
    }

    public publish<K extends keyof Events>(
        channel: K,
        payload: Events[K]
    ): boolean {
        const channelSubscribers = this.subscribers[channel];
        if (!channelSubscribers || channelSubscribers.size === 0) {
            return false;
        }

        // Snapshot: a listener may unsubscribe itself mid-publish.
        for (const listener of Array.from(channelSubscribers)) {
            try {
                listener(payload);
            } catch (error) {
                console.error(`[EventBus] Listener on ${String(channel)} threw`, error);
            }
        }

        return true;
    }

    public listenerCount<K extends keyof Events>(channel: K): number {
        return this.subscribers[channel]?.size ?? 0;
    }

    public clear(): void {
        this.subscribers = {};
    }
}
