import type { NavigatorEvents } from '../kernel/event_bus';
import type { NavigatorPlugin, PluginContext } from '../kernel/plugin_supervisor';
import { HapticIntensity } from '../kernel/types';

/** Host hook for the device vibration motor (or nothing, on desktop). */
export interface HapticActuator {
    impact(intensity: HapticIntensity): void | Promise<void>;
}

/**
 * Turns HAPTIC_TRIGGER events into actuator calls once the navigator has
 * started.  Subscribes on init; triggers that arrive before start() are dropped.
 */
export class HapticFeedbackPlugin implements NavigatorPlugin {
    public readonly name = 'HapticFeedbackPlugin';

    private unsubscribeHaptic: (() => void) | null = null;
    private running = false;
    private readonly boundOnHaptic: (payload: NavigatorEvents['HAPTIC_TRIGGER']) => void;

    constructor(private readonly actuator: HapticActuator) {
        this.boundOnHaptic = this.onHaptic.bind(this);
    }

    public init(context: PluginContext): void {
        this.unsubscribeHaptic = context.eventBus.subscribe('HAPTIC_TRIGGER', this.boundOnHaptic);
    }

    public start(): void {
        this.running = true;
    }

    private onHaptic(payload: NavigatorEvents['HAPTIC_TRIGGER']): void {
        if (!this.running) return;

        const result = this.actuator.impact(payload.intensity);
        if (result instanceof Promise) {
            result.catch((error: unknown) => {
                console.error(`[HapticFeedbackPlugin] impact(${payload.intensity}) failed`, error);
            });
        }
    }

    public destroy(): void {
        if (this.unsubscribeHaptic) {
            this.unsubscribeHaptic();
            this.unsubscribeHaptic = null;
        }
        this.running = false;
    }
}
