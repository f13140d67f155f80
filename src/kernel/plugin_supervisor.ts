/**
 * plugin_supervisor.ts — ordered lifecycle for the navigator's side-channel plugins.
 *
 *   CREATED ──initAll──► INITIALIZED ──startAll──► RUNNING
 *      │                      │                       │
 *      └──────────────────────┴───────destroyAll──────┴──► DESTROYED (terminal)
 *
 * SpatialNavigator.start() runs initAll then startAll; destroy() runs
 * destroyAll.  Plugins come up in registration order and go down in reverse.
 * A failed init/start aborts the step and rejects; a failed destroy is
 * logged and the rest still go down.
 */

import { EventBus, NavigatorEvents } from './event_bus';
import type { ViewportSource } from './viewport';

export interface PluginContext {
    readonly eventBus: EventBus<NavigatorEvents>;
    readonly viewport: ViewportSource;
}

/** Side-channel consumer of navigator events (haptics, host callbacks, ...). */
export interface NavigatorPlugin {
    readonly name: string;
    /** Subscribe here, not in the constructor. */
    init(context: PluginContext): Promise<void> | void;
    /** Optional; for plugins that stay silent until the navigator is running. */
    start?(): Promise<void> | void;
    destroy(): Promise<void> | void;
}

export type SupervisorState = 'CREATED' | 'INITIALIZED' | 'RUNNING' | 'DESTROYED';

/** A supervisor step was called out of order. */
export class LifecycleGateError extends Error {
    constructor(step: string, current: SupervisorState, required: SupervisorState) {
        super(
            `[Supervisor] LIFECYCLE GATE: ${step}() requires state ${required}, but supervisor is in state ${current}.\n` +
            '  Navigator order: new SpatialNavigator() → start() → destroy().'
        );
        this.name = 'LifecycleGateError';
    }
}

export class PluginSupervisor {

    private readonly _plugins: NavigatorPlugin[] = [];
    private readonly _context: PluginContext;
    private _state: SupervisorState = 'CREATED';

    constructor(eventBus: EventBus<NavigatorEvents>, viewport: ViewportSource) {
        this._context = { eventBus, viewport };
    }

    get state(): SupervisorState { return this._state; }

    registerPlugin(plugin: NavigatorPlugin): void {
        this._gate(`registerPlugin('${plugin.name}')`, 'CREATED');
        if (this._plugins.some((p) => p.name === plugin.name)) {
            throw new Error(`[Supervisor] DUPLICATE PLUGIN: '${plugin.name}' is already registered.`);
        }
        this._plugins.push(plugin);
        console.log(`[Supervisor] Registered ${plugin.name}`);
    }

    async initAll(): Promise<void> {
        this._gate('initAll', 'CREATED');
        for (const plugin of this._plugins) {
            await this._step(plugin, 'init', () => plugin.init(this._context));
        }
        this._state = 'INITIALIZED';
    }

    async startAll(): Promise<void> {
        this._gate('startAll', 'INITIALIZED');
        for (const plugin of this._plugins) {
            await this._step(plugin, 'start', () => plugin.start?.());
        }
        this._state = 'RUNNING';
    }

    async destroyAll(): Promise<void> {
        if (this._state === 'DESTROYED') {
            console.warn('[Supervisor] destroyAll() on a DESTROYED supervisor, ignoring.');
            return;
        }
        for (const plugin of [...this._plugins].reverse()) {
            try {
                await plugin.destroy();
            } catch (error) {
                console.error(`[Supervisor] ${plugin.name} failed to destroy`, error);
            }
        }
        this._plugins.length = 0;
        this._state = 'DESTROYED';
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private _gate(step: string, required: SupervisorState): void {
        if (this._state !== required) {
            throw new LifecycleGateError(step, this._state, required);
        }
    }

    private async _step(plugin: NavigatorPlugin, step: 'init' | 'start', run: () => Promise<void> | void): Promise<void> {
        try {
            await run();
        } catch (error) {
            console.error(`[Supervisor] ${plugin.name} failed to ${step}`, error);
            throw error;
        }
    }
}
