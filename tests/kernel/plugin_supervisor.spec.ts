import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { EventBus, NavigatorEvents } from '../../src/kernel/event_bus';
import { LifecycleGateError, NavigatorPlugin, PluginContext, PluginSupervisor } from '../../src/kernel/plugin_supervisor';
import { FixedViewport } from '../helpers/session_driver';

// ─── Helpers ─────────────────────────────────────────────────────────────────

class RecordingPlugin implements NavigatorPlugin {
    receivedContext: PluginContext | null = null;
    failOn: 'init' | 'start' | 'destroy' | null = null;

    constructor(public readonly name: string, private readonly calls: string[]) {}

    async init(context: PluginContext): Promise<void> {
        this.calls.push(`init:${this.name}`);
        this.receivedContext = context;
        if (this.failOn === 'init') throw new Error(`init failed in ${this.name}`);
    }

    async start(): Promise<void> {
        this.calls.push(`start:${this.name}`);
        if (this.failOn === 'start') throw new Error(`start failed in ${this.name}`);
    }

    async destroy(): Promise<void> {
        this.calls.push(`destroy:${this.name}`);
        if (this.failOn === 'destroy') throw new Error(`destroy failed in ${this.name}`);
    }
}

/** A plugin with nothing to do on start. */
class InitOnlyPlugin implements NavigatorPlugin {
    constructor(public readonly name: string, private readonly calls: string[]) {}

    init(): void {
        this.calls.push(`init:${this.name}`);
    }

    destroy(): void {
        this.calls.push(`destroy:${this.name}`);
    }
}

describe('PluginSupervisor', () => {

    let bus: EventBus<NavigatorEvents>;
    let sup: PluginSupervisor;
    let calls: string[];

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => {});
        jest.spyOn(console, 'warn').mockImplementation(() => {});
        jest.spyOn(console, 'error').mockImplementation(() => {});
        bus = new EventBus<NavigatorEvents>();
        sup = new PluginSupervisor(bus, new FixedViewport({ width: 400, height: 800 }));
        calls = [];
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('Given two plugins, When the navigator lifecycle runs, Then they come up in order and go down reversed', async () => {
        sup.registerPlugin(new RecordingPlugin('haptics', calls));
        sup.registerPlugin(new RecordingPlugin('callbacks', calls));
        expect(sup.state).toBe('CREATED');

        await sup.initAll();
        expect(sup.state).toBe('INITIALIZED');
        await sup.startAll();
        expect(sup.state).toBe('RUNNING');
        await sup.destroyAll();
        expect(sup.state).toBe('DESTROYED');

        expect(calls).toEqual([
            'init:haptics', 'init:callbacks',
            'start:haptics', 'start:callbacks',
            'destroy:callbacks', 'destroy:haptics',
        ]);
    });

    it('Given a plugin without start(), Then startAll skips it', async () => {
        sup.registerPlugin(new InitOnlyPlugin('callbacks', calls));
        sup.registerPlugin(new RecordingPlugin('haptics', calls));
        await sup.initAll();
        await sup.startAll();
        expect(calls).toEqual(['init:callbacks', 'init:haptics', 'start:haptics']);
        expect(sup.state).toBe('RUNNING');
    });

    it('Given init, Then each plugin receives the shared bus and viewport', async () => {
        const plugin = new RecordingPlugin('haptics', calls);
        sup.registerPlugin(plugin);
        await sup.initAll();
        expect(plugin.receivedContext?.eventBus).toBe(bus);
        expect(plugin.receivedContext?.viewport.size).toEqual({ width: 400, height: 800 });
    });

    it('Given CREATED, When startAll is called, Then LifecycleGateError names both states', async () => {
        await expect(sup.startAll()).rejects.toThrow(LifecycleGateError);
        await expect(sup.startAll()).rejects.toThrow(
            '[Supervisor] LIFECYCLE GATE: startAll() requires state INITIALIZED, but supervisor is in state CREATED.'
        );
    });

    it('Given RUNNING, When initAll is called again, Then it is refused', async () => {
        await sup.initAll();
        await sup.startAll();
        await expect(sup.initAll()).rejects.toThrow(
            '[Supervisor] LIFECYCLE GATE: initAll() requires state CREATED, but supervisor is in state RUNNING.'
        );
    });

    it('Given INITIALIZED, When a plugin is registered, Then it is refused', async () => {
        await sup.initAll();
        expect(() => sup.registerPlugin(new RecordingPlugin('late', calls))).toThrow(LifecycleGateError);
    });

    it('Given a duplicate name, Then registration throws', () => {
        sup.registerPlugin(new RecordingPlugin('haptics', calls));
        expect(() => sup.registerPlugin(new RecordingPlugin('haptics', calls))).toThrow("DUPLICATE PLUGIN: 'haptics'");
    });

    it('Given a plugin whose init throws, Then initAll rejects, logs it and the state stays CREATED', async () => {
        const broken = new RecordingPlugin('broken', calls);
        broken.failOn = 'init';
        sup.registerPlugin(broken);
        await expect(sup.initAll()).rejects.toThrow('init failed in broken');
        expect(sup.state).toBe('CREATED');
        expect(console.error).toHaveBeenCalledWith('[Supervisor] broken failed to init', expect.any(Error));
    });

    it('Given a plugin whose start throws, Then startAll rejects before the later plugins start', async () => {
        const broken = new RecordingPlugin('broken', calls);
        broken.failOn = 'start';
        sup.registerPlugin(broken);
        sup.registerPlugin(new RecordingPlugin('after', calls));
        await sup.initAll();
        await expect(sup.startAll()).rejects.toThrow('start failed in broken');
        expect(sup.state).toBe('INITIALIZED');
        expect(calls).not.toContain('start:after');
    });

    it('Given a plugin whose destroy throws, Then the others still go down and the state is DESTROYED', async () => {
        const broken = new RecordingPlugin('broken', calls);
        broken.failOn = 'destroy';
        sup.registerPlugin(new RecordingPlugin('first', calls));
        sup.registerPlugin(broken);
        await sup.destroyAll();
        expect(calls).toEqual(['destroy:broken', 'destroy:first']);
        expect(sup.state).toBe('DESTROYED');
    });

    it('Given DESTROYED, When destroyAll runs again, Then it warns and destroys nothing twice', async () => {
        sup.registerPlugin(new RecordingPlugin('haptics', calls));
        await sup.destroyAll();
        await sup.destroyAll();
        expect(calls).toEqual(['destroy:haptics']);
        expect(console.warn).toHaveBeenCalledTimes(1);
    });
});
