import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { NavigatorConfigInput, parseNavigatorConfig } from '../../src/kernel/config';
import { EventBus, NavigatorEvents } from '../../src/kernel/event_bus';
import { PeripheralSwipeBackSession } from '../../src/kernel/swipe_back_session';
import { PeripheralRegion } from '../../src/kernel/types';
import { EventRecorder, FixedViewport, SETTLE_MS } from '../helpers/session_driver';

// Viewport 400 × 800, edge fraction 0.2 → bands of 80px and 160px.

function makeSession(
    region: PeripheralRegion,
    config: NavigatorConfigInput = {},
    onCommit?: (region: PeripheralRegion) => void,
) {
    const bus = new EventBus<NavigatorEvents>();
    const recorder = new EventRecorder(bus);
    const session = new PeripheralSwipeBackSession({
        region,
        config: parseNavigatorConfig(config),
        eventBus: bus,
        viewport: new FixedViewport({ width: 400, height: 800 }),
        onCommit,
    });
    return { bus, recorder, session };
}

describe('PeripheralSwipeBackSession — RIGHT region', () => {

    let session: PeripheralSwipeBackSession;
    let recorder: EventRecorder;

    beforeEach(() => {
        ({ session, recorder } = makeSession('RIGHT'));
    });

    it('Given a start outside the left-edge band, Then pointerDown is refused', () => {
        expect(session.pointerDown({ x: 81, y: 400 }, 0)).toBe(false);
        expect(session.phase).toBe('IDLE');
    });

    it('Given a drag to 0.6, When released, Then it commits and announces the region', () => {
        expect(session.pointerDown({ x: 50, y: 400 }, 0)).toBe(true);
        session.pointerMove({ x: 290, y: 400 }, 10);
        expect(session.progress).toBe(0.6);

        session.pointerUp(20);
        expect(session.phase).toBe('COMMITTING');

        const snap = session.tick(20 + SETTLE_MS);
        expect(snap).toEqual({ region: 'RIGHT', phase: 'IDLE', progress: 1 });
        expect(recorder.swipeBackCommits).toEqual(['RIGHT']);
        expect(recorder.haptics).toEqual([{ intensity: 'heavy', source: 'swipe_back_threshold' }]);
    });

    it('Given an owner callback, Then it hears the commit once, after the bus', () => {
        const log: string[] = [];
        const made = makeSession('RIGHT', {}, (region) => { log.push(`owner:${region}`); });
        made.bus.subscribe('SWIPE_BACK_COMMITTED', ({ region }) => { log.push(`bus:${region}`); });
        made.session.pointerDown({ x: 50, y: 400 }, 0);
        made.session.pointerMove({ x: 290, y: 400 }, 10);
        made.session.pointerUp(20);
        made.session.tick(20 + SETTLE_MS);
        made.session.tick(40 + SETTLE_MS);

        expect(log).toEqual(['bus:RIGHT', 'owner:RIGHT']);
    });

    it('Given a cancelled drag, Then the owner callback never runs', () => {
        const commits: PeripheralRegion[] = [];
        const made = makeSession('RIGHT', {}, (region) => { commits.push(region); });
        made.session.pointerDown({ x: 50, y: 400 }, 0);
        made.session.pointerMove({ x: 290, y: 400 }, 10);
        made.session.pointerCancel(20);
        made.session.tick(20 + SETTLE_MS);
        expect(commits).toEqual([]);
    });

    it('Given a drag to 0.3, When released, Then it animates back to 0 without committing', () => {
        session.pointerDown({ x: 50, y: 400 }, 0);
        session.pointerMove({ x: 170, y: 400 }, 10);
        session.pointerUp(20);
        expect(session.phase).toBe('CANCELLING');

        const snap = session.tick(20 + SETTLE_MS);
        expect(snap.phase).toBe('IDLE');
        expect(snap.progress).toBe(0);
        expect(recorder.swipeBackCommits).toEqual([]);
        expect(recorder.haptics).toEqual([]);
    });

    it('Given a drag the wrong way, Then progress stays at 0', () => {
        session.pointerDown({ x: 70, y: 400 }, 0);
        session.pointerMove({ x: 10, y: 400 }, 10);
        expect(session.progress).toBe(0);
    });

    it('Given a drag past 0.5 that comes back under, Then the haptic re-arms', () => {
        session.pointerDown({ x: 0, y: 400 }, 0);
        session.pointerMove({ x: 240, y: 400 }, 1);
        session.pointerMove({ x: 120, y: 400 }, 2);
        session.pointerMove({ x: 220, y: 400 }, 3);
        expect(recorder.haptics).toHaveLength(2);
    });

    it('Given pointerCancel past the threshold, Then it cancels instead of committing', () => {
        session.pointerDown({ x: 50, y: 400 }, 0);
        session.pointerMove({ x: 350, y: 400 }, 10);
        session.pointerCancel(20);
        expect(session.phase).toBe('CANCELLING');
        session.tick(20 + SETTLE_MS);
        expect(recorder.swipeBackCommits).toEqual([]);
    });

    it('Given each phase, Then blocksExternalReturn reflects the in-flight gesture', () => {
        expect(session.blocksExternalReturn()).toBe(false);
        session.pointerDown({ x: 50, y: 400 }, 0);
        expect(session.blocksExternalReturn()).toBe(true);
        session.pointerMove({ x: 60, y: 400 }, 1);
        session.pointerUp(2);
        expect(session.phase).toBe('CANCELLING');
        expect(session.blocksExternalReturn()).toBe(true);
        session.tick(2 + SETTLE_MS);
        expect(session.blocksExternalReturn()).toBe(false);
    });

    it('Given dispose(), Then new gestures are refused', () => {
        session.dispose();
        expect(session.pointerDown({ x: 50, y: 400 }, 0)).toBe(false);
    });
});

describe('PeripheralSwipeBackSession — edge bands per region', () => {

    it('Given the LEFT region, Then the gesture starts at the right edge and drags left', () => {
        const { session } = makeSession('LEFT');
        expect(session.pointerDown({ x: 319, y: 400 }, 0)).toBe(false);
        expect(session.pointerDown({ x: 320, y: 400 }, 0)).toBe(true);
        session.pointerMove({ x: 120, y: 400 }, 1);
        expect(session.progress).toBe(0.5);
    });

    it('Given the TOP region, Then the gesture starts at the bottom edge and drags up', () => {
        const { session } = makeSession('TOP');
        expect(session.pointerDown({ x: 200, y: 639 }, 0)).toBe(false);
        expect(session.pointerDown({ x: 200, y: 700 }, 0)).toBe(true);
        session.pointerMove({ x: 200, y: 300 }, 1);
        expect(session.progress).toBe(0.5);
    });

    it('Given the BOTTOM region, Then the gesture starts at the top edge and drags down', () => {
        const { session } = makeSession('BOTTOM');
        expect(session.pointerDown({ x: 200, y: 161 }, 0)).toBe(false);
        expect(session.pointerDown({ x: 200, y: 160 }, 0)).toBe(true);
        session.pointerMove({ x: 200, y: 360 }, 1);
        expect(session.progress).toBe(0.25);
    });
});

describe('PeripheralSwipeBackSession — animation failure', () => {

    beforeEach(() => {
        jest.spyOn(console, 'error').mockImplementation(() => {});
    });
    afterEach(() => {
        jest.restoreAllMocks();
    });

    const broken = {
        easing: (): number => {
            throw new Error('curve exploded');
        },
    };

    it('Given a commit animation fails past 0.5, Then it commits at once', () => {
        const { session, recorder } = makeSession('RIGHT', broken);
        session.pointerDown({ x: 50, y: 400 }, 0);
        session.pointerMove({ x: 290, y: 400 }, 1);
        session.pointerUp(2);
        expect(session.tick(50)).toEqual({ region: 'RIGHT', phase: 'IDLE', progress: 1 });
        expect(recorder.swipeBackCommits).toEqual(['RIGHT']);
        expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('Given a cancel animation fails below 0.5, Then it resets to 0', () => {
        const { session, recorder } = makeSession('RIGHT', broken);
        session.pointerDown({ x: 50, y: 400 }, 0);
        session.pointerMove({ x: 130, y: 400 }, 1);
        session.pointerUp(2);
        expect(session.tick(50)).toEqual({ region: 'RIGHT', phase: 'IDLE', progress: 0 });
        expect(recorder.swipeBackCommits).toEqual([]);
    });
});
