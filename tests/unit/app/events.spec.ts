import { describe, expect, it, vi } from 'vitest';

import { createEventBus, type EventEnvelope } from 'app/events';

describe('createEventBus', () => {
    const lifeLost = { levelIndex: 2, livesRemaining: 1, cause: 'fall' as const };

    it('uses the injected clock when no timestamp is provided', () => {
        let nowValue = 1000;
        const bus = createEventBus({ now: () => nowValue });
        const listener = vi.fn<[EventEnvelope<'LifeLost'>], void>();
        bus.subscribe('LifeLost', listener);

        nowValue = 1234;
        bus.publish('LifeLost', lifeLost);

        expect(listener).toHaveBeenCalledWith({ type: 'LifeLost', payload: lifeLost, timestamp: 1234 });
    });

    it('prefers an explicit timestamp when provided', () => {
        const bus = createEventBus({ now: () => 999 });
        const listener = vi.fn<[EventEnvelope<'LifeLost'>], void>();
        bus.subscribe('LifeLost', listener);

        bus.publish('LifeLost', lifeLost, 555);

        expect(listener.mock.calls[0]?.[0].timestamp).toBe(555);
    });

    it('delivers only to listeners of the published event', () => {
        const bus = createEventBus();
        const lives = vi.fn();
        const retrained = vi.fn();
        bus.subscribe('LifeLost', lives);
        bus.subscribe('ModelRetrained', retrained);

        bus.publish('ModelRetrained', { success: true, samples: 15 });

        expect(lives).not.toHaveBeenCalled();
        expect(retrained).toHaveBeenCalledTimes(1);
    });

    it('stops delivering after unsubscribe', () => {
        const bus = createEventBus();
        const listener = vi.fn();
        const unsubscribe = bus.subscribe('LifeLost', listener);

        unsubscribe();
        bus.publish('LifeLost', lifeLost);

        expect(listener).not.toHaveBeenCalled();
    });

    it('lets a listener unsubscribe itself while the event is being delivered', () => {
        const bus = createEventBus();
        const calls: string[] = [];
        const first = (): void => {
            calls.push('first');
            bus.unsubscribe('LifeLost', first);
        };
        bus.subscribe('LifeLost', first);
        bus.subscribe('LifeLost', () => {
            calls.push('second');
        });

        bus.publish('LifeLost', lifeLost);
        bus.publish('LifeLost', lifeLost);

        expect(calls).toEqual(['first', 'second', 'second']);
    });
});
