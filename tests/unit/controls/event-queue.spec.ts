import { describe, expect, it, vi } from 'vitest';
import { createInputEventQueue } from 'controls/event-queue';
import { InputTracker } from 'controls/input-tracker';
import { createLogger, type LogEntry } from 'util/log';

describe('createInputEventQueue', () => {
    it('applies buffered events in arrival order', () => {
        const queue = createInputEventQueue<string>();
        const tracker = new InputTracker<string>();

        queue.press('a');
        queue.press('b');
        queue.release('a');

        expect(queue.size()).toBe(3);
        expect(queue.drainInto(tracker)).toBe(3);
        expect(queue.size()).toBe(0);
        expect(tracker.justReleased('a')).toBe(true);
        expect(tracker.justPressed('b')).toBe(true);
    });

    it('returns copies from peek', () => {
        const queue = createInputEventQueue<string>();
        queue.push({ type: 'press', key: 'a' });

        expect(queue.peek()).toEqual([{ type: 'press', key: 'a' }]);
        queue.clear();
        expect(queue.peek()).toEqual([]);
    });

    it('drops the oldest event past capacity and warns', () => {
        const writer = vi.fn<(entry: LogEntry) => void>();
        const logger = createLogger('test', { writer, now: () => 0, level: 'warn' });
        const queue = createInputEventQueue<string>({ capacity: 2, logger });

        queue.press('a');
        queue.press('b');
        queue.press('c');

        expect(queue.peek()).toEqual([
            { type: 'press', key: 'b' },
            { type: 'press', key: 'c' },
        ]);
        expect(writer).toHaveBeenCalledWith({
            level: 'warn',
            subsystem: 'test:event-queue',
            message: 'Input event queue full; dropped oldest event',
            context: { capacity: 2, dropped: 1 },
            timestamp: 0,
        });
    });

    it('rejects invalid capacities', () => {
        expect(() => createInputEventQueue({ capacity: 0 })).toThrow(RangeError);
        expect(() => createInputEventQueue({ capacity: 1.5 })).toThrow(RangeError);
    });
});
