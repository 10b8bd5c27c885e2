import { LIBRARY_DEFAULTS } from '../config/library';
import { rootLogger, type Logger } from '../util/log';
import type { PressReleaseSink } from './contracts';

export type InputEventType = 'press' | 'release';

export interface InputEvent<K> {
    readonly type: InputEventType;
    readonly key: K;
}

export interface InputEventQueue<K> extends PressReleaseSink<K> {
    push(event: InputEvent<K>): void;
    readonly size: () => number;
    /** Apply queued events in arrival order, then empty the queue. */
    drainInto(sink: PressReleaseSink<K>): number;
    peek(): readonly InputEvent<K>[];
    clear(): void;
}

export interface InputEventQueueOptions {
    /** Oldest events are dropped past this many. */
    readonly capacity?: number;
    readonly logger?: Logger;
}

/**
 * Buffers press/release events that arrive outside the tick (callbacks,
 * another producer) so they can be applied in one place before querying.
 */
export const createInputEventQueue = <K>(options: InputEventQueueOptions = {}): InputEventQueue<K> => {
    const capacity = options.capacity ?? LIBRARY_DEFAULTS.eventQueueCapacity;
    if (!Number.isInteger(capacity) || capacity < 1) {
        throw new RangeError(`capacity must be a positive integer (got ${capacity})`);
    }
    const logger = (options.logger ?? rootLogger).child('event-queue');
    let events: InputEvent<K>[] = [];
    let dropped = 0;

    const push = (event: InputEvent<K>): void => {
        events.push({ type: event.type, key: event.key });
        if (events.length > capacity) {
            events.shift();
            dropped += 1;
            logger.warn('Input event queue full; dropped oldest event', { capacity, dropped });
        }
    };

    const drainInto = (sink: PressReleaseSink<K>): number => {
        const pending = events;
        events = [];
        for (const event of pending) {
            if (event.type === 'press') {
                sink.press(event.key);
            } else {
                sink.release(event.key);
            }
        }
        return pending.length;
    };

    return {
        push,
        press: (key) => push({ type: 'press', key }),
        release: (key) => push({ type: 'release', key }),
        size: () => events.length,
        drainInto,
        peek: () => events.map((event) => ({ ...event })),
        clear: () => {
            events = [];
        },
    };
};
