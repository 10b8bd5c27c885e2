/**
 * Input Tracker
 *
 * Tracks held state and per-frame transitions for logical keys fed by either
 * delivery model:
 *
 * - polling: `syncPolled(set)` once per tick replaces the full held set;
 * - events: `press(key)` / `release(key)` as often as they arrive.
 *
 * Transitions stay visible until `endFrame()`, which must be called exactly
 * once per tick after the tick's queries. Skipping it is not detected: the
 * `just-*` flags then carry over into the next tick.
 *
 * Within one tick the final state wins. A press followed by a release reports
 * `justReleased` and not `justPressed`, the same answer polling at the end of
 * the tick would give.
 */

import { LIBRARY_DEFAULTS } from '../config/library';
import type { Logger } from '../util/log';
import {
    UNTRACKED_KEY_STATE,
    toControlState,
    type ControlState,
    type ControlTracker,
    type InputTrackerDebugState,
    type InputTrackerSnapshot,
    type KeyState,
} from './contracts';

export interface InputTrackerOptions {
    /** Receives `debug` entries for every transition. */
    readonly logger?: Logger;
}

interface MutableKeyState {
    down: boolean;
    changed: boolean;
    heldFrames: number;
}

const copyState = (state: MutableKeyState): KeyState => ({
    down: state.down,
    changed: state.changed,
    heldFrames: state.heldFrames,
});

const toHeldFrames = (value: unknown, down: boolean): number => {
    if (!down) {
        return 0;
    }
    return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : 1;
};

export class InputTracker<K> implements ControlTracker<K> {
    private readonly states = new Map<K, MutableKeyState>();
    private readonly logger: Logger | null;
    private frame = 0;

    constructor(options: InputTrackerOptions = {}) {
        this.logger = options.logger?.child('input-tracker') ?? null;
    }

    /**
     * Replace the held set with what a device reports right now. Tracked keys
     * missing from `downNow` are released; unknown keys missing from it are
     * not materialized.
     */
    syncPolled(downNow: Iterable<K>): void {
        const held = new Set(downNow);

        for (const [key, state] of this.states) {
            this.applyPolled(key, state, held.has(key));
        }

        for (const key of held) {
            if (!this.states.has(key)) {
                this.applyPolled(key, this.materialize(key), true);
            }
        }
    }

    /** Idempotent while the key is already down; never clears `changed`. */
    press(key: K): void {
        const state = this.materialize(key);
        if (state.down) {
            return;
        }
        state.down = true;
        state.changed = true;
        state.heldFrames = 1;
        this.logger?.debug('press', { key, frame: this.frame });
    }

    /** Idempotent while the key is already up; never clears `changed`. */
    release(key: K): void {
        const state = this.materialize(key);
        if (!state.down) {
            return;
        }
        state.down = false;
        state.changed = true;
        state.heldFrames = 0;
        this.logger?.debug('release', { key, frame: this.frame });
    }

    isDown(key: K): boolean {
        return this.lookup(key).down;
    }

    justPressed(key: K): boolean {
        const { down, changed } = this.lookup(key);
        return down && changed;
    }

    justReleased(key: K): boolean {
        const { down, changed } = this.lookup(key);
        return !down && changed;
    }

    state(key: K): ControlState {
        return toControlState(this.lookup(key));
    }

    heldFrames(key: K): number {
        return this.lookup(key).heldFrames;
    }

    keyState(key: K): KeyState {
        const state = this.states.get(key);
        return state ? copyState(state) : UNTRACKED_KEY_STATE;
    }

    isTracked(key: K): boolean {
        return this.states.has(key);
    }

    /** Keys in the order they were first referenced. */
    trackedKeys(): K[] {
        return [...this.states.keys()];
    }

    pressedKeys(): K[] {
        return this.keysWhere((state) => state.down);
    }

    get currentFrame(): number {
        return this.frame;
    }

    endFrame(): void {
        for (const state of this.states.values()) {
            state.changed = false;
            if (state.down) {
                state.heldFrames += 1;
            }
        }
        this.frame += 1;
    }

    /** Forget every key and restart the frame count. */
    reset(): void {
        this.states.clear();
        this.frame = 0;
        this.logger?.debug('reset');
    }

    snapshot(): InputTrackerSnapshot<K> {
        return {
            version: LIBRARY_DEFAULTS.snapshotVersion,
            frame: this.frame,
            keys: [...this.states].map(([key, state]) => [key, copyState(state)] as const),
        };
    }

    /**
     * Replace all state with a snapshot. Flags are coerced to booleans and
     * hold counts to integers so hand-edited or decoded data cannot produce
     * an impossible state.
     */
    restore(snapshot: InputTrackerSnapshot<K>): void {
        if (snapshot.version !== LIBRARY_DEFAULTS.snapshotVersion) {
            throw new RangeError(`Unsupported input tracker snapshot version: ${String(snapshot.version)}`);
        }

        this.states.clear();
        for (const [key, state] of snapshot.keys) {
            const down = state.down === true;
            this.states.set(key, {
                down,
                changed: state.changed === true,
                heldFrames: toHeldFrames(state.heldFrames, down),
            });
        }

        this.frame = Number.isInteger(snapshot.frame) && snapshot.frame >= 0 ? snapshot.frame : 0;
        this.logger?.debug('restore', { keys: this.states.size, frame: this.frame });
    }

    getDebugState(): InputTrackerDebugState<K> {
        return {
            frame: this.frame,
            trackedKeys: this.states.size,
            pressed: this.pressedKeys(),
            transitioned: this.keysWhere((state) => state.changed),
        };
    }

    private applyPolled(key: K, state: MutableKeyState, down: boolean): void {
        state.changed = down !== state.down;
        if (!state.changed) {
            return;
        }
        state.down = down;
        state.heldFrames = down ? 1 : 0;
        this.logger?.debug('poll', { key, down, frame: this.frame });
    }

    private lookup(key: K): KeyState {
        return this.states.get(key) ?? UNTRACKED_KEY_STATE;
    }

    private materialize(key: K): MutableKeyState {
        const existing = this.states.get(key);
        if (existing) {
            return existing;
        }
        const created: MutableKeyState = { down: false, changed: false, heldFrames: 0 };
        this.states.set(key, created);
        return created;
    }

    private keysWhere(predicate: (state: MutableKeyState) => boolean): K[] {
        const keys: K[] = [];
        for (const [key, state] of this.states) {
            if (predicate(state)) {
                keys.push(key);
            }
        }
        return keys;
    }
}

export const createInputTracker = <K>(options: InputTrackerOptions = {}): InputTracker<K> => new InputTracker<K>(options);
