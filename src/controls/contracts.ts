/**
 * Control State Contract
 *
 * Shared shapes for tracking whether logical keys are held and whether they
 * changed since the last frame boundary, whichever way input is delivered.
 */

/**
 * Per-key record. `changed` is set by any transition since the last
 * `endFrame()` and says nothing about how many transitions happened.
 */
export interface KeyState {
    readonly down: boolean;
    readonly changed: boolean;
    /** Frames held so far, counting the current one; 0 while up. */
    readonly heldFrames: number;
}

export type ControlState = 'up' | 'just-up' | 'down' | 'just-down';

export const UNTRACKED_KEY_STATE: KeyState = Object.freeze({
    down: false,
    changed: false,
    heldFrames: 0,
});

/**
 * Read side of a tracker. Queries never mutate, so they can be repeated
 * within a tick and always agree.
 */
export interface ControlQueries<K> {
    isDown(key: K): boolean;
    justPressed(key: K): boolean;
    justReleased(key: K): boolean;
    state(key: K): ControlState;
    heldFrames(key: K): number;
}

/** Event-model ingestion target, shared by trackers and input adapters. */
export interface PressReleaseSink<K> {
    press(key: K): void;
    release(key: K): void;
}

/** Polling-model ingestion target. */
export interface PolledSink<K> {
    syncPolled(downNow: Iterable<K>): void;
}

export interface ControlTracker<K> extends ControlQueries<K>, PressReleaseSink<K>, PolledSink<K> {
    /** Collapse `just-*` states. Call once per tick after all queries. */
    endFrame(): void;
}

export interface InputTrackerSnapshot<K> {
    readonly version: 1;
    readonly frame: number;
    readonly keys: readonly (readonly [key: K, state: KeyState])[];
}

export interface InputTrackerDebugState<K> {
    readonly frame: number;
    readonly trackedKeys: number;
    readonly pressed: readonly K[];
    readonly transitioned: readonly K[];
}

export const toControlState = (state: KeyState): ControlState => {
    if (state.down) {
        return state.changed ? 'just-down' : 'down';
    }
    return state.changed ? 'just-up' : 'up';
};
