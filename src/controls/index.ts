/**
 * Control state tracking
 *
 * One query surface for held state and per-frame transitions, fed either by
 * polling a device or by press/release events.
 */

export type {
    ControlQueries,
    ControlState,
    ControlTracker,
    InputTrackerDebugState,
    InputTrackerSnapshot,
    KeyState,
    PolledSink,
    PressReleaseSink,
} from './contracts';
export { UNTRACKED_KEY_STATE, toControlState } from './contracts';

export { InputTracker, createInputTracker, type InputTrackerOptions } from './input-tracker';
export {
    ControlBindings,
    type BindingEntry,
    type ControlBindingsOptions,
    type RebindEvent,
    type RebindListener,
} from './control-bindings';
export { BoundControls, type BoundControlsOptions } from './bound-controls';
export {
    createInputEventQueue,
    type InputEvent,
    type InputEventQueue,
    type InputEventQueueOptions,
    type InputEventType,
} from './event-queue';
