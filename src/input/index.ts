/**
 * DOM input adapters
 *
 * Backend adapters that translate browser keyboard events and gamepad
 * readings into tracker keys. Both delivery models are covered: keyboard
 * events push, gamepads are polled.
 */

export type { GamepadSource, InputAdapter, KeyMap, KeyMapper } from './contracts';
export { toKeyMapper } from './contracts';
export { KeyboardEventSource, type KeyboardEventSourceOptions } from './keyboard-source';
export {
    GamepadPoller,
    createGamepadPoller,
    type GamepadPollerOptions,
    type MappedGamepadPollerOptions,
} from './gamepad-poller';
