/**
 * Input Event Normalization Helpers
 *
 * Purpose: Reduce browser keyboard events and gamepad readings to plain data
 * the input adapters can map onto tracker keys.
 */

/**
 * Keyboard event data
 */
export interface KeyboardEventData {
    /** Physical key location, e.g. `KeyW` or `ArrowLeft`. */
    code: string;
    /** Layout-dependent character, e.g. `w`. */
    key: string;
    pressed: boolean;
    repeat: boolean;
}

/**
 * Gamepad button reading, keyed for polling
 */
export interface GamepadButtonReading {
    padIndex: number;
    buttonIndex: number;
    value: number;
}

/**
 * Minimal gamepad shape; matches the DOM `Gamepad` and is easy to fake
 */
export interface GamepadLike {
    readonly index: number;
    readonly connected: boolean;
    readonly buttons: readonly { readonly pressed: boolean; readonly value: number }[];
}

/**
 * Normalize keyboard event
 */
export function normalizeKeyboardEvent(event: KeyboardEvent): KeyboardEventData {
    return {
        code: event.code, // Use code for physical key location
        key: event.key,
        pressed: event.type === 'keydown',
        repeat: event.repeat,
    };
}

/**
 * Stable identifier for one button on one pad, e.g. `0:12`
 */
export function gamepadButtonKey(padIndex: number, buttonIndex: number): string {
    return `${padIndex}:${buttonIndex}`;
}

/**
 * A button counts as held when the browser says so or its analog value passes the threshold
 */
export function isGamepadButtonHeld(button: GamepadLike['buttons'][number], threshold: number): boolean {
    return button.pressed || button.value > threshold;
}

/**
 * Collect held buttons across every connected pad
 */
export function readHeldGamepadButtons(
    gamepads: readonly (GamepadLike | null)[],
    threshold: number
): GamepadButtonReading[] {
    const held: GamepadButtonReading[] = [];

    for (const pad of gamepads) {
        if (!pad || !pad.connected) continue;

        pad.buttons.forEach((button, buttonIndex) => {
            if (isGamepadButtonHeld(button, threshold)) {
                held.push({ padIndex: pad.index, buttonIndex, value: button.value });
            }
        });
    }

    return held;
}
