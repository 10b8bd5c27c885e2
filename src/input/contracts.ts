/**
 * Input Adapter Contract
 *
 * Purpose: Backend adapters translate a device's native keys into tracker
 * keys. They are the only place that touches the DOM.
 */

import type { GamepadLike } from '../util/input-helpers';

/**
 * Maps a native key (a `KeyboardEvent.code`, a gamepad button key) to a
 * tracker key, or null to ignore it
 */
export type KeyMapper<K> = (native: string) => K | null;

export type KeyMap<K> = Readonly<Record<string, K>> | KeyMapper<K>;

export type GamepadSource = () => readonly (GamepadLike | null)[];

export interface InputAdapter {
    /**
     * Start listening on the given target
     */
    attach(target: EventTarget): void;

    /**
     * Stop listening and forget held keys
     */
    detach(): void;

    /**
     * Whether listeners are currently installed
     */
    isAttached(): boolean;
}

export const toKeyMapper = <K>(keyMap: KeyMap<K>): KeyMapper<K> => {
    if (typeof keyMap === 'function') {
        return keyMap;
    }
    return (native) => (Object.prototype.hasOwnProperty.call(keyMap, native) ? keyMap[native] : null);
};
