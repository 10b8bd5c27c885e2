/**
 * Gamepad Poller
 *
 * Purpose: Polling-model adapter. Reads every connected pad once per tick and
 * hands the held set to a tracker's `syncPolled`.
 */

import type { PolledSink } from '../controls/contracts';
import { LIBRARY_DEFAULTS } from '../config/library';
import { gamepadButtonKey, readHeldGamepadButtons } from '../util/input-helpers';
import { toKeyMapper, type GamepadSource, type KeyMap, type KeyMapper } from './contracts';

export interface GamepadPollerOptions {
    /** Defaults to `navigator.getGamepads()`, or no pads outside a browser. */
    readonly source?: GamepadSource;
    /** Analog value above which a button counts as held. */
    readonly threshold?: number;
}

export interface MappedGamepadPollerOptions<K> extends GamepadPollerOptions {
    /** Maps `"<pad>:<button>"` keys to tracker keys. */
    readonly keyMap: KeyMap<K>;
}

const navigatorGamepads: GamepadSource = () => {
    if (typeof navigator === 'undefined' || typeof navigator.getGamepads !== 'function') {
        return [];
    }
    return navigator.getGamepads();
};

export class GamepadPoller<K> {
    private readonly source: GamepadSource;
    private readonly threshold: number;

    constructor(
        private readonly mapKey: KeyMapper<K>,
        options: GamepadPollerOptions = {},
    ) {
        this.source = options.source ?? navigatorGamepads;
        this.threshold = options.threshold ?? LIBRARY_DEFAULTS.gamepadButtonThreshold;
    }

    poll(): Set<K> {
        const held = new Set<K>();
        for (const reading of readHeldGamepadButtons(this.source(), this.threshold)) {
            const key = this.mapKey(gamepadButtonKey(reading.padIndex, reading.buttonIndex));
            if (key !== null) {
                held.add(key);
            }
        }
        return held;
    }

    /** Poll and replace the sink's held set in one step. */
    syncInto(sink: PolledSink<K>): Set<K> {
        const held = this.poll();
        sink.syncPolled(held);
        return held;
    }
}

export function createGamepadPoller(options?: GamepadPollerOptions): GamepadPoller<string>;
export function createGamepadPoller<K>(options: MappedGamepadPollerOptions<K>): GamepadPoller<K>;
export function createGamepadPoller<K>(
    options: GamepadPollerOptions | MappedGamepadPollerOptions<K> = {},
): GamepadPoller<K> | GamepadPoller<string> {
    if ('keyMap' in options) {
        return new GamepadPoller(toKeyMapper(options.keyMap), options);
    }
    return new GamepadPoller<string>((native) => native, options);
}
