/**
 * Keyboard Event Source
 *
 * Purpose: Event-model adapter. Forwards DOM `keydown`/`keyup` to a tracker
 * (or anything with `press`/`release`), keyed by `KeyboardEvent.code`.
 * A key mapped from several codes stays down until the last of them is up.
 */

import type { PressReleaseSink } from '../controls/contracts';
import { normalizeKeyboardEvent } from '../util/input-helpers';
import { rootLogger, type Logger } from '../util/log';
import { toKeyMapper, type InputAdapter, type KeyMap, type KeyMapper } from './contracts';

export interface KeyboardEventSourceOptions<K> {
    readonly keyMap: KeyMap<K>;
    /** Call `preventDefault()` on events that map to a key. */
    readonly preventDefault?: boolean;
    /** Release held keys when the window loses focus; defaults to true. */
    readonly releaseOnBlur?: boolean;
    readonly logger?: Logger;
}

const isKeyboardEvent = (event: Event): event is KeyboardEvent =>
    'code' in event && 'repeat' in event && typeof event.code === 'string';

export class KeyboardEventSource<K> implements InputAdapter {
    private readonly mapKey: KeyMapper<K>;
    private readonly preventDefault: boolean;
    private readonly releaseOnBlur: boolean;
    private readonly logger: Logger;
    /** Physical codes currently holding each mapped key. */
    private readonly held = new Map<K, Set<string>>();
    private target: EventTarget | null = null;
    private blurTarget: EventTarget | null = null;
    private readonly keyDownListener: (event: Event) => void;
    private readonly keyUpListener: (event: Event) => void;
    private readonly blurListener: () => void;

    constructor(
        private readonly sink: PressReleaseSink<K>,
        options: KeyboardEventSourceOptions<K>,
    ) {
        this.mapKey = toKeyMapper(options.keyMap);
        this.preventDefault = options.preventDefault ?? false;
        this.releaseOnBlur = options.releaseOnBlur ?? true;
        this.logger = (options.logger ?? rootLogger).child('keyboard-source');
        this.keyDownListener = (event) => this.handleKey(event);
        this.keyUpListener = (event) => this.handleKey(event);
        this.blurListener = () => this.releaseAll();
    }

    attach(target: EventTarget): void {
        this.detach();

        this.target = target;
        target.addEventListener('keydown', this.keyDownListener);
        target.addEventListener('keyup', this.keyUpListener);

        if (this.releaseOnBlur && typeof window !== 'undefined' && typeof window.addEventListener === 'function') {
            this.blurTarget = window;
            window.addEventListener('blur', this.blurListener);
        }
        this.logger.debug('attached');
    }

    detach(): void {
        if (this.target) {
            this.target.removeEventListener('keydown', this.keyDownListener);
            this.target.removeEventListener('keyup', this.keyUpListener);
            this.logger.debug('detached');
        }
        this.blurTarget?.removeEventListener('blur', this.blurListener);
        this.target = null;
        this.blurTarget = null;
        this.releaseAll();
    }

    isAttached(): boolean {
        return this.target !== null;
    }

    heldKeys(): K[] {
        return [...this.held.keys()];
    }

    private handleKey(event: Event): void {
        if (!isKeyboardEvent(event)) {
            return;
        }

        const data = normalizeKeyboardEvent(event);
        const key = this.mapKey(data.code);
        if (key === null) {
            return;
        }

        if (this.preventDefault) {
            event.preventDefault();
        }

        const codes = this.held.get(key);

        if (data.pressed) {
            if (codes?.has(data.code)) {
                return;
            }
            if (codes) {
                codes.add(data.code);
                return;
            }
            this.held.set(key, new Set([data.code]));
            this.sink.press(key);
            return;
        }

        if (codes) {
            codes.delete(data.code);
            if (codes.size > 0) {
                return;
            }
            this.held.delete(key);
        }
        this.sink.release(key);
    }

    private releaseAll(): void {
        for (const key of this.held.keys()) {
            this.sink.release(key);
        }
        this.held.clear();
    }
}
