import type { Logger } from '../util/log';
import type { ControlQueries, ControlState, PolledSink, PressReleaseSink } from './contracts';
import { ControlBindings, type BindingEntry } from './control-bindings';
import { InputTracker } from './input-tracker';

export interface BoundControlsOptions<I, C> {
    readonly bindings?: ControlBindings<I, C> | Iterable<BindingEntry<I, C>>;
    readonly tracker?: InputTracker<C>;
    readonly logger?: Logger;
}

const isBindings = <I, C>(
    value: ControlBindings<I, C> | Iterable<BindingEntry<I, C>>,
): value is ControlBindings<I, C> => value instanceof ControlBindings;

/**
 * Game controls driven by raw device inputs through {@link ControlBindings}.
 * A control is down while any input bound to it is down.
 *
 * Accepts raw input through either delivery model, like the tracker it
 * feeds, and lets a pending rebind swallow the next newly pressed input.
 */
export class BoundControls<I, C> implements ControlQueries<C>, PressReleaseSink<I>, PolledSink<I> {
    readonly bindings: ControlBindings<I, C>;
    readonly tracker: InputTracker<C>;
    /** Held raw inputs and the control each one drove when it went down. */
    private readonly pressedInputs = new Map<I, C | null>();
    private previousPolled = new Set<I>();

    constructor(options: BoundControlsOptions<I, C> = {}) {
        const { bindings, logger } = options;
        if (bindings === undefined) {
            this.bindings = new ControlBindings<I, C>({ logger });
        } else if (isBindings(bindings)) {
            this.bindings = bindings;
        } else {
            this.bindings = new ControlBindings<I, C>({ bindings, logger });
        }
        this.tracker = options.tracker ?? new InputTracker<C>({ logger });
    }

    /** Polling model: `rawDown` is everything the device reports held now. */
    pollInputs(rawDown: Iterable<I>): void {
        const polled = new Set(rawDown);
        const previous = this.previousPolled;
        this.previousPolled = polled;

        if (this.bindings.isListening()) {
            const fresh = [...polled].find((input) => !previous.has(input));
            if (fresh !== undefined) {
                this.bindings.captureRebind(fresh);
            }
            return;
        }

        const controlsDown = new Set<C>();
        for (const input of polled) {
            const control = this.bindings.controlFor(input);
            if (control !== null) {
                controlsDown.add(control);
            }
        }
        this.tracker.syncPolled(controlsDown);
    }

    syncPolled(rawDown: Iterable<I>): void {
        this.pollInputs(rawDown);
    }

    /** Event model: a raw input went down. Repeats while held are ignored. */
    inputDown(input: I): void {
        if (this.pressedInputs.has(input)) {
            return;
        }
        if (this.bindings.captureRebind(input)) {
            return;
        }

        const control = this.bindings.controlFor(input);
        this.pressedInputs.set(input, control);
        if (control !== null) {
            this.tracker.press(control);
        }
    }

    /**
     * Event model: a raw input came up. Releases the control the input drove
     * when it went down, even if its binding has changed since.
     */
    inputUp(input: I): void {
        if (!this.pressedInputs.has(input)) {
            return;
        }
        const control = this.pressedInputs.get(input) ?? null;
        this.pressedInputs.delete(input);
        if (control === null || this.isHeldByOtherInput(control)) {
            return;
        }
        this.tracker.release(control);
    }

    press(input: I): void {
        this.inputDown(input);
    }

    release(input: I): void {
        this.inputUp(input);
    }

    /** Drop every raw input and release every held control. */
    clearInputs(): void {
        this.pressedInputs.clear();
        this.previousPolled = new Set<I>();
        for (const control of this.tracker.pressedKeys()) {
            this.tracker.release(control);
        }
    }

    isDown(control: C): boolean {
        return this.tracker.isDown(control);
    }

    justPressed(control: C): boolean {
        return this.tracker.justPressed(control);
    }

    justReleased(control: C): boolean {
        return this.tracker.justReleased(control);
    }

    state(control: C): ControlState {
        return this.tracker.state(control);
    }

    heldFrames(control: C): number {
        return this.tracker.heldFrames(control);
    }

    endFrame(): void {
        this.tracker.endFrame();
    }

    private isHeldByOtherInput(control: C): boolean {
        for (const held of this.pressedInputs.values()) {
            if (held === control) {
                return true;
            }
        }
        return false;
    }
}
