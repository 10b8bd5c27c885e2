import { rootLogger, type Logger } from '../util/log';

export type BindingEntry<I, C> = readonly [input: I, control: C];

export interface RebindEvent<I, C> {
    readonly input: I;
    readonly control: C;
    /** Control the input drove before, if any. */
    readonly previous: C | null;
}

export type RebindListener<I, C> = (event: RebindEvent<I, C>) => void;

export interface ControlBindingsOptions<I, C> {
    readonly bindings?: Iterable<BindingEntry<I, C>>;
    readonly logger?: Logger;
}

/**
 * Maps raw device inputs (`I`) to the game's controls (`C`). An input drives
 * at most one control; a control may have several inputs.
 *
 * Rebinding works by listening: after `listenForRebind(control)` the next
 * input pressed is bound to that control instead of being delivered.
 */
export class ControlBindings<I, C> {
    private readonly bindings = new Map<I, C>();
    private readonly listeners = new Set<RebindListener<I, C>>();
    private readonly logger: Logger;
    private listeningFor: { readonly control: C } | null = null;

    constructor(options: ControlBindingsOptions<I, C> = {}) {
        this.logger = (options.logger ?? rootLogger).child('control-bindings');
        if (options.bindings) {
            this.load(options.bindings);
        }
    }

    bind(input: I, control: C): void {
        this.bindings.set(input, control);
    }

    unbind(input: I): boolean {
        return this.bindings.delete(input);
    }

    controlFor(input: I): C | null {
        return this.bindings.get(input) ?? null;
    }

    inputsFor(control: C): I[] {
        const inputs: I[] = [];
        for (const [input, bound] of this.bindings) {
            if (bound === control) {
                inputs.push(input);
            }
        }
        return inputs;
    }

    /** Distinct controls with at least one input, in binding order. */
    controls(): C[] {
        return [...new Set(this.bindings.values())];
    }

    entries(): BindingEntry<I, C>[] {
        return [...this.bindings];
    }

    /** Replace every binding. */
    load(entries: Iterable<BindingEntry<I, C>>): void {
        this.bindings.clear();
        for (const [input, control] of entries) {
            this.bindings.set(input, control);
        }
    }

    clear(): void {
        this.bindings.clear();
    }

    listenForRebind(control: C): void {
        this.listeningFor = { control };
        this.logger.debug('listening for rebind', { control });
    }

    cancelRebind(): void {
        this.listeningFor = null;
    }

    pendingRebind(): C | null {
        return this.listeningFor ? this.listeningFor.control : null;
    }

    isListening(): boolean {
        return this.listeningFor !== null;
    }

    /**
     * Offer a freshly pressed input to a pending rebind. Returns true when the
     * input was consumed by it.
     */
    captureRebind(input: I): boolean {
        if (!this.listeningFor) {
            return false;
        }

        const { control } = this.listeningFor;
        const previous = this.controlFor(input);
        this.bindings.set(input, control);
        this.listeningFor = null;
        this.logger.debug('rebound', { input, control, previous });
        this.notify({ input, control, previous });
        return true;
    }

    onRebind(listener: RebindListener<I, C>): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private notify(event: RebindEvent<I, C>): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (error) {
                this.logger.error('Rebind listener failed', {
                    message: error instanceof Error ? error.message : String(error),
                });
            }
        }
    }
}
