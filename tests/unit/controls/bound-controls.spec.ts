import { describe, expect, it } from 'vitest';
import { BoundControls } from 'controls/bound-controls';
import { ControlBindings, type BindingEntry } from 'controls/control-bindings';
import { InputTracker } from 'controls/input-tracker';

type Control = 'jump' | 'fire' | 'left';

const BINDINGS: readonly BindingEntry<string, Control>[] = [
    ['Space', 'jump'],
    ['KeyW', 'jump'],
    ['KeyJ', 'fire'],
];

const createControls = () => new BoundControls<string, Control>({ bindings: BINDINGS });

describe('BoundControls', () => {
    it('shares a bindings instance and tracker when given them', () => {
        const bindings = new ControlBindings<string, Control>({ bindings: BINDINGS });
        const tracker = new InputTracker<Control>();
        const controls = new BoundControls({ bindings, tracker });

        controls.press('KeyJ');

        expect(controls.bindings).toBe(bindings);
        expect(tracker.justPressed('fire')).toBe(true);
    });

    describe('event model', () => {
        it('holds a control while any bound input is down', () => {
            const controls = createControls();

            controls.inputDown('Space');
            controls.inputDown('KeyW');
            controls.endFrame();
            controls.inputUp('Space');

            expect(controls.isDown('jump')).toBe(true);
            expect(controls.justReleased('jump')).toBe(false);

            controls.inputUp('KeyW');
            expect(controls.justReleased('jump')).toBe(true);
        });

        it('ignores unbound inputs', () => {
            const controls = createControls();
            controls.inputDown('KeyQ');
            controls.inputUp('KeyQ');

            expect(controls.tracker.trackedKeys()).toEqual([]);
        });

        it('releases everything on clearInputs', () => {
            const controls = createControls();
            controls.inputDown('Space');
            controls.inputDown('KeyJ');
            controls.clearInputs();

            expect(controls.state('jump')).toBe('just-up');
            expect(controls.state('fire')).toBe('just-up');
        });

        it('counts held frames per control', () => {
            const controls = createControls();
            controls.press('KeyJ');
            controls.endFrame();

            expect(controls.heldFrames('fire')).toBe(2);
        });
    });

    describe('bindings changed while an input is held', () => {
        it('releases the control after its input is unbound', () => {
            const controls = new BoundControls<string, Control>({ bindings: [['Space', 'jump']] });
            controls.inputDown('Space');
            controls.bindings.unbind('Space');
            controls.inputUp('Space');

            expect(controls.justReleased('jump')).toBe(true);
            controls.endFrame();
            expect(controls.isDown('jump')).toBe(false);
        });

        it('releases the old control after its input is rebound', () => {
            const controls = createControls();
            controls.inputDown('Space');
            controls.bindings.bind('Space', 'fire');
            controls.inputUp('Space');

            expect(controls.justReleased('jump')).toBe(true);
            expect(controls.tracker.isTracked('fire')).toBe(false);
        });

        it('keeps the control down while another pressed input still drove it', () => {
            const controls = createControls();
            controls.inputDown('Space');
            controls.inputDown('KeyW');
            controls.bindings.clear();

            controls.inputUp('Space');
            expect(controls.isDown('jump')).toBe(true);

            controls.inputUp('KeyW');
            expect(controls.justReleased('jump')).toBe(true);
        });

        it('ignores a release for an input it never saw go down', () => {
            const controls = createControls();
            controls.inputUp('Space');

            expect(controls.tracker.trackedKeys()).toEqual([]);
        });
    });

    describe('polling model', () => {
        it('maps the held inputs onto controls', () => {
            const controls = createControls();

            controls.pollInputs(['Space', 'KeyJ', 'KeyQ']);
            expect(controls.justPressed('jump')).toBe(true);
            expect(controls.justPressed('fire')).toBe(true);

            controls.endFrame();
            controls.syncPolled(['KeyW']);

            expect(controls.isDown('jump')).toBe(true);
            expect(controls.justPressed('jump')).toBe(false);
            expect(controls.justReleased('fire')).toBe(true);
        });
    });

    describe('rebinding', () => {
        it('swallows the next new event input', () => {
            const controls = createControls();
            controls.bindings.listenForRebind('left');

            controls.inputDown('KeyA');

            expect(controls.bindings.controlFor('KeyA')).toBe('left');
            expect(controls.isDown('left')).toBe(false);
            expect(controls.bindings.isListening()).toBe(false);
        });

        it('does not capture an input that was already held', () => {
            const controls = createControls();
            controls.inputDown('Space');
            controls.bindings.listenForRebind('fire');

            controls.inputDown('Space');
            expect(controls.bindings.isListening()).toBe(true);

            controls.inputDown('KeyA');
            expect(controls.bindings.controlFor('KeyA')).toBe('fire');
        });

        it('captures the first newly polled input and forwards nothing meanwhile', () => {
            const controls = createControls();
            controls.pollInputs(['Space']);
            controls.endFrame();
            controls.bindings.listenForRebind('left');

            controls.pollInputs(['Space']);
            expect(controls.bindings.isListening()).toBe(true);

            controls.pollInputs(['Space', 'KeyA']);
            expect(controls.bindings.controlFor('KeyA')).toBe('left');
            expect(controls.isDown('left')).toBe(false);

            controls.pollInputs(['Space', 'KeyA']);
            expect(controls.justPressed('left')).toBe(true);
            expect(controls.isDown('jump')).toBe(true);
        });
    });
});
