import { describe, expect, it, vi } from 'vitest';
import { InputTracker } from 'controls/input-tracker';
import { GamepadPoller, createGamepadPoller } from 'input/gamepad-poller';
import type { GamepadLike } from 'util/input-helpers';

const pad = (index: number, values: number[]): GamepadLike => ({
    index,
    connected: true,
    buttons: values.map((value) => ({ pressed: value === 1, value })),
});

describe('GamepadPoller', () => {
    it('reports held buttons as pad:button keys by default', () => {
        const poller = createGamepadPoller({ source: () => [pad(0, [1, 0, 0.7]), null, pad(1, [0, 1])] });

        expect([...poller.poll()]).toEqual(['0:0', '0:2', '1:1']);
    });

    it('maps buttons onto tracker keys', () => {
        const poller = createGamepadPoller<'jump' | 'fire'>({
            source: () => [pad(0, [1, 1, 1])],
            keyMap: { '0:0': 'jump', '0:2': 'fire' },
        });

        expect([...poller.poll()]).toEqual(['jump', 'fire']);
    });

    it('honours a custom threshold', () => {
        const poller = createGamepadPoller({ source: () => [pad(0, [0.3])], threshold: 0.2 });

        expect(poller.poll().has('0:0')).toBe(true);
    });

    it('replaces the tracker held set on each sync', () => {
        const frames = [[pad(0, [1, 0])], [pad(0, [0, 1])]];
        let frame = 0;
        const poller = new GamepadPoller<string>((native) => native, { source: () => frames[frame] });
        const tracker = new InputTracker<string>();

        poller.syncInto(tracker);
        tracker.endFrame();
        frame = 1;
        const held = poller.syncInto(tracker);

        expect([...held]).toEqual(['0:1']);
        expect(tracker.justReleased('0:0')).toBe(true);
        expect(tracker.justPressed('0:1')).toBe(true);
    });

    it('reads navigator gamepads when no source is given', () => {
        vi.stubGlobal('navigator', { getGamepads: () => [pad(2, [0, 0, 0, 1])] });

        expect([...createGamepadPoller().poll()]).toEqual(['2:3']);
    });

    it('sees no pads where the gamepad API is missing', () => {
        vi.stubGlobal('navigator', {});

        expect(createGamepadPoller().poll().size).toBe(0);
    });
});
