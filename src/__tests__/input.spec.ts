/** @vitest-environment jsdom */
import { describe, it, expect } from 'vitest';
import { createGamepadPoller, mapKeyDown, mapKeyUp, PAD, setupKeyboard, type InputAction } from '../game/input';

describe('keyboard mapping', () => {
    it('space starts and jumps', () => {
        expect(mapKeyDown('Space')).toEqual([{ kind: 'shell', command: 'start' }, { kind: 'game', event: 'jumpPressed' }]);
    });
    it('maps the duck keys both ways', () => {
        expect(mapKeyDown('ArrowDown')).toEqual([{ kind: 'game', event: 'duckPressed' }]);
        expect(mapKeyUp('KeyS')).toEqual([{ kind: 'game', event: 'duckReleased' }]);
        expect(mapKeyUp('KeyW')).toEqual([]);
    });
    it('maps the toggles and pause', () => {
        expect(mapKeyDown('KeyT')).toEqual([{ kind: 'game', event: 'toggleDayNight' }]);
        expect(mapKeyDown('KeyG')).toEqual([{ kind: 'game', event: 'debugSpawnDragon' }]);
        expect(mapKeyDown('KeyH')).toEqual([{ kind: 'game', event: 'toggleHitboxes' }]);
        expect(mapKeyDown('Escape')).toEqual([{ kind: 'shell', command: 'pause' }]);
        expect(mapKeyDown('KeyX')).toEqual([]);
    });
});

describe('setupKeyboard', () => {
    it('dispatches presses, skips repeats and detaches', () => {
        const got: InputAction[] = [];
        const dispose = setupKeyboard(window, a => got.push(a));
        const down = new KeyboardEvent('keydown', { code: 'ArrowUp', cancelable: true });
        window.dispatchEvent(down);
        expect(down.defaultPrevented).toBe(true);
        window.dispatchEvent(new KeyboardEvent('keydown', { code: 'ArrowUp', repeat: true }));
        window.dispatchEvent(new KeyboardEvent('keyup', { code: 'ArrowDown' }));
        dispose();
        window.dispatchEvent(new KeyboardEvent('keydown', { code: 'KeyT' }));
        expect(got).toEqual([{ kind: 'game', event: 'jumpPressed' }, { kind: 'game', event: 'duckReleased' }]);
    });
});

describe('gamepad poller', () => {
    const button = (pressed: boolean): GamepadButton => ({ pressed, touched: pressed, value: pressed ? 1 : 0 });
    const padWith = (...down: number[]) => ({ buttons: Array.from({ length: 16 }, (_, i) => button(down.includes(i))) });

    it('fires on press and release edges only', () => {
        const got: InputAction[] = [];
        let pad = padWith();
        const poller = createGamepadPoller(a => got.push(a), () => [pad]);
        poller.poll();
        pad = padWith(PAD.A, PAD.DPAD_DOWN);
        poller.poll();
        poller.poll();
        pad = padWith(PAD.Y);
        poller.poll();
        expect(got).toEqual([
            { kind: 'shell', command: 'start' },
            { kind: 'game', event: 'jumpPressed' },
            { kind: 'game', event: 'duckPressed' },
            { kind: 'game', event: 'duckReleased' },
            { kind: 'game', event: 'toggleDayNight' },
        ]);
    });

    it('does nothing without a pad', () => {
        const got: InputAction[] = [];
        createGamepadPoller(a => got.push(a), () => [null]).poll();
        expect(got).toEqual([]);
    });
});
