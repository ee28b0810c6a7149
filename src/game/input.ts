import type { InputEvent } from '../types';

// Shell-level commands that never reach the simulation.
export type ShellCommand = 'start' | 'pause';

export type InputAction =
    | { kind: 'game'; event: InputEvent }
    | { kind: 'shell'; command: ShellCommand };

const game = (event: InputEvent): InputAction => ({ kind: 'game', event });
const shell = (command: ShellCommand): InputAction => ({ kind: 'shell', command });

const JUMP_KEYS = ['Space', 'ArrowUp', 'KeyW'];
const DUCK_KEYS = ['ArrowDown', 'KeyS'];

// Space both starts/retries and jumps; the shell decides which one applies.
export function mapKeyDown(code: string): InputAction[] {
    const out: InputAction[] = [];
    if (code === 'Space' || code === 'Enter') out.push(shell('start'));
    if (JUMP_KEYS.includes(code)) out.push(game('jumpPressed'));
    if (DUCK_KEYS.includes(code)) out.push(game('duckPressed'));
    switch (code) {
        case 'KeyT': out.push(game('toggleDayNight')); break;
        case 'KeyG': out.push(game('debugSpawnDragon')); break;
        case 'KeyH': out.push(game('toggleHitboxes')); break;
        case 'KeyP': case 'Escape': out.push(shell('pause')); break;
    }
    return out;
}

export function mapKeyUp(code: string): InputAction[] {
    return DUCK_KEYS.includes(code) ? [game('duckReleased')] : [];
}

// Keys the browser would otherwise use for scrolling.
const CAPTURED = new Set([...JUMP_KEYS, ...DUCK_KEYS]);

export function setupKeyboard(target: Window, dispatch: (action: InputAction) => void): () => void {
    const down = (e: KeyboardEvent) => {
        if (CAPTURED.has(e.code)) e.preventDefault();
        if (e.repeat) return;
        mapKeyDown(e.code).forEach(dispatch);
    };
    const up = (e: KeyboardEvent) => { mapKeyUp(e.code).forEach(dispatch); };
    target.addEventListener('keydown', down);
    target.addEventListener('keyup', up);
    return () => {
        target.removeEventListener('keydown', down);
        target.removeEventListener('keyup', up);
    };
}

// Standard mapping indices
export const PAD = { A: 0, Y: 3, START: 9, DPAD_DOWN: 13 } as const;

type PadSource = () => ReadonlyArray<Pick<Gamepad, 'buttons'> | null>;

// Edge-triggered gamepad reader; call poll() once per frame.
export function createGamepadPoller(dispatch: (action: InputAction) => void, getPads: PadSource) {
    let lastButtons: boolean[] = [];
    return {
        poll() {
            const gp = getPads()[0];
            if (!gp) return;
            const buttons = gp.buttons.map(b => b.pressed);
            const pressed = (i: number) => buttons[i] === true && lastButtons[i] !== true;
            const released = (i: number) => buttons[i] !== true && lastButtons[i] === true;
            if (pressed(PAD.A)) { dispatch(shell('start')); dispatch(game('jumpPressed')); }
            if (pressed(PAD.DPAD_DOWN)) dispatch(game('duckPressed'));
            if (released(PAD.DPAD_DOWN)) dispatch(game('duckReleased'));
            if (pressed(PAD.Y)) dispatch(game('toggleDayNight'));
            if (pressed(PAD.START)) dispatch(shell('pause'));
            lastButtons = buttons;
        },
    };
}
