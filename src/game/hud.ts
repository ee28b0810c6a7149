import type { EventBus } from '../events';
import type { FrameSnapshot } from '../simulation';

export type ScreenState = 'menu' | 'playing' | 'paused' | 'gameOver';

// Fraction of the dash still left, for the HUD bar.
export function dashFraction(snap: FrameSnapshot, dashDuration: number): number {
    const p = snap.player.powerUp;
    if (!p || dashDuration <= 0) return 0;
    return Math.max(0, Math.min(1, p.remaining / dashDuration));
}

export function updateHud(snap: FrameSnapshot, dashDuration: number) {
    const scoreEl = document.getElementById('score'); if (scoreEl) scoreEl.textContent = `SCORE: ${snap.score}`;
    const hiEl = document.getElementById('highScore'); if (hiEl) hiEl.textContent = `HI: ${snap.highScore}`;
    const pct = dashFraction(snap, dashDuration) * 100;
    const dashWrap = document.getElementById('dash');
    if (dashWrap) dashWrap.style.display = pct > 0 ? 'block' : 'none';
    const dashBar = document.getElementById('dashBar'); if (dashBar) dashBar.style.width = pct + '%';
    const modeEl = document.getElementById('mode'); if (modeEl) modeEl.textContent = snap.environment.daytime ? 'Day' : 'Night';
    const tornadoEl = document.getElementById('tornado'); if (tornadoEl) tornadoEl.style.display = snap.player.tornadoArmed ? 'block' : 'none';
}

// Restarts the fade-out animation on every call.
export function showBanner(text: string) {
    const el = document.getElementById('banner');
    if (!el) return;
    el.textContent = text;
    el.classList.remove('show');
    void el.offsetWidth;
    el.classList.add('show');
}

export function bindHudEvents(events: EventBus) {
    events.on('milestone', e => {
        showBanner(`${e.score}!`);
        console.info(`[game] milestone: ${e.score}`);
    });
    events.on('tornadoKill', e => {
        showBanner(`TORNADO +${e.bonus}`);
        console.info(`[game] tornado bonus: ${e.bonus}`);
    });
    events.on('powerUp', e => console.info(`[game] power-up: ${e.kind}`));
}

const OVERLAYS: Record<Exclude<ScreenState, 'playing'>, { title: string; hint: string }> = {
    menu: { title: 'RONIN RUNNER', hint: 'Press SPACE to Start' },
    paused: { title: 'PAUSED', hint: 'Press P to Resume' },
    gameOver: { title: 'HONOR LOST', hint: 'Press SPACE to Retry' },
};

export function showOverlay(state: ScreenState, snap?: FrameSnapshot) {
    const el = document.getElementById('overlay');
    if (!el) return;
    if (state === 'playing') { el.style.display = 'none'; return; }
    const { title, hint } = OVERLAYS[state];
    el.style.display = 'flex';
    el.dataset.state = state;
    const titleEl = el.querySelector('.title'); if (titleEl) titleEl.textContent = title;
    const hintEl = el.querySelector('.hint'); if (hintEl) hintEl.textContent = hint;
    const detail = el.querySelector('.detail');
    if (detail) {
        if (state === 'gameOver' && snap) detail.textContent = `Final Score: ${snap.score}${snap.newHighScore ? ' (new best!)' : ''}`;
        else detail.textContent = '';
    }
}
