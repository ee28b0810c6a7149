import { Application, type Ticker } from 'pixi.js';
import { AudioPlayback } from './audio/playback';
import type { GameConfig } from './config';
import { bindHudEvents, showOverlay, updateHud, type ScreenState } from './game/hud';
import { createGamepadPoller, setupKeyboard, type InputAction } from './game/input';
import type { HighScoreStore } from './highScore';
import { loadAssets } from './render/assets';
import { SceneRenderer } from './render/renderer';
import { createSimulation, handleInput, pause, restart, resume, snapshot, step, type GameContext } from './simulation';

export interface GameOptions {
    config: GameConfig;
    highScores: HighScoreStore;
}

// Browser shell: owns the pixi application, turns device input into simulation
// input, and draws a snapshot every tick. All rules live in the simulation.
export class Game {
    app!: Application;
    ctx!: GameContext;
    screen: ScreenState = 'menu';
    private renderer!: SceneRenderer;
    private audio!: AudioPlayback;
    private pads = createGamepadPoller(a => this.dispatch(a), () => (navigator.getGamepads ? navigator.getGamepads() : []));

    constructor(parent: HTMLElement, private readonly options: GameOptions) {
        this.init(parent).catch(err => console.error('[game] failed to start', err));
    }

    private async init(parent: HTMLElement) {
        this.app = new Application();
        const { width, height } = this.options.config.screen;
        await this.app.init({ width, height, background: '#87ceeb', antialias: true });
        parent.appendChild(this.app.canvas);

        const loaded = await loadAssets(this.app.renderer);
        this.ctx = createSimulation({ config: this.options.config, catalog: loaded.catalog, highScores: this.options.highScores });
        this.renderer = new SceneRenderer(this.app, loaded.textures, this.ctx.config);
        this.audio = new AudioPlayback(this.ctx.config.muted);
        this.audio.attach(window);

        this.ctx.events.on('gameover', e => {
            this.screen = 'gameOver';
            showOverlay('gameOver', snapshot(this.ctx));
            console.info(`[game] run over: ${e.score} (best ${e.highScore}${e.newHighScore ? ', new' : ''})`);
        });
        bindHudEvents(this.ctx.events);

        setupKeyboard(window, a => this.dispatch(a));
        showOverlay('menu');
        this.app.ticker.add(this.update);
        console.info(`[game] ready, seed ${this.ctx.config.seed}`);
    }

    private dispatch(action: InputAction) {
        if (!this.ctx) return;
        if (action.kind === 'game') {
            if (action.event === 'toggleHitboxes' || this.screen === 'playing') handleInput(this.ctx, action.event);
            return;
        }
        if (action.command === 'start') {
            if (this.screen === 'menu') this.setScreen('playing');
            else if (this.screen === 'gameOver') { restart(this.ctx); this.setScreen('playing'); }
        } else if (this.screen === 'playing') {
            if (pause(this.ctx)) this.setScreen('paused');
        } else if (this.screen === 'paused') {
            if (resume(this.ctx)) this.setScreen('playing');
        }
    }

    private setScreen(screen: ScreenState) {
        this.screen = screen;
        showOverlay(screen);
    }

    update = (ticker: Ticker) => {
        this.pads.poll();
        if (this.screen === 'playing') step(this.ctx, ticker.deltaMS / 1000);
        const snap = snapshot(this.ctx);
        this.audio.playCues(snap.cues);
        this.renderer.draw(snap);
        updateHud(snap, this.ctx.config.powerUps.dashDuration);
    };
}
