import type { PowerUpKind } from './types';

export type GameEventMap = {
    gameover: { score: number; highScore: number; newHighScore: boolean };
    milestone: { score: number };
    powerUp: { kind: PowerUpKind };
    tornadoKill: { bonus: number };
};

type Handler<T> = (payload: T) => void;

export class EventBus {
    private handlers: { [K in keyof GameEventMap]: Handler<GameEventMap[K]>[] } = {
        gameover: [],
        milestone: [],
        powerUp: [],
        tornadoKill: [],
    };
    on<K extends keyof GameEventMap>(type: K, fn: Handler<GameEventMap[K]>) { this.handlers[type].push(fn); }
    off<K extends keyof GameEventMap>(type: K, fn: Handler<GameEventMap[K]>) {
        const arr = this.handlers[type]; const i = arr.indexOf(fn); if (i >= 0) arr.splice(i, 1);
    }
    emit<K extends keyof GameEventMap>(type: K, payload: GameEventMap[K]) { this.handlers[type].forEach(h => h(payload)); }
}
