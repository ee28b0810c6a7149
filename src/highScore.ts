import { z } from 'zod';

export const HIGH_SCORE_KEY = 'ronin_runner_highscore_v1';

export interface HighScoreStore {
    load(): number;
    save(score: number): void;
}

const PayloadSchema = z.object({ highScore: z.number().int().nonnegative() });

// Minimal slice of the Web Storage API, so tests can pass a stand-in.
export type KeyValueStorage = Pick<Storage, 'getItem' | 'setItem'>;

export class LocalHighScoreStore implements HighScoreStore {
    constructor(private readonly storage: KeyValueStorage, private readonly key = HIGH_SCORE_KEY) {}

    load(): number {
        let raw: string | null;
        try {
            raw = this.storage.getItem(this.key);
        } catch (err) {
            console.warn('[storage] high score unavailable', err);
            return 0;
        }
        if (raw === null) return 0;
        try {
            const parsed = PayloadSchema.safeParse(JSON.parse(raw));
            if (parsed.success) return parsed.data.highScore;
            console.warn('[storage] ignoring malformed high score', parsed.error.issues);
        } catch (err) {
            console.warn('[storage] ignoring unreadable high score', err);
        }
        return 0;
    }

    save(score: number): void {
        try {
            this.storage.setItem(this.key, JSON.stringify({ highScore: Math.max(0, Math.floor(score)) }));
        } catch (err) {
            console.warn('[storage] could not save high score', err);
        }
    }
}

export class MemoryHighScoreStore implements HighScoreStore {
    constructor(private value = 0) {}
    load(): number { return this.value; }
    save(score: number): void { this.value = Math.max(0, Math.floor(score)); }
}
