import { describe, it, expect, vi, afterEach } from 'vitest';
import { HIGH_SCORE_KEY, LocalHighScoreStore, MemoryHighScoreStore, type KeyValueStorage } from '../highScore';

class MapStorage implements KeyValueStorage {
    data = new Map<string, string>();
    getItem(key: string) { return this.data.get(key) ?? null; }
    setItem(key: string, value: string) { this.data.set(key, value); }
}

afterEach(() => { vi.restoreAllMocks(); });

describe('LocalHighScoreStore', () => {
    it('starts from zero', () => {
        expect(new LocalHighScoreStore(new MapStorage()).load()).toBe(0);
    });
    it('round-trips a floored score under its key', () => {
        const storage = new MapStorage();
        const store = new LocalHighScoreStore(storage);
        store.save(412.9);
        expect(storage.data.get(HIGH_SCORE_KEY)).toBe('{"highScore":412}');
        expect(store.load()).toBe(412);
    });
    it('ignores malformed values', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const storage = new MapStorage();
        const store = new LocalHighScoreStore(storage);
        storage.setItem(HIGH_SCORE_KEY, '{"highScore":-3}');
        expect(store.load()).toBe(0);
        storage.setItem(HIGH_SCORE_KEY, 'not json');
        expect(store.load()).toBe(0);
        expect(warn).toHaveBeenCalledTimes(2);
    });
    it('survives storage that throws', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const broken: KeyValueStorage = {
            getItem: () => { throw new Error('denied'); },
            setItem: () => { throw new Error('full'); },
        };
        const store = new LocalHighScoreStore(broken);
        expect(store.load()).toBe(0);
        store.save(10);
        expect(warn).toHaveBeenCalledTimes(2);
    });
});

describe('MemoryHighScoreStore', () => {
    it('keeps the last saved value', () => {
        const store = new MemoryHighScoreStore(5);
        expect(store.load()).toBe(5);
        store.save(9.7);
        expect(store.load()).toBe(9);
    });
});
