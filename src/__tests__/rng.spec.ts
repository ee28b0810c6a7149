import { describe, it, expect } from 'vitest';
import { pick, randInt, randomRng, weightedPick } from '../rng';

describe('randomRng', () => {
    it('produces deterministic sequence for same seed', () => {
        const a = randomRng(123);
        const b = randomRng(123);
        const seqA = Array.from({ length: 5 }, () => a());
        const seqB = Array.from({ length: 5 }, () => b());
        expect(seqA).toEqual(seqB);
    });
    it('different seeds differ', () => {
        const a = randomRng(123)();
        const b = randomRng(124)();
        expect(a).not.toBe(b);
    });
    it('values in [0,1)', () => {
        const r = randomRng(999);
        for (let i = 0; i < 10; i++) {
            const v = r();
            expect(v).toBeGreaterThanOrEqual(0);
            expect(v).toBeLessThan(1);
        }
    });
});

describe('pick helpers', () => {
    it('randInt is inclusive on both ends', () => {
        expect(randInt(() => 0, 1, 3)).toBe(1);
        expect(randInt(() => 0.999, 1, 3)).toBe(3);
    });
    it('pick throws on an empty list', () => {
        expect(() => pick(() => 0.5, [])).toThrow('empty');
    });
});

describe('weightedPick', () => {
    it('walks the table in order', () => {
        const table = [['a', 1], ['b', 3]] as const;
        expect(weightedPick(() => 0, table)).toBe('a');
        expect(weightedPick(() => 0.3, table)).toBe('b'); // roll 1.2 lands past a's 1
        expect(weightedPick(() => 0.999, table)).toBe('b');
    });
    it('never returns a zero-weight key', () => {
        const rng = randomRng(7);
        for (let i = 0; i < 200; i++) expect(weightedPick(rng, [['never', 0], ['always', 2]])).toBe('always');
    });
    it('rejects a table with no weight', () => {
        expect(() => weightedPick(() => 0.5, [['a', 0]])).toThrow();
    });
    it('roughly follows the weights over many draws', () => {
        const rng = randomRng(2024);
        const counts = { x: 0, y: 0 };
        for (let i = 0; i < 10000; i++) counts[weightedPick(rng, [['x', 1], ['y', 3]] as const)]++;
        expect(counts.y / 10000).toBeGreaterThan(0.72);
        expect(counts.y / 10000).toBeLessThan(0.78);
    });
});
