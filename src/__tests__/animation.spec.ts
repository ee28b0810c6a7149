import { describe, it, expect } from 'vitest';
import { advanceFrame } from '../animation';
import { frameAt, requireEntityFrames, validateCatalog, type AssetCatalog } from '../assets/catalog';
import { createProceduralCatalog } from '../assets/procedural';
import { AssetContractError } from '../errors';
import { createMask } from '../mask';

function contractError(fn: () => unknown): AssetContractError {
    try {
        fn();
    } catch (err) {
        if (err instanceof AssetContractError) return err;
        throw err;
    }
    throw new Error('expected an AssetContractError');
}

describe('advanceFrame', () => {
    it('loops through frames, carrying the remainder', () => {
        const next = advanceFrame(0, 0, 0.25, 2, 0.1);
        expect(next.index).toBe(0);
        expect(next.timer).toBeCloseTo(0.05);
        expect(advanceFrame(0, 0.05, 0.06, 2, 0.1).index).toBe(1);
    });
    it('stays on frame zero for single-frame sets', () => {
        expect(advanceFrame(0, 0, 5, 1, 0.1)).toEqual({ index: 0, timer: 0 });
    });
});

describe('asset catalog', () => {
    it('accepts the procedural catalog', () => {
        const catalog = createProceduralCatalog();
        expect(validateCatalog(catalog)).toBe(catalog);
        expect(catalog.player.run?.frames).toHaveLength(2);
        expect(catalog.entities.dragonRed?.frames).toHaveLength(2);
    });
    it('gives ducking a shorter silhouette than running', () => {
        const catalog = createProceduralCatalog();
        expect(catalog.player.run?.frames[0].mask.height).toBe(72);
        expect(catalog.player.duck?.frames[0].mask.height).toBe(50);
    });
    it('fails when a kind has no frames', () => {
        const catalog: AssetCatalog = createProceduralCatalog();
        delete catalog.entities.rock;
        const err = contractError(() => validateCatalog(catalog));
        expect(err.subject).toBe('rock');
        expect(err.message).toBe('[assets] rock: no frames loaded');
        expect(() => requireEntityFrames(catalog, 'rock')).toThrow(AssetContractError);
    });
    it('fails on a mask whose bits do not match its size', () => {
        const catalog = createProceduralCatalog();
        catalog.entities.bamboo = { frames: [{ textureKey: 'bamboo.0', mask: { width: 4, height: 4, bits: new Uint8Array(3) } }], frameDuration: 1 };
        expect(contractError(() => validateCatalog(catalog)).subject).toBe('bamboo');
    });
    it('fails on too many frames or mixed sizes', () => {
        const frame = (w: number) => ({ textureKey: 'x', mask: createMask(w, 2, () => true) });
        const catalog = createProceduralCatalog();
        catalog.entities.barrel = { frames: Array.from({ length: 9 }, () => frame(2)), frameDuration: 1 };
        expect(contractError(() => validateCatalog(catalog)).subject).toBe('barrel');
        catalog.entities.barrel = { frames: [frame(2), frame(3)], frameDuration: 1 };
        expect(contractError(() => validateCatalog(catalog)).message).toContain('share one size');
    });
    it('reports out-of-range frames', () => {
        const set = requireEntityFrames(createProceduralCatalog(), 'rock');
        expect(frameAt(set, 0, 'rock').textureKey).toBe('rock.0');
        expect(contractError(() => frameAt(set, 3, 'rock')).message).toBe('[assets] rock: frame 3 out of range (0..0)');
    });
});
