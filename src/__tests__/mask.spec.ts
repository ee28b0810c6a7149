import { describe, it, expect } from 'vitest';
import { createMask, maskAt, maskCount, maskFromAlpha, maskOverlap } from '../mask';

const solid = (w: number, h: number) => createMask(w, h, () => true);
const single = (w: number, h: number, px: number, py: number) => createMask(w, h, (x, y) => x === px && y === py);

describe('collision masks', () => {
    it('builds masks from a predicate', () => {
        const m = createMask(3, 2, (x) => x !== 1);
        expect(maskCount(m)).toBe(4);
        expect(maskAt(m, 1, 0)).toBe(false);
        expect(maskAt(m, 2, 1)).toBe(true);
        expect(maskAt(m, 5, 5)).toBe(false);
    });
    it('reads alpha from RGBA data', () => {
        const rgba = [0, 0, 0, 255, 0, 0, 0, 0, 0, 0, 0, 127, 0, 0, 0, 128];
        const m = maskFromAlpha(rgba, 2, 2, 128);
        expect(Array.from(m.bits)).toEqual([1, 0, 0, 1]);
    });
    it('rejects short pixel data', () => {
        expect(() => maskFromAlpha([0, 0, 0, 255], 2, 2)).toThrow('expected 16 bytes');
    });
    it('finds overlap at positive and negative offsets', () => {
        const a = solid(4, 4);
        const b = solid(2, 2);
        expect(maskOverlap(a, b, 3, 3)).toBe(true);
        expect(maskOverlap(a, b, 4, 0)).toBe(false);
        expect(maskOverlap(a, b, -1, -1)).toBe(true);
        expect(maskOverlap(a, b, -2, 0)).toBe(false);
    });
    it('compares individual pixels, not boxes', () => {
        const a = single(2, 2, 0, 0);
        const b = single(2, 2, 1, 1);
        expect(maskOverlap(a, b, 0, 0)).toBe(false);
        expect(maskOverlap(a, b, -1, -1)).toBe(true);
    });
});
