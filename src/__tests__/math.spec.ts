import { describe, it, expect } from 'vitest';
import { clamp, lerpColor, rectsOverlap, smoothstep, wrap } from '../math';

describe('math utils', () => {
    it('clamp clamps low/high', () => {
        expect(clamp(5, 10, 20)).toBe(10);
        expect(clamp(25, 10, 20)).toBe(20);
        expect(clamp(15, 10, 20)).toBe(15);
    });
    it('wrap is a positive modulo', () => {
        expect(wrap(-0.25, 1)).toBe(0.75);
        expect(wrap(1.5, 1)).toBe(0.5);
        expect(wrap(0, 1)).toBe(0);
    });
    it('smoothstep is clamped and symmetric', () => {
        expect(smoothstep(-1)).toBe(0);
        expect(smoothstep(0.5)).toBe(0.5);
        expect(smoothstep(2)).toBe(1);
    });
    it('rectsOverlap treats touching edges as apart', () => {
        const a = { x: 0, y: 0, width: 10, height: 10 };
        expect(rectsOverlap(a, { x: 10, y: 0, width: 5, height: 5 })).toBe(false);
        expect(rectsOverlap(a, { x: 9, y: 9, width: 5, height: 5 })).toBe(true);
    });
    it('lerpColor mixes per channel', () => {
        expect(lerpColor(0x000000, 0xffffff, 0.5)).toBe(0x808080);
        expect(lerpColor(0x19193c, 0x87ceeb, 0)).toBe(0x19193c);
        expect(lerpColor(0x19193c, 0x87ceeb, 1)).toBe(0x87ceeb);
    });
});
