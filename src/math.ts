import type { Rect } from './types';

export function clamp(v: number, min: number, max: number): number {
    return v < min ? min : (v > max ? max : v);
}

export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}

// Hermite ease used for blends that must start and end without a visible pop.
export function smoothstep(t: number): number {
    const x = clamp(t, 0, 1);
    return x * x * (3 - 2 * x);
}

// Positive modulo, so wrap(-0.25, 1) === 0.75.
export function wrap(v: number, span: number): number {
    return ((v % span) + span) % span;
}

export function rectsOverlap(a: Rect, b: Rect): boolean {
    return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
}

// Per-channel interpolation of two 0xRRGGBB colors.
export function lerpColor(from: number, to: number, t: number): number {
    const k = clamp(t, 0, 1);
    const r = Math.round(lerp((from >> 16) & 0xff, (to >> 16) & 0xff, k));
    const g = Math.round(lerp((from >> 8) & 0xff, (to >> 8) & 0xff, k));
    const b = Math.round(lerp(from & 0xff, to & 0xff, k));
    return (r << 16) | (g << 8) | b;
}
