// Per-pixel collision masks: one byte per pixel, 1 = solid.
export interface CollisionMask {
    readonly width: number;
    readonly height: number;
    readonly bits: Uint8Array;
}

export function createMask(width: number, height: number, solid: (x: number, y: number) => boolean): CollisionMask {
    const w = Math.max(0, Math.floor(width));
    const h = Math.max(0, Math.floor(height));
    const bits = new Uint8Array(w * h);
    for (let y = 0; y < h; y++) {
        for (let x = 0; x < w; x++) {
            if (solid(x, y)) bits[y * w + x] = 1;
        }
    }
    return { width: w, height: h, bits };
}

// Build a mask from RGBA pixel data (as returned by canvas/pixi extraction).
// A pixel is solid when its alpha is at least `threshold`.
export function maskFromAlpha(rgba: ArrayLike<number>, width: number, height: number, threshold = 1): CollisionMask {
    if (rgba.length < width * height * 4) {
        throw new Error(`maskFromAlpha: expected ${width * height * 4} bytes, got ${rgba.length}`);
    }
    return createMask(width, height, (x, y) => rgba[(y * width + x) * 4 + 3] >= threshold);
}

export function maskCount(mask: CollisionMask): number {
    let n = 0;
    for (let i = 0; i < mask.bits.length; i++) n += mask.bits[i];
    return n;
}

export function maskAt(mask: CollisionMask, x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= mask.width || y >= mask.height) return false;
    return mask.bits[y * mask.width + x] === 1;
}

// True when `b`, placed at (dx, dy) relative to `a`'s top-left, shares a solid pixel with `a`.
export function maskOverlap(a: CollisionMask, b: CollisionMask, dx: number, dy: number): boolean {
    const ox = Math.round(dx);
    const oy = Math.round(dy);
    const x0 = Math.max(0, ox);
    const y0 = Math.max(0, oy);
    const x1 = Math.min(a.width, ox + b.width);
    const y1 = Math.min(a.height, oy + b.height);
    for (let y = y0; y < y1; y++) {
        const rowA = y * a.width;
        const rowB = (y - oy) * b.width - ox;
        for (let x = x0; x < x1; x++) {
            if (a.bits[rowA + x] && b.bits[rowB + x]) return true;
        }
    }
    return false;
}
