// Placeholder silhouettes used when no artwork is supplied, built straight into masks.
// The renderer draws the same shapes with vector graphics.
import { FRAME_DURATIONS, type AnimationKey, type FrameSet } from '../animation';
import { createMask, type CollisionMask } from '../mask';
import type { Vector2 } from '../types';
import type { AssetCatalog } from './catalog';

type Solid = (x: number, y: number) => boolean;

const inCircle = (cx: number, cy: number, r: number): Solid => (x, y) => {
    const dx = x + 0.5 - cx; const dy = y + 0.5 - cy;
    return dx * dx + dy * dy <= r * r;
};
const inRect = (x0: number, y0: number, w: number, h: number): Solid => (x, y) => x >= x0 && x < x0 + w && y >= y0 && y < y0 + h;
const union = (...parts: Solid[]): Solid => (x, y) => parts.some(p => p(x, y));

// Even-odd rule on pixel centers.
export function inPolygon(points: readonly Vector2[]): Solid {
    return (px, py) => {
        const x = px + 0.5; const y = py + 0.5;
        let inside = false;
        for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
            const a = points[i]; const b = points[j];
            if ((a.y > y) !== (b.y > y) && x < ((b.x - a.x) * (y - a.y)) / (b.y - a.y) + a.x) inside = !inside;
        }
        return inside;
    };
}

// Samurai: head, torso, and two legs whose spread alternates between run frames.
function samurai(width: number, height: number, stride: number): Solid {
    const head = Math.round(height * 0.14);
    const torsoTop = head * 2;
    const legTop = Math.round(height * 0.68);
    return union(
        inCircle(width / 2, head, head),
        inRect(Math.round(width * 0.25), torsoTop, Math.round(width * 0.5), legTop - torsoTop),
        inRect(Math.round(width * 0.25) - stride, legTop, 8, height - legTop),
        inRect(Math.round(width * 0.75) - 8 + stride, legTop, 8, height - legTop),
    );
}

export const DRAGON_WINGS_UP: readonly Vector2[] = [{ x: 7, y: 39 }, { x: 44, y: 11 }, { x: 73, y: 28 }, { x: 44, y: 33 }];
export const DRAGON_WINGS_DOWN: readonly Vector2[] = [{ x: 7, y: 28 }, { x: 44, y: 6 }, { x: 73, y: 22 }, { x: 44, y: 39 }];

interface ShapeDef { width: number; height: number; frames: Solid[]; }

export const PROCEDURAL_SHAPES: Record<AnimationKey, ShapeDef> = {
    run: { width: 48, height: 72, frames: [samurai(48, 72, 4), samurai(48, 72, -2)] },
    jump: { width: 48, height: 72, frames: [samurai(48, 72, 6)] },
    duck: { width: 48, height: 50, frames: [union(inCircle(30, 10, 9), inRect(6, 18, 40, 32))] },
    rock: { width: 36, height: 36, frames: [inCircle(18, 18, 18)] },
    barrel: { width: 56, height: 56, frames: [inRect(2, 2, 52, 54)] },
    bamboo: { width: 26, height: 110, frames: [inRect(8, 0, 10, 110)] },
    boulder: { width: 90, height: 90, frames: [inCircle(45, 45, 44)] },
    dragonRed: { width: 80, height: 50, frames: [inPolygon(DRAGON_WINGS_UP), inPolygon(DRAGON_WINGS_DOWN)] },
    dragonGreen: { width: 80, height: 50, frames: [inPolygon(DRAGON_WINGS_UP), inPolygon(DRAGON_WINGS_DOWN)] },
    dragonBlack: { width: 80, height: 50, frames: [inPolygon(DRAGON_WINGS_UP), inPolygon(DRAGON_WINGS_DOWN)] },
    blueDash: { width: 40, height: 40, frames: [inRect(0, 0, 40, 40)] },
    yellowTornado: { width: 40, height: 40, frames: [inRect(0, 0, 40, 40)] },
};

function buildSet(key: AnimationKey): FrameSet {
    const def = PROCEDURAL_SHAPES[key];
    const frames = def.frames.map((solid, i) => {
        const mask: CollisionMask = createMask(def.width, def.height, solid);
        return { textureKey: `${key}.${i}`, mask };
    });
    return { frames, frameDuration: FRAME_DURATIONS[key] };
}

export function createProceduralCatalog(): AssetCatalog {
    return {
        player: { run: buildSet('run'), jump: buildSet('jump'), duck: buildSet('duck') },
        entities: {
            rock: buildSet('rock'),
            barrel: buildSet('barrel'),
            bamboo: buildSet('bamboo'),
            boulder: buildSet('boulder'),
            dragonRed: buildSet('dragonRed'),
            dragonGreen: buildSet('dragonGreen'),
            dragonBlack: buildSet('dragonBlack'),
            blueDash: buildSet('blueDash'),
            yellowTornado: buildSet('yellowTornado'),
        },
    };
}
