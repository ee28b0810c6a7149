import { z } from 'zod';
import type { CollisionMask } from './mask';
import type { EntityKind, PlayerPose } from './types';

export const MAX_FRAMES_PER_SET = 8;

export interface FrameDescriptor {
    // key the renderer resolves to a texture; the core never touches pixels
    textureKey: string;
    mask: CollisionMask;
}

export interface FrameSet {
    frames: readonly FrameDescriptor[];
    frameDuration: number; // seconds per frame
}

export type AnimationKey = PlayerPose | EntityKind;

// Seconds each frame stays on screen, per animation.
export const FRAME_DURATIONS: Record<AnimationKey, number> = {
    run: 5 / 60,
    jump: 1,
    duck: 1,
    rock: 1,
    barrel: 1,
    bamboo: 1,
    boulder: 1,
    dragonRed: 1 / 9,
    dragonGreen: 1 / 9,
    dragonBlack: 1 / 9,
    blueDash: 1,
    yellowTornado: 1,
};

const MaskSchema = z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    bits: z.instanceof(Uint8Array),
}).refine(m => m.bits.length === m.width * m.height, { message: 'mask bits do not match width x height' });

export const FrameSetSchema = z.object({
    frames: z.array(z.object({ textureKey: z.string().min(1), mask: MaskSchema })).min(1).max(MAX_FRAMES_PER_SET),
    frameDuration: z.number().positive().finite(),
}).refine(set => set.frames.every(f => f.mask.width === set.frames[0].mask.width && f.mask.height === set.frames[0].mask.height), {
    message: 'all frames in a set must share one size',
});

// Advance a looping frame cursor; several frames may elapse in one long step.
export function advanceFrame(index: number, timer: number, dt: number, frameCount: number, frameDuration: number): { index: number; timer: number } {
    if (frameCount <= 1 || frameDuration <= 0) return { index: 0, timer: 0 };
    let t = timer + Math.max(0, dt);
    let i = index;
    while (t >= frameDuration) {
        t -= frameDuration;
        i = (i + 1) % frameCount;
    }
    return { index: i, timer: t };
}
