import type { SoundKind } from '../types';
import { synthesize } from './synth';

export const SOUND_KINDS: readonly SoundKind[] = ['jump', 'doubleJump', 'tornado', 'powerUp', 'milestone', 'hit'];

// One buffer per kind is shared by every cue of that kind, so callers only read it.
export type SharedPcm = Readonly<Float32Array>;

// Synthesizes each sound once and hands out the cached buffer afterwards.
export class SoundBank {
    private readonly cache = new Map<SoundKind, Float32Array>();
    synthesized = 0;

    get(kind: SoundKind): SharedPcm {
        const cached = this.cache.get(kind);
        if (cached) return cached;
        const pcm = synthesize(kind);
        this.synthesized++;
        this.cache.set(kind, pcm);
        return pcm;
    }

    precompute(kinds: readonly SoundKind[] = SOUND_KINDS): void {
        for (const kind of kinds) this.get(kind);
    }

    has(kind: SoundKind): boolean { return this.cache.has(kind); }

    get size(): number { return this.cache.size; }
}
