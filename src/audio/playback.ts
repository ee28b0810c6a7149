// Web Audio output for the synthesized cues. The context is created lazily and
// resumed on the first user gesture, as browsers require.
import type { AudioCue } from '../simulation';
import type { SoundKind } from '../types';
import { SAMPLE_RATE } from './synth';

// Minimum spacing per kind, so a burst of identical cues plays once.
const THROTTLE_MS: Partial<Record<SoundKind, number>> = { milestone: 60, powerUp: 30 };

export class AudioPlayback {
    private ctx: AudioContext | null = null;
    private readonly buffers = new Map<SoundKind, AudioBuffer>();
    private lastPlay: Partial<Record<SoundKind, number>> = {};
    muted: boolean;

    constructor(muted = false) {
        this.muted = muted;
    }

    // Unlock audio on first user input
    attach(target: Window) {
        const unlock = () => { this.ensureCtx(); };
        ['pointerdown', 'keydown'].forEach(ev => target.addEventListener(ev, unlock, { once: true }));
    }

    private ensureCtx(): AudioContext {
        if (!this.ctx) this.ctx = new AudioContext();
        if (this.ctx.state === 'suspended') {
            this.ctx.resume().catch(err => console.warn('[audio] resume failed', err));
        }
        return this.ctx;
    }

    private throttle(kind: SoundKind): boolean {
        const gap = THROTTLE_MS[kind];
        if (gap === undefined) return true;
        const now = performance.now();
        if ((this.lastPlay[kind] ?? -Infinity) + gap > now) return false;
        this.lastPlay[kind] = now;
        return true;
    }

    private bufferFor(ctx: AudioContext, cue: AudioCue): AudioBuffer {
        let buffer = this.buffers.get(cue.kind);
        if (!buffer) {
            buffer = ctx.createBuffer(1, cue.samples.length, SAMPLE_RATE);
            buffer.getChannelData(0).set(cue.samples);
            this.buffers.set(cue.kind, buffer);
        }
        return buffer;
    }

    play(cue: AudioCue) {
        // nothing plays before the first gesture unlocks the context
        if (this.muted || !this.ctx) return;
        if (!this.throttle(cue.kind)) return;
        const src = this.ctx.createBufferSource();
        src.buffer = this.bufferFor(this.ctx, cue);
        src.connect(this.ctx.destination);
        src.start();
    }

    playCues(cues: readonly AudioCue[]) {
        for (const cue of cues) this.play(cue);
    }
}
