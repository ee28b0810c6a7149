// Procedural sound effects: short mono PCM buffers built from a few oscillator and
// noise recipes, so the game ships no binary audio. Same kind in, same samples out.
import { randomRng } from '../rng';
import type { SoundKind } from '../types';

export const SAMPLE_RATE = 22050;
export const VOLUME = 0.5;

export type Voice =
    | { type: 'tone'; shape: 'sine' | 'square'; freq: number; slide: number; duration: number }
    | { type: 'noise'; duration: number; pitchDrop: boolean; seed: number };

export const VOICES: Record<SoundKind, Voice> = {
    jump: { type: 'tone', shape: 'square', freq: 440, slide: 100, duration: 0.1 },
    doubleJump: { type: 'tone', shape: 'sine', freq: 660, slide: 200, duration: 0.1 },
    tornado: { type: 'noise', duration: 0.15, pitchDrop: false, seed: 0x51a5 },
    powerUp: { type: 'tone', shape: 'sine', freq: 554, slide: 120, duration: 0.12 },
    milestone: { type: 'tone', shape: 'sine', freq: 880, slide: 0, duration: 0.05 },
    hit: { type: 'noise', duration: 0.3, pitchDrop: true, seed: 0x417 },
};

export function sampleCount(duration: number): number {
    return Math.round(SAMPLE_RATE * duration);
}

// Linear fade from full volume on the first sample to silence on the last.
function envelope(i: number, n: number): number {
    return n <= 1 ? 1 : 1 - i / (n - 1);
}

function renderTone(v: Extract<Voice, { type: 'tone' }>): Float32Array {
    const n = sampleCount(v.duration);
    const out = new Float32Array(n);
    let phase = 0;
    for (let i = 0; i < n; i++) {
        const wave = v.shape === 'sine' ? Math.sin(2 * Math.PI * phase) : (phase < 0.5 ? 1 : -1);
        out[i] = wave * envelope(i, n) * VOLUME;
        // frequency glides linearly across the whole sound
        const freq = v.freq + v.slide * (n <= 1 ? 0 : i / (n - 1));
        phase = (phase + freq / SAMPLE_RATE) % 1;
    }
    return out;
}

function renderNoise(v: Extract<Voice, { type: 'noise' }>): Float32Array {
    const n = sampleCount(v.duration);
    const out = new Float32Array(n);
    const rng = randomRng(v.seed);
    let held = 0;
    let hold = 0;
    for (let i = 0; i < n; i++) {
        if (hold <= 0) {
            held = rng() * 2 - 1;
            // pitch drop: each random value is held longer as the sound decays
            hold = v.pitchDrop ? 1 + Math.floor((i / n) * 12) : 1;
        }
        hold--;
        out[i] = held * envelope(i, n) * VOLUME;
    }
    return out;
}

export function synthesize(kind: SoundKind): Float32Array {
    const voice = VOICES[kind];
    return voice.type === 'tone' ? renderTone(voice) : renderNoise(voice);
}
