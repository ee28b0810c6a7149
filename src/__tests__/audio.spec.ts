import { describe, it, expect, expectTypeOf } from 'vitest';
import { SOUND_KINDS, SoundBank, type SharedPcm } from '../audio/soundBank';
import { sampleCount, synthesize, VOLUME } from '../audio/synth';

describe('synthesize', () => {
    it('renders a jump as a fading square wave', () => {
        const pcm = synthesize('jump');
        expect(pcm.length).toBe(2205);
        expect(pcm[0]).toBe(0.5);
        expect(Math.abs(pcm[pcm.length - 1])).toBe(0);
    });
    it('starts sine voices at zero', () => {
        expect(synthesize('doubleJump')[0]).toBe(0);
    });
    it('gives the same samples every time', () => {
        for (const kind of SOUND_KINDS) expect(synthesize(kind)).toEqual(synthesize(kind));
    });
    it('stays within the volume ceiling', () => {
        for (const kind of SOUND_KINDS) {
            const peak = synthesize(kind).reduce((m, v) => Math.max(m, Math.abs(v)), 0);
            expect(peak).toBeLessThanOrEqual(VOLUME);
            expect(peak).toBeGreaterThan(0);
        }
    });
    it('sizes buffers from the duration', () => {
        expect(synthesize('hit').length).toBe(sampleCount(0.3));
        expect(sampleCount(0.3)).toBe(6615);
    });
});

describe('SoundBank', () => {
    it('synthesizes each kind once', () => {
        const bank = new SoundBank();
        const first = bank.get('hit');
        expect(bank.get('hit')).toBe(first);
        expectTypeOf(first).toEqualTypeOf<SharedPcm>();
        expectTypeOf(first).not.toEqualTypeOf<Float32Array>();
        expect(bank.synthesized).toBe(1);
        expect(bank.has('jump')).toBe(false);
    });
    it('precomputes every kind', () => {
        const bank = new SoundBank();
        bank.precompute();
        expect(bank.size).toBe(6);
        expect(bank.synthesized).toBe(6);
        bank.get('milestone');
        expect(bank.synthesized).toBe(6);
    });
});
