import { describe, it, expect } from 'vitest';
import { createProceduralCatalog } from '../assets/procedural';
import { resolveConfig, type ConfigOverrides } from '../config';
import { difficultyAt } from '../difficulty';
import { Player } from '../player';
import type { EffectSink, ParticleKind, SoundKind } from '../types';

class RecordingSink implements EffectSink {
    sounds: SoundKind[] = [];
    bursts: { kind: ParticleKind; count: number }[] = [];
    particles(kind: ParticleKind, _at: unknown, count: number) { this.bursts.push({ kind, count }); }
    sound(kind: SoundKind) { this.sounds.push(kind); }
}

function setup(overrides: ConfigOverrides = {}) {
    const config = resolveConfig(overrides);
    const fx = new RecordingSink();
    const player = new Player(config, createProceduralCatalog(), fx);
    return { config, fx, player, difficulty: difficultyAt(0, config.difficulty) };
}

// unit gravity and whole-second steps keep the arithmetic exact
const unitPhysics = (jumpBufferSeconds = 0): ConfigOverrides => ({
    physics: { gravity: 1, jumpVelocity: -10, doubleJumpVelocity: -5, jumpBufferSeconds },
});

describe('Player jump arc', () => {
    it('rises, peaks and lands back on the ground line', () => {
        const { player, difficulty } = setup(unitPhysics());
        player.handleInput('jumpPressed');
        expect(player.motion).toBe('jumping');
        player.update(1, difficulty);
        expect(player.y).toBe(-10);
        expect(player.vy).toBe(-9);
        let highest = 0;
        for (let tick = 2; tick <= 20; tick++) {
            player.update(1, difficulty);
            highest = Math.min(highest, player.y);
            expect(player.motion).toBe('jumping');
        }
        expect(highest).toBe(-55);
        player.update(1, difficulty);
        expect(player.motion).toBe('running');
        expect(player.y).toBe(0);
        expect(player.vy).toBe(0);
    });

    it('allows one double jump and buffers a third press', () => {
        const { player, fx, difficulty } = setup(unitPhysics(100));
        player.handleInput('jumpPressed');
        player.update(1, difficulty);
        player.handleInput('jumpPressed');
        expect(player.motion).toBe('doubleJumping');
        expect(player.vy).toBe(-5);
        player.handleInput('jumpPressed');
        expect(player.jumpBuffer).toBe(100);
        for (let i = 0; i < 12; i++) player.update(1, difficulty);
        expect(player.motion).toBe('doubleJumping');
        // lands on the 13th step and takes off again straight away
        player.update(1, difficulty);
        expect(player.motion).toBe('jumping');
        expect(player.vy).toBe(-10);
        expect(player.y).toBe(0);
        expect(fx.sounds).toEqual(['jump', 'doubleJump', 'jump']);
    });

    it('drops a buffered jump that has expired', () => {
        const { player, difficulty } = setup(unitPhysics(3));
        player.handleInput('jumpPressed');
        player.update(1, difficulty);
        player.handleInput('jumpPressed');
        player.handleInput('jumpPressed');
        for (let i = 0; i < 13; i++) player.update(1, difficulty);
        expect(player.motion).toBe('running');
        expect(player.jumpBuffer).toBe(0);
    });

    it('emits a dust burst on take-off and sparkles on the double jump', () => {
        const { player, fx } = setup();
        player.handleInput('jumpPressed');
        player.handleInput('jumpPressed');
        expect(fx.bursts).toEqual([{ kind: 'dust', count: 3 }, { kind: 'sparkle', count: 5 }]);
    });
});

describe('Player ducking', () => {
    it('switches to the shorter silhouette while held', () => {
        const { player } = setup();
        player.handleInput('duckPressed');
        expect(player.motion).toBe('ducking');
        expect(player.bounds()).toEqual({ x: 100, y: 370, width: 48, height: 50 });
        player.handleInput('duckReleased');
        expect(player.motion).toBe('running');
        expect(player.bounds().height).toBe(72);
    });

    it('can jump out of a duck and lands ducking while still held', () => {
        const { player, difficulty } = setup(unitPhysics());
        player.handleInput('duckPressed');
        player.handleInput('jumpPressed');
        expect(player.motion).toBe('jumping');
        for (let i = 0; i < 21; i++) player.update(1, difficulty);
        expect(player.motion).toBe('ducking');
    });

    it('ignores duck presses mid-air', () => {
        const { player } = setup();
        player.handleInput('jumpPressed');
        player.handleInput('duckPressed');
        expect(player.motion).toBe('jumping');
        expect(player.duckHeld).toBe(true);
    });
});

describe('Player power-ups', () => {
    it('a second BlueDash restarts the timer instead of adding to it', () => {
        const { player, difficulty } = setup();
        player.applyPowerUp('blueDash');
        expect(player.invincible).toBe(true);
        expect(player.speedBonus).toBe(1.25);
        player.update(2, difficulty);
        expect(player.powerUp?.remaining).toBe(3);
        player.applyPowerUp('blueDash');
        expect(player.powerUp?.remaining).toBe(5);
    });

    it('a tornado leaves an active dash alone', () => {
        const { player } = setup();
        player.applyPowerUp('blueDash');
        player.applyPowerUp('yellowTornado');
        expect(player.tornadoArmed).toBe(true);
        expect(player.powerUp).toEqual({ kind: 'blueDash', remaining: 5 });
    });

    it('holds a single tornado charge however many are collected', () => {
        const { player } = setup();
        expect(player.fireTornado()).toBe(false);
        player.applyPowerUp('yellowTornado');
        player.applyPowerUp('yellowTornado');
        expect(player.fireTornado()).toBe(true);
        expect(player.fireTornado()).toBe(false);
        expect(player.tornadoArmed).toBe(false);
    });

    it('shrugs off hits while dashing and falls once it wears off', () => {
        const { player, fx, difficulty } = setup();
        player.applyPowerUp('blueDash');
        expect(player.takeHit()).toBe(false);
        expect(player.motion).toBe('running');
        player.update(5, difficulty);
        expect(player.powerUp).toBeNull();
        expect(player.speedBonus).toBe(1);
        expect(player.takeHit()).toBe(true);
        expect(player.defeated).toBe(true);
        expect(fx.sounds).toEqual(['powerUp', 'hit']);
        expect(player.takeHit()).toBe(false);
    });

    it('freezes once defeated', () => {
        const { player, difficulty } = setup();
        player.takeHit();
        player.handleInput('jumpPressed');
        player.update(1, difficulty);
        expect(player.motion).toBe('defeated');
        expect(player.y).toBe(0);
    });
});

describe('Player running effects', () => {
    it('kicks up dust at a steady interval', () => {
        const { player, fx, difficulty } = setup();
        player.update(0.5, difficulty);
        expect(fx.bursts).toEqual([{ kind: 'dust', count: 1 }, { kind: 'dust', count: 1 }]);
    });

    it('cycles the run frames', () => {
        const { player, difficulty } = setup();
        player.update(0.09, difficulty);
        expect(player.frameIndex).toBe(1);
        expect(player.currentFrame().textureKey).toBe('run.1');
    });
});
