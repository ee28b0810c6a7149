import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config';
import { EventBus } from '../events';
import { ScoreKeeper } from '../score';

const cfg = resolveConfig().score;

describe('ScoreKeeper', () => {
    it('accrues survival points and floors the display', () => {
        const s = new ScoreKeeper(cfg);
        s.addSurvival(0.5);
        expect(s.score).toBe(6);
        s.addSurvival(0.05);
        expect(s.displayScore).toBe(6);
    });
    it('counts every milestone crossed', () => {
        const s = new ScoreKeeper(cfg);
        expect(s.addBonus(50)).toBe(0);
        expect(s.addBonus(50)).toBe(1);
        expect(s.addBonus(250)).toBe(2);
        expect(s.addSurvival(-1)).toBe(0);
        expect(s.score).toBe(350);
    });
    it('never goes down', () => {
        const s = new ScoreKeeper(cfg);
        s.addBonus(20);
        s.addBonus(-50);
        expect(s.score).toBe(20);
    });
    it('folds a better run into the high score', () => {
        const s = new ScoreKeeper(cfg, 30);
        s.addBonus(20);
        expect(s.finish()).toBe(false);
        expect(s.highScore).toBe(30);
        s.addBonus(20);
        expect(s.isNewHighScore).toBe(true);
        expect(s.finish()).toBe(true);
        expect(s.highScore).toBe(40);
    });
});

describe('EventBus', () => {
    it('delivers typed payloads until unsubscribed', () => {
        const bus = new EventBus();
        const got: number[] = [];
        const fn = (e: { bonus: number }) => got.push(e.bonus);
        bus.on('tornadoKill', fn);
        bus.emit('tornadoKill', { bonus: 50 });
        bus.off('tornadoKill', fn);
        bus.emit('tornadoKill', { bonus: 100 });
        expect(got).toEqual([50]);
    });
});
