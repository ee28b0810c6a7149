import { describe, it, expect } from 'vitest';
import { configFromQuery, resolveConfig } from '../config';
import { ConfigError } from '../errors';

function issuesOf(input: unknown): string[] {
    try {
        resolveConfig(input);
    } catch (err) {
        if (err instanceof ConfigError) return err.issues;
        throw err;
    }
    return [];
}

describe('resolveConfig', () => {
    it('fills every field from the balance constants', () => {
        const cfg = resolveConfig({});
        expect(cfg.seed).toBe(12345);
        expect(cfg.screen).toEqual({ width: 960, height: 540, groundY: 420 });
        expect(cfg.physics.jumpVelocity).toBe(-750);
        expect(cfg.spawner.weights.dragon).toBe(25);
        expect(cfg.showHitboxes).toBe(false);
    });
    it('keeps nested overrides next to defaults', () => {
        const cfg = resolveConfig({ physics: { gravity: 10 }, seed: 7 });
        expect(cfg.physics.gravity).toBe(10);
        expect(cfg.physics.jumpVelocity).toBe(-750);
        expect(cfg.seed).toBe(7);
    });
    it('reports field paths for bad values', () => {
        const issues = issuesOf({ physics: { gravity: -1 } });
        expect(issues).toHaveLength(1);
        expect(issues[0].startsWith('physics.gravity:')).toBe(true);
    });
    it('checks cross-field constraints', () => {
        expect(issuesOf({ spawner: { minInterval: 3, maxInterval: 1 } })).toEqual(['spawner.maxInterval: must be >= minInterval']);
        expect(issuesOf({ screen: { height: 300 } })).toEqual(['screen.groundY: must be inside the screen']);
    });
    it('rejects a non-object at the root', () => {
        const issues = issuesOf('fast please');
        expect(issues[0].startsWith('(root):')).toBe(true);
    });
});

describe('configFromQuery', () => {
    it('reads seed and flags', () => {
        expect(configFromQuery('?seed=42&hitboxes=1&muted=true')).toEqual({ seed: 42, showHitboxes: true, muted: true });
    });
    it('treats other flag values as off', () => {
        expect(configFromQuery('?hitboxes=0')).toEqual({ showHitboxes: false });
        expect(configFromQuery('')).toEqual({});
    });
    it('leaves validation to resolveConfig', () => {
        expect(() => resolveConfig(configFromQuery('?seed=abc'))).toThrow(ConfigError);
    });
});
