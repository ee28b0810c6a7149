// Pure difficulty curve helpers: every value is a clamped monotonic function of elapsed time.
import type { DifficultyState } from './types';
import type { GameConfig } from './config';
import { clamp } from './math';

type DifficultyConfig = GameConfig['difficulty'];

export function scrollSpeedAt(time: number, cfg: DifficultyConfig): number {
    const t = Math.max(0, time);
    return clamp(cfg.speedStart + t * cfg.speedGain, cfg.speedStart, cfg.speedMax);
}

export function spawnIntervalMultiplierAt(time: number, cfg: DifficultyConfig): number {
    const t = Math.max(0, time);
    return clamp(1 - t * cfg.spawnIntervalDecay, cfg.spawnIntervalFloor, 1);
}

export function dragonFrequencyAt(time: number, cfg: DifficultyConfig): number {
    const t = Math.max(0, time);
    return clamp(1 + t * cfg.dragonFrequencyGain, 1, cfg.dragonFrequencyCeiling);
}

export function difficultyAt(time: number, cfg: DifficultyConfig): DifficultyState {
    const scrollSpeed = scrollSpeedAt(time, cfg);
    return {
        elapsed: Math.max(0, time),
        scrollSpeed,
        speedMultiplier: scrollSpeed / cfg.speedStart,
        spawnIntervalMultiplier: spawnIntervalMultiplierAt(time, cfg),
        dragonFrequencyMultiplier: dragonFrequencyAt(time, cfg),
    };
}

// Smallest edge-to-edge distance between two ground obstacles at a given scroll speed:
// `reactionWindow` seconds of travel, never less than `minGroundGap`.
export function minReactionGap(scrollSpeed: number, cfg: GameConfig['spawner']): number {
    return Math.max(cfg.minGroundGap, scrollSpeed * cfg.reactionWindow);
}

export interface GapLead {
    trailingEdge: number;
    speedFactor: number;
}

// Gap to leave behind `lead` so the reaction window still holds when the lead's
// trailing edge reaches the player's lane. Sized for the scroll speed at that
// moment, plus whatever a faster trailer closes on the way there.
export function fairGroundGap(
    lead: GapLead, trailFactor: number, difficulty: DifficultyState, speedBonus: number, laneX: number, cfg: GameConfig,
): number {
    const ahead = Math.max(0, lead.trailingEdge - laneX);
    // speed only grows along the curve, so the lead arrives no later than this
    const arrival = ahead / (lead.speedFactor * difficulty.scrollSpeed);
    const speedThen = scrollSpeedAt(difficulty.elapsed + arrival, cfg.difficulty) * speedBonus;
    const closing = Math.max(0, trailFactor - lead.speedFactor) / lead.speedFactor * ahead;
    return minReactionGap(speedThen, cfg.spawner) + closing;
}
