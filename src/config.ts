import { z } from 'zod';
import {
    SCREEN, PLAYER_PHYSICS, POWER_UP_VALUES, SPEED_START, SPEED_MAX, SPEED_GAIN, SPAWN_INTERVAL_DECAY, SPAWN_INTERVAL_FLOOR,
    DRAGON_FREQUENCY_GAIN, DRAGON_FREQUENCY_CEILING, SPAWN_VALUES, SPAWN_WEIGHTS, DRAGON_COLOR_WEIGHTS, SCORE_VALUES,
    PARTICLE_VALUES, ENVIRONMENT_VALUES, MAX_FRAME_DELTA,
} from './constants/balance';
import { ConfigError } from './errors';

const positive = (v: number) => z.number().positive().finite().default(v);
const nonNegative = (v: number) => z.number().nonnegative().finite().default(v);
const count = (v: number) => z.number().int().nonnegative().default(v);

// Every field defaults to the balance constants, so `{}` parses to the stock game.
export const GameConfigSchema = z.object({
    seed: z.number().int().nonnegative().default(12345),
    screen: z.object({
        width: positive(SCREEN.WIDTH),
        height: positive(SCREEN.HEIGHT),
        groundY: positive(SCREEN.GROUND_Y),
    }).default({}),
    physics: z.object({
        laneX: nonNegative(PLAYER_PHYSICS.LANE_X),
        gravity: positive(PLAYER_PHYSICS.GRAVITY),
        jumpVelocity: z.number().negative().default(PLAYER_PHYSICS.JUMP_VELOCITY),
        doubleJumpVelocity: z.number().negative().default(PLAYER_PHYSICS.DOUBLE_JUMP_VELOCITY),
        jumpBufferSeconds: nonNegative(PLAYER_PHYSICS.JUMP_BUFFER_SECONDS),
        dustInterval: positive(PLAYER_PHYSICS.DUST_INTERVAL),
        dashTrailInterval: positive(PLAYER_PHYSICS.DASH_TRAIL_INTERVAL),
    }).default({}),
    powerUps: z.object({
        dashDuration: positive(POWER_UP_VALUES.DASH_DURATION),
        dashSpeedBonus: z.number().min(1).default(POWER_UP_VALUES.DASH_SPEED_BONUS),
        pickupRatePerSecond: nonNegative(POWER_UP_VALUES.PICKUP_RATE_PER_SECOND),
        pickupAltitude: nonNegative(POWER_UP_VALUES.PICKUP_ALTITUDE),
        bobAmplitude: nonNegative(POWER_UP_VALUES.PICKUP_BOB_AMPLITUDE),
        bobSpeed: nonNegative(POWER_UP_VALUES.PICKUP_BOB_SPEED),
    }).default({}),
    difficulty: z.object({
        speedStart: positive(SPEED_START),
        speedMax: positive(SPEED_MAX),
        speedGain: nonNegative(SPEED_GAIN),
        spawnIntervalDecay: nonNegative(SPAWN_INTERVAL_DECAY),
        spawnIntervalFloor: z.number().gt(0).max(1).default(SPAWN_INTERVAL_FLOOR),
        dragonFrequencyGain: nonNegative(DRAGON_FREQUENCY_GAIN),
        dragonFrequencyCeiling: z.number().min(1).default(DRAGON_FREQUENCY_CEILING),
    }).default({}),
    spawner: z.object({
        minInterval: positive(SPAWN_VALUES.MIN_INTERVAL),
        maxInterval: positive(SPAWN_VALUES.MAX_INTERVAL),
        firstSpawnDelay: nonNegative(SPAWN_VALUES.FIRST_SPAWN_DELAY),
        earlyDragon: z.boolean().default(SPAWN_VALUES.EARLY_DRAGON),
        minSpawnSpacing: nonNegative(SPAWN_VALUES.MIN_SPAWN_SPACING),
        minGroundGap: nonNegative(SPAWN_VALUES.MIN_GROUND_GAP),
        reactionWindow: nonNegative(SPAWN_VALUES.REACTION_WINDOW),
        bambooCooldown: nonNegative(SPAWN_VALUES.BAMBOO_COOLDOWN),
        bambooMinDistance: nonNegative(SPAWN_VALUES.BAMBOO_MIN_DISTANCE),
        cullMargin: nonNegative(SPAWN_VALUES.CULL_MARGIN),
        weights: z.object({
            rock: nonNegative(SPAWN_WEIGHTS.rock),
            barrel: nonNegative(SPAWN_WEIGHTS.barrel),
            bamboo: nonNegative(SPAWN_WEIGHTS.bamboo),
            dragon: nonNegative(SPAWN_WEIGHTS.dragon),
            boulder: nonNegative(SPAWN_WEIGHTS.boulder),
        }).default({}),
        dragonColorWeights: z.object({
            dragonRed: nonNegative(DRAGON_COLOR_WEIGHTS.dragonRed),
            dragonGreen: nonNegative(DRAGON_COLOR_WEIGHTS.dragonGreen),
            dragonBlack: nonNegative(DRAGON_COLOR_WEIGHTS.dragonBlack),
        }).default({}),
    }).default({}),
    particles: z.object({
        capacity: z.number().int().positive().default(PARTICLE_VALUES.CAPACITY),
        debrisGravity: nonNegative(PARTICLE_VALUES.DEBRIS_GRAVITY),
        dustBurst: count(PARTICLE_VALUES.DUST_BURST),
        sparkleBurst: count(PARTICLE_VALUES.SPARKLE_BURST),
        pickupBurst: count(PARTICLE_VALUES.PICKUP_BURST),
        debrisBurst: count(PARTICLE_VALUES.DEBRIS_BURST),
    }).default({}),
    environment: z.object({
        cycleSeconds: positive(ENVIRONMENT_VALUES.CYCLE_SECONDS),
        startPhase: z.number().min(0).lt(1).default(ENVIRONMENT_VALUES.START_PHASE),
        toggleBlendSeconds: positive(ENVIRONMENT_VALUES.TOGGLE_BLEND_SECONDS),
        petalsPerSecond: nonNegative(ENVIRONMENT_VALUES.PETALS_PER_SECOND),
        sparklesPerSecond: nonNegative(ENVIRONMENT_VALUES.SPARKLES_PER_SECOND),
    }).default({}),
    score: z.object({
        perSecond: nonNegative(SCORE_VALUES.PER_SECOND),
        milestone: positive(SCORE_VALUES.MILESTONE),
        tornadoBonus: nonNegative(SCORE_VALUES.TORNADO_BONUS),
    }).default({}),
    maxFrameDelta: positive(MAX_FRAME_DELTA),
    showHitboxes: z.boolean().default(false),
    muted: z.boolean().default(false),
}).superRefine((cfg, ctx) => {
    if (cfg.spawner.maxInterval < cfg.spawner.minInterval) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['spawner', 'maxInterval'], message: 'must be >= minInterval' });
    }
    if (cfg.difficulty.speedMax < cfg.difficulty.speedStart) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['difficulty', 'speedMax'], message: 'must be >= speedStart' });
    }
    if (cfg.screen.groundY > cfg.screen.height) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['screen', 'groundY'], message: 'must be inside the screen' });
    }
});

export type GameConfig = z.output<typeof GameConfigSchema>;
export type ConfigOverrides = z.input<typeof GameConfigSchema>;

export function resolveConfig(overrides: unknown = {}): GameConfig {
    const parsed = GameConfigSchema.safeParse(overrides);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
    }
    return parsed.data;
}

// URL query overrides for the browser build: ?seed=42&hitboxes=1&muted=1
export function configFromQuery(search: string): ConfigOverrides {
    const params = new URLSearchParams(search);
    const out: ConfigOverrides = {};
    const seed = params.get('seed');
    if (seed !== null) out.seed = Number(seed);
    const flag = (v: string | null) => v === '1' || v === 'true';
    if (params.has('hitboxes')) out.showHitboxes = flag(params.get('hitboxes'));
    if (params.has('muted')) out.muted = flag(params.get('muted'));
    return out;
}
