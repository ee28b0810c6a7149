// The simulation owns every piece of run state in one GameContext; nothing lives at
// module level. The shell feeds it input and frame deltas and draws its snapshots.
import type { AssetCatalog } from './assets/catalog';
import { validateCatalog } from './assets/catalog';
import { createProceduralCatalog } from './assets/procedural';
import { SoundBank, type SharedPcm } from './audio/soundBank';
import { CollisionEngine, type Resolution } from './collision';
import { resolveConfig, type ConfigOverrides, type GameConfig } from './config';
import { difficultyAt } from './difficulty';
import { entityFrame, entityFrameIndex } from './entities';
import { Environment, type CelestialPosition, type ParallaxLayer } from './environment';
import { EventBus } from './events';
import { MemoryHighScoreStore, type HighScoreStore } from './highScore';
import { clamp } from './math';
import { ParticleSystem } from './particles';
import { Player } from './player';
import { randomRng, type Rng } from './rng';
import { ScoreKeeper } from './score';
import { Spawner } from './spawner';
import type {
    ActivePowerUp, DifficultyState, EffectSink, Entity, EntityCategory, EntityKind, InputEvent, MotionState,
    Particle, ParticleKind, PlayerPose, RunStatus, SoundKind, Vector2,
} from './types';

// Routes side effects raised during a step: particles straight into the pool,
// sounds into a queue flushed once per frame.
export class EffectQueue implements EffectSink {
    private pending: SoundKind[] = [];
    constructor(private readonly pool: ParticleSystem) {}
    particles(kind: ParticleKind, at: Vector2, count: number): void { this.pool.emit(kind, at, count); }
    sound(kind: SoundKind): void { this.pending.push(kind); }
    drain(): SoundKind[] {
        const out = this.pending;
        this.pending = [];
        return out;
    }
}

export interface AudioCue {
    kind: SoundKind;
    samples: SharedPcm;
}

// Everything a restart throws away and rebuilds.
export interface RunState {
    rng: Rng;
    player: Player;
    entities: Entity[];
    spawner: Spawner;
    environment: Environment;
    particles: ParticleSystem;
    effects: EffectQueue;
    collision: CollisionEngine;
    score: ScoreKeeper;
    difficulty: DifficultyState;
    elapsed: number;
    frame: number;
    status: RunStatus;
    inputQueue: InputEvent[];
    cues: AudioCue[];
}

export interface GameContext extends RunState {
    readonly config: GameConfig;
    readonly catalog: AssetCatalog;
    readonly sounds: SoundBank;
    readonly events: EventBus;
    readonly highScores: HighScoreStore;
    showHitboxes: boolean;
}

export interface SimulationOptions {
    config?: ConfigOverrides;
    catalog?: AssetCatalog;
    highScores?: HighScoreStore;
}

function createRun(config: GameConfig, catalog: AssetCatalog, highScore: number): RunState {
    // separate streams, so cosmetic randomness never shifts the spawn sequence
    const rng = randomRng(config.seed);
    const particles = new ParticleSystem({ capacity: config.particles.capacity, gravity: config.particles.debrisGravity, rng: randomRng(config.seed ^ 0x9e3779b9) });
    const effects = new EffectQueue(particles);
    return {
        rng,
        player: new Player(config, catalog, effects),
        entities: [],
        spawner: new Spawner({ config, catalog, rng }),
        environment: new Environment({ config, rng: randomRng(config.seed ^ 0x85ebca6b), fx: effects }),
        particles,
        effects,
        collision: new CollisionEngine(catalog, config),
        score: new ScoreKeeper(config.score, highScore),
        difficulty: difficultyAt(0, config.difficulty),
        elapsed: 0,
        frame: 0,
        status: 'playing',
        inputQueue: [],
        cues: [],
    };
}

export function createSimulation(opts: SimulationOptions = {}): GameContext {
    const config = resolveConfig(opts.config ?? {});
    const catalog = validateCatalog(opts.catalog ?? createProceduralCatalog());
    const highScores = opts.highScores ?? new MemoryHighScoreStore();
    // synthesis happens here, never inside a frame
    const sounds = new SoundBank();
    sounds.precompute();
    return {
        ...createRun(config, catalog, highScores.load()),
        config,
        catalog,
        sounds,
        events: new EventBus(),
        highScores,
        showHitboxes: config.showHitboxes,
    };
}

// Hitbox display is a view toggle and applies at once, even while paused;
// everything else waits for the next step.
export function handleInput(ctx: GameContext, event: InputEvent): void {
    if (event === 'toggleHitboxes') {
        ctx.showHitboxes = !ctx.showHitboxes;
        return;
    }
    if (ctx.status !== 'playing') return;
    ctx.inputQueue.push(event);
}

function applyInput(ctx: GameContext, event: InputEvent): void {
    switch (event) {
        case 'toggleDayNight':
            ctx.environment.toggleMode();
            break;
        case 'debugSpawnDragon':
            ctx.spawner.forceDragon({ entities: ctx.entities, scrollSpeed: effectiveSpeed(ctx) });
            break;
        default:
            ctx.player.handleInput(event);
    }
}

export function effectiveSpeed(ctx: GameContext): number {
    return ctx.difficulty.scrollSpeed * ctx.player.speedBonus;
}

function scoreResolution(ctx: GameContext, res: Resolution): number {
    for (const kind of res.collected) ctx.events.emit('powerUp', { kind });
    if (!res.tornadoKills) return 0;
    const bonus = ctx.config.score.tornadoBonus * res.tornadoKills;
    ctx.events.emit('tornadoKill', { bonus });
    return ctx.score.addBonus(bonus);
}

function announceMilestones(ctx: GameContext, crossed: number): void {
    for (let i = 0; i < crossed; i++) ctx.effects.sound('milestone');
    if (crossed > 0) ctx.events.emit('milestone', { score: ctx.score.displayScore });
}

function endRun(ctx: GameContext): void {
    ctx.status = 'gameOver';
    const newHighScore = ctx.score.finish();
    if (newHighScore) ctx.highScores.save(ctx.score.highScore);
    ctx.events.emit('gameover', { score: ctx.score.displayScore, highScore: ctx.score.highScore, newHighScore });
}

// One frame: input, player, spawner, environment, collisions, particles,
// audio flush, then score and difficulty.
export function step(ctx: GameContext, dt: number): void {
    ctx.cues = [];
    if (ctx.status !== 'playing') return;
    const delta = clamp(dt, 0, ctx.config.maxFrameDelta);
    if (delta <= 0) return;
    ctx.frame++;

    const queued = ctx.inputQueue;
    ctx.inputQueue = [];
    for (const event of queued) applyInput(ctx, event);

    ctx.player.update(delta, ctx.difficulty);

    const speed = effectiveSpeed(ctx);
    ctx.spawner.update(delta, ctx.difficulty, { entities: ctx.entities, scrollSpeed: speed });
    ctx.environment.update(delta, speed);

    const resolution = ctx.collision.resolve(ctx.collision.test(ctx.player, ctx.entities), {
        player: ctx.player, entities: ctx.entities, fx: ctx.effects,
    });
    const bonusMilestones = scoreResolution(ctx, resolution);

    ctx.particles.update(delta);

    ctx.cues = ctx.effects.drain().map(kind => ({ kind, samples: ctx.sounds.get(kind) }));

    if (resolution.defeated) {
        endRun(ctx);
        return;
    }
    ctx.elapsed += delta;
    announceMilestones(ctx, bonusMilestones + ctx.score.addSurvival(delta));
    ctx.difficulty = difficultyAt(ctx.elapsed, ctx.config.difficulty);
}

export function pause(ctx: GameContext): boolean {
    if (ctx.status !== 'playing') return false;
    ctx.status = 'paused';
    ctx.inputQueue = [];
    return true;
}

export function resume(ctx: GameContext): boolean {
    if (ctx.status !== 'paused') return false;
    ctx.status = 'playing';
    return true;
}

// Fresh run from the configured seed; only the best score carries over.
export function restart(ctx: GameContext): void {
    Object.assign(ctx, createRun(ctx.config, ctx.catalog, ctx.score.highScore));
}

export interface PlayerView {
    x: number;
    y: number;
    width: number;
    height: number;
    pose: PlayerPose;
    textureKey: string;
    frame: number;
    motion: MotionState;
    invincible: boolean;
    tornadoArmed: boolean;
    powerUp: Readonly<ActivePowerUp> | null;
}

export interface EntityView {
    id: number;
    kind: EntityKind;
    category: EntityCategory;
    x: number;
    y: number;
    width: number;
    height: number;
    textureKey: string;
    frame: number;
    rotation: number;
}

export interface EnvironmentView {
    phase: number;
    light: number;
    daytime: boolean;
    sky: number;
    celestial: CelestialPosition;
    blending: boolean;
    layers: readonly ParallaxLayer[];
}

export interface FrameSnapshot {
    frame: number;
    status: RunStatus;
    elapsed: number;
    score: number;
    highScore: number;
    newHighScore: boolean;
    scrollSpeed: number;
    player: PlayerView;
    entities: readonly EntityView[];
    particles: readonly Particle[];
    environment: EnvironmentView;
    cues: readonly AudioCue[];
    showHitboxes: boolean;
}

export function snapshot(ctx: GameContext): FrameSnapshot {
    const { player, environment: env } = ctx;
    const box = player.bounds();
    return {
        frame: ctx.frame,
        status: ctx.status,
        elapsed: ctx.elapsed,
        score: ctx.score.displayScore,
        highScore: Math.max(ctx.score.highScore, ctx.score.displayScore),
        newHighScore: ctx.score.isNewHighScore,
        scrollSpeed: effectiveSpeed(ctx),
        player: {
            ...box,
            pose: player.pose,
            textureKey: player.currentFrame().textureKey,
            frame: player.frameIndex,
            motion: player.motion,
            invincible: player.invincible,
            tornadoArmed: player.tornadoArmed,
            powerUp: player.powerUp ? { ...player.powerUp } : null,
        },
        entities: ctx.entities.map(e => ({
            id: e.id, kind: e.kind, category: e.category,
            x: e.x, y: e.y, width: e.width, height: e.height,
            textureKey: entityFrame(e, ctx.catalog).textureKey,
            frame: entityFrameIndex(e),
            rotation: e.category === 'ground' ? e.spin : 0,
        })),
        particles: ctx.particles.particles,
        environment: {
            phase: env.phase, light: env.light, daytime: env.daytime, sky: env.sky,
            celestial: env.celestial, blending: env.blend !== null, layers: env.layers,
        },
        cues: ctx.cues,
        showHitboxes: ctx.showHitboxes,
    };
}
