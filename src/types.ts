export interface Vector2 { x: number; y: number; }
export interface Rect { x: number; y: number; width: number; height: number; }

export type GroundKind = 'rock' | 'barrel' | 'bamboo' | 'boulder';
export type DragonKind = 'dragonRed' | 'dragonGreen' | 'dragonBlack';
export type PowerUpKind = 'blueDash' | 'yellowTornado';
export type EntityKind = GroundKind | DragonKind | PowerUpKind;
export type AltitudeBand = 'ground' | 'low' | 'mid' | 'high';

interface EntityBase {
    id: number;
    x: number;
    y: number; // top edge, screen space
    width: number;
    height: number;
    speedFactor: number;
}

export interface GroundObstacle extends EntityBase { category: 'ground'; kind: GroundKind; band: 'ground'; spin: number; }
export interface Dragon extends EntityBase { category: 'dragon'; kind: DragonKind; band: Exclude<AltitudeBand, 'ground'>; frameIndex: number; frameTimer: number; }
export interface PowerUpPickup extends EntityBase { category: 'pickup'; kind: PowerUpKind; baseY: number; bobPhase: number; }

export type Entity = GroundObstacle | Dragon | PowerUpPickup;
export type EntityCategory = Entity['category'];

export type MotionState = 'running' | 'jumping' | 'doubleJumping' | 'ducking' | 'defeated';
export type PlayerPose = 'run' | 'jump' | 'duck';

export interface ActivePowerUp { kind: 'blueDash'; remaining: number; }

export type ParticleKind = 'dust' | 'petal' | 'sparkle' | 'debris' | 'dash';

export interface Particle {
    kind: ParticleKind;
    x: number;
    y: number;
    vx: number;
    vy: number;
    age: number;
    lifetime: number;
    alpha: number;
    size: number;
    color: number;
}

export type InputEvent =
    | 'jumpPressed'
    | 'duckPressed'
    | 'duckReleased'
    | 'toggleDayNight'
    | 'debugSpawnDragon'
    | 'toggleHitboxes';

export type SoundKind = 'jump' | 'doubleJump' | 'tornado' | 'powerUp' | 'milestone' | 'hit';

export interface DifficultyState {
    elapsed: number;
    scrollSpeed: number;
    speedMultiplier: number;
    spawnIntervalMultiplier: number;
    dragonFrequencyMultiplier: number;
}

// Sink the player and collision resolution push their side effects into;
// the simulation routes them to the particle pool and the audio queue.
export interface EffectSink {
    particles(kind: ParticleKind, at: Vector2, count: number): void;
    sound(kind: SoundKind): void;
}

export type RunStatus = 'playing' | 'paused' | 'gameOver';
