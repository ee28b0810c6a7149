import { advanceFrame, type FrameDescriptor } from './animation';
import { frameAt, requirePlayerFrames, type AssetCatalog } from './assets/catalog';
import type { GameConfig } from './config';
import type { ActivePowerUp, DifficultyState, EffectSink, InputEvent, MotionState, PlayerPose, PowerUpKind, Rect, Vector2 } from './types';

const POSE_FOR: Record<MotionState, PlayerPose | null> = {
    running: 'run',
    jumping: 'jump',
    doubleJumping: 'jump',
    ducking: 'duck',
    defeated: null, // frozen on whatever pose was showing
};

export class Player {
    x: number;
    // feet offset from the ground line; negative is up
    y = 0;
    vy = 0;
    motion: MotionState = 'running';
    powerUp: ActivePowerUp | null = null;
    // a collected tornado waits here until something is in front of the player
    tornadoArmed = false;
    duckHeld = false;
    jumpBuffer = 0;
    pose: PlayerPose = 'run';
    frameIndex = 0;
    frameTimer = 0;
    private dustTimer = 0;
    private trailTimer = 0;

    constructor(private readonly config: GameConfig, private readonly catalog: AssetCatalog, private readonly fx: EffectSink) {
        this.x = config.physics.laneX;
        // fail fast: every pose must be loaded before a run can start
        requirePlayerFrames(catalog, 'run');
        requirePlayerFrames(catalog, 'jump');
        requirePlayerFrames(catalog, 'duck');
    }

    get invincible(): boolean { return this.powerUp !== null && this.powerUp.remaining > 0; }
    get defeated(): boolean { return this.motion === 'defeated'; }
    get airborne(): boolean { return this.motion === 'jumping' || this.motion === 'doubleJumping'; }
    get speedBonus(): number { return this.invincible ? this.config.powerUps.dashSpeedBonus : 1; }

    currentFrame(): FrameDescriptor {
        return frameAt(requirePlayerFrames(this.catalog, this.pose), this.frameIndex, `player.${this.pose}`);
    }

    bounds(): Rect {
        const { width, height } = this.currentFrame().mask;
        return { x: this.x, y: this.config.screen.groundY + this.y - height, width, height };
    }

    feet(): Vector2 { return { x: this.x + 10, y: this.config.screen.groundY + this.y }; }

    // Requests that make no sense in the current state are dropped.
    handleInput(event: InputEvent): void {
        if (this.defeated) return;
        switch (event) {
            case 'jumpPressed':
                if (this.motion === 'running' || this.motion === 'ducking') this.jump();
                else if (this.motion === 'jumping') this.doubleJump();
                else this.jumpBuffer = this.config.physics.jumpBufferSeconds;
                break;
            case 'duckPressed':
                this.duckHeld = true;
                if (this.motion === 'running') this.setMotion('ducking');
                break;
            case 'duckReleased':
                this.duckHeld = false;
                if (this.motion === 'ducking') this.setMotion('running');
                break;
            default:
                break;
        }
    }

    update(dt: number, difficulty: DifficultyState): void {
        if (this.defeated || dt <= 0) return;
        const phys = this.config.physics;

        if (this.airborne) {
            this.y += this.vy * dt;
            this.vy += phys.gravity * dt;
            if (this.y >= 0) this.land();
        }
        if (this.jumpBuffer > 0) this.jumpBuffer = Math.max(0, this.jumpBuffer - dt);

        if (this.powerUp) {
            this.powerUp.remaining -= dt;
            if (this.powerUp.remaining <= 0) this.powerUp = null;
        }

        if (this.motion === 'running') {
            this.dustTimer += dt;
            while (this.dustTimer >= phys.dustInterval) {
                this.dustTimer -= phys.dustInterval;
                this.fx.particles('dust', this.feet(), 1);
            }
        } else {
            this.dustTimer = 0;
        }

        if (this.invincible) {
            this.trailTimer += dt;
            while (this.trailTimer >= phys.dashTrailInterval) {
                this.trailTimer -= phys.dashTrailInterval;
                const b = this.bounds();
                this.fx.particles('dash', { x: b.x, y: b.y + b.height / 2 }, 1);
            }
        } else {
            this.trailTimer = 0;
        }

        // legs cycle faster as the world speeds up
        const set = requirePlayerFrames(this.catalog, this.pose);
        const duration = this.pose === 'run' ? set.frameDuration / Math.max(1, difficulty.speedMultiplier) : set.frameDuration;
        const next = advanceFrame(this.frameIndex, this.frameTimer, dt, set.frames.length, duration);
        this.frameIndex = next.index;
        this.frameTimer = next.timer;
    }

    // Policy when a power-up is already active: the new pickup replaces it.
    // A second BlueDash restarts the full duration (no accumulation). A tornado
    // arms at most one charge and leaves an active BlueDash untouched.
    applyPowerUp(kind: PowerUpKind): void {
        this.fx.sound('powerUp');
        if (kind === 'blueDash') this.powerUp = { kind: 'blueDash', remaining: this.config.powerUps.dashDuration };
        else this.tornadoArmed = true;
    }

    // Spends the armed tornado; false when there was none.
    fireTornado(): boolean {
        if (!this.tornadoArmed) return false;
        this.tornadoArmed = false;
        return true;
    }

    // Returns true when the hit ends the run.
    takeHit(): boolean {
        if (this.defeated || this.invincible) return false;
        this.motion = 'defeated';
        this.vy = 0;
        this.jumpBuffer = 0;
        this.fx.sound('hit');
        return true;
    }

    private jump(): void {
        this.setMotion('jumping');
        this.vy = this.config.physics.jumpVelocity;
        this.fx.sound('jump');
        this.fx.particles('dust', this.feet(), this.config.particles.dustBurst);
    }

    private doubleJump(): void {
        this.setMotion('doubleJumping');
        this.vy = this.config.physics.doubleJumpVelocity;
        this.fx.sound('doubleJump');
        const b = this.bounds();
        this.fx.particles('sparkle', { x: b.x + b.width / 2, y: b.y + b.height / 2 }, this.config.particles.sparkleBurst);
    }

    private land(): void {
        this.y = 0;
        this.vy = 0;
        this.setMotion(this.duckHeld ? 'ducking' : 'running');
        if (this.jumpBuffer > 0) {
            this.jumpBuffer = 0;
            this.jump();
        }
    }

    private setMotion(motion: MotionState): void {
        this.motion = motion;
        const pose = POSE_FOR[motion];
        if (pose && pose !== this.pose) {
            this.pose = pose;
            this.frameIndex = 0;
            this.frameTimer = 0;
        }
    }
}
