import type { GameConfig } from './config';
import { SKY_COLORS } from './constants/balance';
import { lerp, lerpColor, smoothstep, wrap } from './math';
import { randRange, type Rng } from './rng';
import type { EffectSink, ParticleKind } from './types';

// Phase runs 0 -> 1 over one full day: 0.25 is noon, 0.75 is midnight.
export function ambientLight(phase: number): number {
    return (1 + Math.sin(2 * Math.PI * phase)) / 2;
}

export function isDaytime(phase: number): boolean {
    return wrap(phase, 1) <= 0.5;
}

export function skyColor(phase: number): number {
    return lerpColor(SKY_COLORS.NIGHT, SKY_COLORS.DAY, ambientLight(phase));
}

export function ambientKind(phase: number): Extract<ParticleKind, 'petal' | 'sparkle'> {
    return isDaytime(phase) ? 'petal' : 'sparkle';
}

export function ambientRate(phase: number, cfg: GameConfig['environment']): number {
    return isDaytime(phase) ? cfg.petalsPerSecond : cfg.sparklesPerSecond;
}

export interface CelestialPosition {
    body: 'sun' | 'moon';
    x: number;
    y: number;
}

// Sun by day, moon by night, each crossing the sky on a half-sine arc from
// the left horizon to the right one.
export function celestialPosition(phase: number, screen: GameConfig['screen']): CelestialPosition {
    const p = wrap(phase, 1);
    const body = p <= 0.5 ? 'sun' : 'moon';
    const t = (p <= 0.5 ? p : p - 0.5) / 0.5;
    const horizon = screen.groundY;
    const peak = 60;
    return { body, x: t * screen.width, y: horizon - Math.sin(Math.PI * t) * (horizon - peak) };
}

export type LayerName = 'pagodas' | 'clouds' | 'lanterns' | 'ground';

export interface ParallaxItem {
    x: number;
    y: number;
    scale: number;
    factor: number;
}

export interface ParallaxLayer {
    name: LayerName;
    // items wrap inside [-margin, width + margin)
    margin: number;
    items: ParallaxItem[];
}

interface Blend { from: number; to: number; elapsed: number; }

export interface EnvironmentOptions {
    config: GameConfig;
    rng: Rng;
    fx: EffectSink;
}

export class Environment {
    phase: number;
    blend: Blend | null = null;
    readonly layers: ParallaxLayer[];
    private emitAccumulator = 0;
    private readonly config: GameConfig;
    private readonly rng: Rng;
    private readonly fx: EffectSink;

    constructor(opts: EnvironmentOptions) {
        this.config = opts.config;
        this.rng = opts.rng;
        this.fx = opts.fx;
        this.phase = opts.config.environment.startPhase;
        this.layers = this.buildLayers();
    }

    get light(): number { return ambientLight(this.phase); }
    get daytime(): boolean { return isDaytime(this.phase); }
    get sky(): number { return skyColor(this.phase); }
    get celestial(): CelestialPosition { return celestialPosition(this.phase, this.config.screen); }

    update(dt: number, scrollSpeed: number): void {
        if (dt <= 0) return;
        const env = this.config.environment;

        if (this.blend) {
            // the natural cycle holds still while a toggle is blending
            this.blend.elapsed += dt;
            const t = smoothstep(this.blend.elapsed / env.toggleBlendSeconds);
            this.phase = wrap(lerp(this.blend.from, this.blend.to, t), 1);
            if (this.blend.elapsed >= env.toggleBlendSeconds) {
                this.phase = wrap(this.blend.to, 1);
                this.blend = null;
            }
        } else {
            this.phase = wrap(this.phase + dt / env.cycleSeconds, 1);
        }

        this.scrollLayers(dt, scrollSpeed);

        this.emitAccumulator += ambientRate(this.phase, env) * dt;
        const kind = ambientKind(this.phase);
        const y = kind === 'petal' ? -10 : this.config.screen.height;
        while (this.emitAccumulator >= 1) {
            this.emitAccumulator -= 1;
            this.fx.particles(kind, { x: randRange(this.rng, 0, this.config.screen.width), y }, 1);
        }
    }

    // Half a cycle away, eased over `toggleBlendSeconds`. A toggle during a blend
    // heads half a cycle past the previous target, starting from where the sky is now.
    toggleMode(): void {
        const target = wrap((this.blend ? this.blend.to : this.phase) + 0.5, 1);
        this.blend = { from: this.phase, to: this.phase + wrap(target - this.phase, 1), elapsed: 0 };
    }

    private scrollLayers(dt: number, scrollSpeed: number): void {
        const width = this.config.screen.width;
        for (const layer of this.layers) {
            const span = width + layer.margin * 2;
            for (const item of layer.items) {
                item.x = wrap(item.x - scrollSpeed * item.factor * dt + layer.margin, span) - layer.margin;
            }
        }
    }

    private buildLayers(): ParallaxLayer[] {
        const { width, groundY } = this.config.screen;
        const rng = this.rng;
        const pagodas: ParallaxItem[] = [0, 1, 2].map(i => ({ x: i * 400 + 100, y: groundY - 140, scale: 1, factor: 0.2 }));
        const clouds: ParallaxItem[] = [0, 1, 2, 3].map(() => ({
            x: randRange(rng, 0, width), y: randRange(rng, 20, 160), scale: randRange(rng, 0.8, 1.4), factor: randRange(rng, 0.1, 0.25),
        }));
        const lanterns: ParallaxItem[] = [0, 1, 2].map(() => ({ x: randRange(rng, 0, width), y: randRange(rng, 120, 220), scale: 1, factor: 0.12 }));
        // ground stripes move with the obstacles
        const ground: ParallaxItem[] = Array.from({ length: Math.ceil(width / 64) + 1 }, (_, i) => ({ x: i * 64, y: groundY, scale: 1, factor: 1 }));
        return [
            { name: 'pagodas', margin: 200, items: pagodas },
            { name: 'clouds', margin: 120, items: clouds },
            { name: 'lanterns', margin: 50, items: lanterns },
            { name: 'ground', margin: 32, items: ground },
        ];
    }
}
