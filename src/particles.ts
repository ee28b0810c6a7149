import type { Particle, ParticleKind, Vector2 } from './types';
import { randRange, randInt, type Rng } from './rng';

interface ParticleSpec {
    vx: [number, number];
    vy: [number, number];
    lifetime: [number, number];
    size: [number, number];
    color: number;
    gravity: boolean;
    // shape of the alpha fade over normalized remaining life (1 -> 0)
    fade: (remaining: number) => number;
}

const linear = (r: number) => r;
const quadratic = (r: number) => r * r;

// Launch parameters per kind, px/s and seconds.
export const PARTICLE_SPECS: Record<ParticleKind, ParticleSpec> = {
    petal:   { vx: [-60, 60],   vy: [30, 90],     lifetime: [0.33, 0.83], size: [3, 5], color: 0xffb7c5, gravity: false, fade: linear },
    debris:  { vx: [-300, 300], vy: [-360, -120], lifetime: [0.33, 0.83], size: [4, 7], color: 0x8b4513, gravity: true,  fade: linear },
    sparkle: { vx: [-60, 60],   vy: [-120, -30],  lifetime: [0.33, 0.83], size: [2, 4], color: 0xffff00, gravity: false, fade: quadratic },
    dust:    { vx: [-120, -30], vy: [-30, 0],     lifetime: [0.33, 0.83], size: [3, 6], color: 0xc8c8c8, gravity: false, fade: linear },
    dash:    { vx: [-240, -120], vy: [-20, 20],   lifetime: [0.2, 0.4],   size: [4, 8], color: 0x64b4ff, gravity: false, fade: linear },
};

export interface ParticleSystemOptions {
    capacity: number;
    gravity: number;
    rng: Rng;
}

// Bounded pool of decaying particles. Insertion order is age order, so eviction
// drops from the front.
export class ParticleSystem {
    private readonly pool: Particle[] = [];
    readonly capacity: number;
    private readonly gravity: number;
    private readonly rng: Rng;
    evicted = 0;

    constructor(opts: ParticleSystemOptions) {
        if (!Number.isInteger(opts.capacity) || opts.capacity <= 0) throw new Error(`ParticleSystem capacity must be a positive integer, got ${opts.capacity}`);
        this.capacity = opts.capacity;
        this.gravity = opts.gravity;
        this.rng = opts.rng;
    }

    get size(): number { return this.pool.length; }

    get particles(): readonly Particle[] { return this.pool; }

    emit(kind: ParticleKind, at: Vector2, count: number): void {
        const n = Math.max(0, Math.floor(count));
        if (n === 0) return;
        const spec = PARTICLE_SPECS[kind];
        for (let i = 0; i < n; i++) {
            this.pool.push({
                kind,
                x: at.x,
                y: at.y,
                vx: randRange(this.rng, spec.vx[0], spec.vx[1]),
                vy: randRange(this.rng, spec.vy[0], spec.vy[1]),
                age: 0,
                lifetime: randRange(this.rng, spec.lifetime[0], spec.lifetime[1]),
                alpha: 1,
                size: randInt(this.rng, spec.size[0], spec.size[1]),
                color: spec.color,
            });
        }
        const overflow = this.pool.length - this.capacity;
        if (overflow > 0) {
            this.pool.splice(0, overflow);
            this.evicted += overflow;
        }
    }

    update(dt: number): void {
        if (dt <= 0) return;
        let write = 0;
        for (let read = 0; read < this.pool.length; read++) {
            const p = this.pool[read];
            const spec = PARTICLE_SPECS[p.kind];
            p.x += p.vx * dt;
            p.y += p.vy * dt;
            if (spec.gravity) p.vy += this.gravity * dt;
            p.age += dt;
            const remaining = 1 - p.age / p.lifetime;
            // alpha only ever goes down
            p.alpha = Math.min(p.alpha, remaining > 0 ? spec.fade(remaining) : 0);
            if (p.alpha <= 0 || p.age >= p.lifetime) continue;
            this.pool[write++] = p;
        }
        this.pool.length = write;
    }
}
