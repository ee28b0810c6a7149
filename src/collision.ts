// Two-stage collision: rectangle reject first, per-pixel masks only for pairs whose
// boxes overlap. `maskTests` counts the expensive stage.
import type { AssetCatalog } from './assets/catalog';
import type { GameConfig } from './config';
import { entityFrame, entityRect, isObstacle } from './entities';
import { maskOverlap } from './mask';
import { rectsOverlap } from './math';
import type { Player } from './player';
import type { Dragon, EffectSink, Entity, GroundObstacle, PowerUpKind, PowerUpPickup, Vector2 } from './types';

export type CollisionOutcome =
    | { type: 'powerUp'; entity: PowerUpPickup }
    | { type: 'passThrough'; entity: GroundObstacle | Dragon }
    | { type: 'hit'; entity: GroundObstacle | Dragon };

export interface ResolveContext {
    player: Player;
    entities: Entity[];
    fx: EffectSink;
}

export interface Resolution {
    collected: PowerUpKind[];
    destroyed: Entity[];
    tornadoKills: number;
    defeated: boolean;
}

const centerOf = (e: Entity): Vector2 => ({ x: e.x + e.width / 2, y: e.y + e.height / 2 });

export class CollisionEngine {
    maskTests = 0;
    boxTests = 0;

    constructor(private readonly catalog: AssetCatalog, private readonly config: GameConfig) {}

    test(player: Player, entities: readonly Entity[]): CollisionOutcome[] {
        const outcomes: CollisionOutcome[] = [];
        const box = player.bounds();
        const mask = player.currentFrame().mask;
        const screenWidth = this.config.screen.width;

        for (const e of entities) {
            if (e.x + e.width <= 0 || e.x >= screenWidth) continue;
            this.boxTests++;
            if (!rectsOverlap(box, entityRect(e))) continue;
            this.maskTests++;
            if (!maskOverlap(mask, entityFrame(e, this.catalog).mask, e.x - box.x, e.y - box.y)) continue;

            if (e.category === 'pickup') outcomes.push({ type: 'powerUp', entity: e });
            else outcomes.push({ type: player.invincible ? 'passThrough' : 'hit', entity: e });
        }
        return outcomes;
    }

    // Pickups are applied before any obstacle, so a BlueDash collected on the same
    // frame as a contact protects against it whatever order the outcomes came in.
    // Obstacle outcomes are re-judged against the player's state at that point.
    // An armed tornado clears the nearest obstacle ahead, or failing that the one
    // touching the player; with neither it stays armed.
    resolve(outcomes: readonly CollisionOutcome[], ctx: ResolveContext): Resolution {
        const { player, fx } = ctx;
        const particles = this.config.particles;
        const removed = new Set<number>();
        const result: Resolution = { collected: [], destroyed: [], tornadoKills: 0, defeated: false };

        const destroy = (e: Entity) => {
            removed.add(e.id);
            result.destroyed.push(e);
        };
        const tornadoKill = (e: GroundObstacle | Dragon) => {
            destroy(e);
            result.tornadoKills++;
            fx.sound('tornado');
            fx.particles('debris', centerOf(e), particles.debrisBurst);
        };

        for (const o of outcomes) {
            if (o.type !== 'powerUp' || removed.has(o.entity.id)) continue;
            destroy(o.entity);
            result.collected.push(o.entity.kind);
            const b = player.bounds();
            fx.particles('sparkle', { x: b.x + b.width / 2, y: b.y + b.height / 2 }, particles.pickupBurst);
            player.applyPowerUp(o.entity.kind);
        }

        if (player.tornadoArmed) {
            const target = this.tornadoTarget(player, ctx.entities, removed);
            if (target && player.fireTornado()) tornadoKill(target);
        }

        for (const o of outcomes) {
            if (o.type === 'powerUp' || removed.has(o.entity.id)) continue;
            if (player.invincible) {
                destroy(o.entity);
                fx.particles('debris', centerOf(o.entity), particles.debrisBurst);
            } else if (player.fireTornado()) {
                tornadoKill(o.entity);
            } else if (player.takeHit()) {
                result.defeated = true;
            }
        }

        if (removed.size) {
            let write = 0;
            for (const e of ctx.entities) {
                if (!removed.has(e.id)) ctx.entities[write++] = e;
            }
            ctx.entities.length = write;
        }
        return result;
    }

    // Nearest obstacle still in front of the player; ties go to the earlier spawn.
    tornadoTarget(player: Player, entities: readonly Entity[], skip: ReadonlySet<number> = new Set()): GroundObstacle | Dragon | null {
        let best: GroundObstacle | Dragon | null = null;
        for (const e of entities) {
            if (!isObstacle(e) || skip.has(e.id) || e.x <= player.x) continue;
            if (!best || e.x < best.x) best = e;
        }
        return best;
    }
}
