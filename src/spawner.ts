import type { AssetCatalog } from './assets/catalog';
import type { GameConfig } from './config';
import { fairGroundGap } from './difficulty';
import { advanceEntity, createDragon, createGroundObstacle, createPickup, isObstacle, type EntityFactoryCtx } from './entities';
import { pick, randRange, weightedPick, type Rng, type WeightTable } from './rng';
import type { Dragon, DragonKind, DifficultyState, Entity, GroundKind, PowerUpKind } from './types';

type SpawnSlot = GroundKind | 'dragon';

const DRAGON_BANDS: readonly Dragon['band'][] = ['low', 'mid', 'high'];
const PICKUP_KINDS: readonly PowerUpKind[] = ['blueDash', 'yellowTornado'];

// The live entity list the spawner scrolls, culls and appends to.
export interface SpawnWorld {
    entities: Entity[];
    // effective speed this frame, BlueDash bonus included
    scrollSpeed: number;
}

export interface SpawnerOptions {
    config: GameConfig;
    catalog: AssetCatalog;
    rng: Rng;
}

export class Spawner {
    private readonly config: GameConfig;
    private readonly rng: Rng;
    private readonly factory: EntityFactoryCtx;
    private idCounter = 0;
    timer: number;
    lastSlot: SpawnSlot | null = null;
    // the first obstacle of a run is a dragon when `earlyDragon` is set
    private earlyDragonPending: boolean;
    private sinceBamboo = Infinity;
    private distanceSinceBamboo = Infinity;

    constructor(opts: SpawnerOptions) {
        this.config = opts.config;
        this.rng = opts.rng;
        this.timer = opts.config.spawner.firstSpawnDelay;
        this.earlyDragonPending = opts.config.spawner.earlyDragon;
        this.factory = { catalog: opts.catalog, config: opts.config, nextId: () => ++this.idCounter };
    }

    // Scrolls and culls `world.entities` in place, then appends and returns this frame's spawns.
    update(dt: number, difficulty: DifficultyState, world: SpawnWorld): Entity[] {
        const { catalog } = this.factory;
        const step = Math.max(0, dt);
        for (const e of world.entities) advanceEntity(e, step, world.scrollSpeed, catalog, this.config);
        this.cull(world.entities);

        this.sinceBamboo += step;
        this.distanceSinceBamboo += world.scrollSpeed * step;

        const spawned: Entity[] = [];
        this.timer -= step;
        if (this.timer <= 0) {
            const entity = this.spawnObstacle(difficulty, world);
            world.entities.push(entity);
            spawned.push(entity);
            this.timer = this.nextInterval(difficulty);
        }

        // pickups arrive as a Poisson process, independent of the obstacle timer
        const rate = this.config.powerUps.pickupRatePerSecond;
        if (rate > 0 && step > 0 && this.rng() < 1 - Math.exp(-rate * step)) {
            const pickup = createPickup(this.factory, pick(this.rng, PICKUP_KINDS), this.config.screen.width);
            world.entities.push(pickup);
            spawned.push(pickup);
        }
        return spawned;
    }

    // Debug hook: a dragon just past the right edge, regardless of the timer.
    forceDragon(world: SpawnWorld): Dragon {
        const dragon = createDragon(this.factory, this.pickDragonKind(), pick(this.rng, DRAGON_BANDS), this.config.screen.width + 10);
        world.entities.push(dragon);
        return dragon;
    }

    nextInterval(difficulty: DifficultyState): number {
        const { minInterval, maxInterval } = this.config.spawner;
        const m = difficulty.spawnIntervalMultiplier;
        return randRange(this.rng, minInterval * m, maxInterval * m);
    }

    private cull(entities: Entity[]): void {
        const bound = -this.config.spawner.cullMargin;
        let write = 0;
        for (const e of entities) {
            if (e.x + e.width >= bound) entities[write++] = e;
        }
        entities.length = write;
    }

    private chooseSlot(difficulty: DifficultyState): SpawnSlot {
        const w = this.config.spawner.weights;
        const table: WeightTable<SpawnSlot> = [
            ['rock', w.rock],
            ['barrel', w.barrel],
            ['bamboo', w.bamboo],
            ['dragon', w.dragon * difficulty.dragonFrequencyMultiplier],
            ['boulder', w.boulder],
        ];
        const slot = weightedPick(this.rng, table);
        if (slot !== 'bamboo') return slot;
        const s = this.config.spawner;
        const cooled = this.sinceBamboo > s.bambooCooldown && this.distanceSinceBamboo > s.bambooMinDistance;
        return this.lastSlot !== 'bamboo' && cooled ? 'bamboo' : 'rock';
    }

    private pickDragonKind(): DragonKind {
        const w = this.config.spawner.dragonColorWeights;
        return weightedPick<DragonKind>(this.rng, [['dragonRed', w.dragonRed], ['dragonGreen', w.dragonGreen], ['dragonBlack', w.dragonBlack]]);
    }

    private spawnObstacle(difficulty: DifficultyState, world: SpawnWorld): Entity {
        const s = this.config.spawner;
        let lastX = -Infinity;
        for (const e of world.entities) {
            if (isObstacle(e)) lastX = Math.max(lastX, e.x);
        }
        const baseX = Math.max(this.config.screen.width, lastX + s.minSpawnSpacing);

        const slot = this.earlyDragonPending ? 'dragon' : this.chooseSlot(difficulty);
        this.earlyDragonPending = false;
        this.lastSlot = slot;
        if (slot === 'dragon') return createDragon(this.factory, this.pickDragonKind(), pick(this.rng, DRAGON_BANDS), baseX);

        // fairness: a full reaction window behind every ground obstacle on the field
        const obstacle = createGroundObstacle(this.factory, slot, baseX);
        const speedBonus = world.scrollSpeed / difficulty.scrollSpeed;
        const laneX = this.config.physics.laneX;
        for (const e of world.entities) {
            if (e.category !== 'ground') continue;
            const lead = { trailingEdge: e.x + e.width, speedFactor: e.speedFactor };
            const gap = fairGroundGap(lead, obstacle.speedFactor, difficulty, speedBonus, laneX, this.config);
            obstacle.x = Math.max(obstacle.x, lead.trailingEdge + gap);
        }
        if (slot === 'bamboo') {
            this.sinceBamboo = 0;
            this.distanceSinceBamboo = 0;
        }
        return obstacle;
    }
}
