import { advanceFrame, type FrameDescriptor } from './animation';
import { frameAt, requireEntityFrames, type AssetCatalog } from './assets/catalog';
import { DRAGON_BAND_TOP, SPEED_FACTORS } from './constants/balance';
import type { GameConfig } from './config';
import type { Dragon, DragonKind, Entity, GroundKind, GroundObstacle, PowerUpKind, PowerUpPickup, Rect } from './types';

const BOULDER_SPIN = -10.5; // rad/s

export interface EntityFactoryCtx {
    catalog: AssetCatalog;
    config: GameConfig;
    nextId: () => number;
}

function sizeOf(ctx: EntityFactoryCtx, kind: Entity['kind']): { width: number; height: number } {
    const mask = frameAt(requireEntityFrames(ctx.catalog, kind), 0, kind).mask;
    return { width: mask.width, height: mask.height };
}

export function createGroundObstacle(ctx: EntityFactoryCtx, kind: GroundKind, x: number): GroundObstacle {
    const { width, height } = sizeOf(ctx, kind);
    return {
        id: ctx.nextId(), category: 'ground', kind, band: 'ground',
        x, y: ctx.config.screen.groundY - height, width, height,
        speedFactor: SPEED_FACTORS[kind], spin: 0,
    };
}

export function createDragon(ctx: EntityFactoryCtx, kind: DragonKind, band: Dragon['band'], x: number): Dragon {
    const { width, height } = sizeOf(ctx, kind);
    return {
        id: ctx.nextId(), category: 'dragon', kind, band,
        x, y: ctx.config.screen.groundY - DRAGON_BAND_TOP[band], width, height,
        speedFactor: SPEED_FACTORS[kind], frameIndex: 0, frameTimer: 0,
    };
}

export function createPickup(ctx: EntityFactoryCtx, kind: PowerUpKind, x: number): PowerUpPickup {
    const { width, height } = sizeOf(ctx, kind);
    const baseY = ctx.config.screen.groundY - ctx.config.powerUps.pickupAltitude;
    return {
        id: ctx.nextId(), category: 'pickup', kind,
        x, y: baseY, width, height, baseY, bobPhase: 0,
        speedFactor: SPEED_FACTORS[kind],
    };
}

// Per-category capabilities; dispatched on the `category` tag.
interface EntityBehavior<E extends Entity> {
    advance(e: E, dt: number, scrollSpeed: number, catalog: AssetCatalog, config: GameConfig): void;
    frameIndex(e: E): number;
}

const groundBehavior: EntityBehavior<GroundObstacle> = {
    advance(e, dt, scrollSpeed) {
        e.x -= scrollSpeed * e.speedFactor * dt;
        if (e.kind === 'boulder') e.spin += BOULDER_SPIN * dt;
    },
    frameIndex: () => 0,
};

const dragonBehavior: EntityBehavior<Dragon> = {
    advance(e, dt, scrollSpeed, catalog) {
        e.x -= scrollSpeed * e.speedFactor * dt;
        const set = requireEntityFrames(catalog, e.kind);
        const next = advanceFrame(e.frameIndex, e.frameTimer, dt, set.frames.length, set.frameDuration);
        e.frameIndex = next.index;
        e.frameTimer = next.timer;
    },
    frameIndex: e => e.frameIndex,
};

const pickupBehavior: EntityBehavior<PowerUpPickup> = {
    advance(e, dt, scrollSpeed, _catalog, config) {
        e.x -= scrollSpeed * e.speedFactor * dt;
        e.bobPhase += config.powerUps.bobSpeed * dt;
        e.y = e.baseY + Math.sin(e.bobPhase) * config.powerUps.bobAmplitude;
    },
    frameIndex: () => 0,
};

export function advanceEntity(e: Entity, dt: number, scrollSpeed: number, catalog: AssetCatalog, config: GameConfig): void {
    switch (e.category) {
        case 'ground': return groundBehavior.advance(e, dt, scrollSpeed, catalog, config);
        case 'dragon': return dragonBehavior.advance(e, dt, scrollSpeed, catalog, config);
        case 'pickup': return pickupBehavior.advance(e, dt, scrollSpeed, catalog, config);
    }
}

export function entityFrameIndex(e: Entity): number {
    switch (e.category) {
        case 'ground': return groundBehavior.frameIndex(e);
        case 'dragon': return dragonBehavior.frameIndex(e);
        case 'pickup': return pickupBehavior.frameIndex(e);
    }
}

export function entityFrame(e: Entity, catalog: AssetCatalog): FrameDescriptor {
    return frameAt(requireEntityFrames(catalog, e.kind), entityFrameIndex(e), e.kind);
}

export function entityRect(e: Entity): Rect {
    return { x: e.x, y: e.y, width: e.width, height: e.height };
}

export const isObstacle = (e: Entity): e is GroundObstacle | Dragon => e.category !== 'pickup';
