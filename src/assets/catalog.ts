import { FrameSetSchema, type FrameDescriptor, type FrameSet } from '../animation';
import { AssetContractError } from '../errors';
import type { EntityKind, PlayerPose } from '../types';

export const PLAYER_POSES: readonly PlayerPose[] = ['run', 'jump', 'duck'];
export const ENTITY_KINDS: readonly EntityKind[] = ['rock', 'barrel', 'bamboo', 'boulder', 'dragonRed', 'dragonGreen', 'dragonBlack', 'blueDash', 'yellowTornado'];

// What the asset loader hands the core: decoded frame sets with masks, keyed by kind.
export interface AssetCatalog {
    player: Partial<Record<PlayerPose, FrameSet>>;
    entities: Partial<Record<EntityKind, FrameSet>>;
}

export function requirePlayerFrames(catalog: AssetCatalog, pose: PlayerPose): FrameSet {
    const set = catalog.player[pose];
    if (!set) throw new AssetContractError(`player.${pose}`, 'no frames loaded');
    return set;
}

export function requireEntityFrames(catalog: AssetCatalog, kind: EntityKind): FrameSet {
    const set = catalog.entities[kind];
    if (!set) throw new AssetContractError(kind, 'no frames loaded');
    return set;
}

export function frameAt(set: FrameSet, index: number, subject: string): FrameDescriptor {
    const frame = set.frames[index];
    if (!frame) throw new AssetContractError(subject, `frame ${index} out of range (0..${set.frames.length - 1})`);
    return frame;
}

// Validate a catalog at load time: every pose and kind present, every frame set well formed.
export function validateCatalog(catalog: AssetCatalog): AssetCatalog {
    const check = (subject: string, set: FrameSet | undefined) => {
        if (!set) throw new AssetContractError(subject, 'no frames loaded');
        const parsed = FrameSetSchema.safeParse(set);
        if (!parsed.success) {
            throw new AssetContractError(subject, parsed.error.issues.map(i => `${i.path.join('.') || 'set'}: ${i.message}`).join('; '));
        }
    };
    for (const pose of PLAYER_POSES) check(`player.${pose}`, catalog.player[pose]);
    for (const kind of ENTITY_KINDS) check(kind, catalog.entities[kind]);
    return catalog;
}
