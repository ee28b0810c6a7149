import { Assets, type Renderer, type Texture } from 'pixi.js';
import { FRAME_DURATIONS, MAX_FRAMES_PER_SET, type AnimationKey, type FrameSet } from '../animation';
import { ENTITY_KINDS, PLAYER_POSES, validateCatalog, type AssetCatalog } from '../assets/catalog';
import { createProceduralCatalog } from '../assets/procedural';
import { maskFromAlpha } from '../mask';
import type { PlayerPose } from '../types';
import { sliceGrid } from './sheet';

// Optional artwork: one horizontal strip per animation under public/assets/.
// Anything missing keeps its placeholder silhouette.
export interface SheetEntry { key: AnimationKey; url: string; frames: number; }

const FRAME_COUNTS: Record<AnimationKey, number> = {
    run: 2, jump: 1, duck: 1,
    rock: 1, barrel: 1, bamboo: 1, boulder: 1,
    dragonRed: 2, dragonGreen: 2, dragonBlack: 2,
    blueDash: 1, yellowTornado: 1,
};

const ANIMATION_KEYS: readonly AnimationKey[] = [...PLAYER_POSES, ...ENTITY_KINDS];

export const SHEETS: SheetEntry[] = ANIMATION_KEYS.map(key => ({
    key, url: `assets/${key}.png`, frames: Math.min(MAX_FRAMES_PER_SET, FRAME_COUNTS[key]),
}));

// Pixels at or above this alpha count as solid for collision.
const ALPHA_THRESHOLD = 128;

export interface LoadedAssets {
    catalog: AssetCatalog;
    textures: Map<string, Texture>;
}

const isPose = (key: AnimationKey): key is PlayerPose => PLAYER_POSES.some(p => p === key);

async function tryLoad(url: string): Promise<Texture | null> {
    try {
        const tex: Texture | undefined = await Assets.load<Texture>(url);
        return tex ?? null;
    } catch (err) {
        console.info(`[assets] ${url} not found, using placeholder`, err);
        return null;
    }
}

export async function loadAssets(renderer: Renderer, sheets: readonly SheetEntry[] = SHEETS): Promise<LoadedAssets> {
    const catalog = createProceduralCatalog();
    const textures = new Map<string, Texture>();
    for (const sheet of sheets) {
        const tex = await tryLoad(sheet.url);
        if (!tex) continue;
        const frames = sliceGrid(tex, sheet.frames, 1).map((frameTex, i) => {
            const { pixels, width, height } = renderer.extract.pixels(frameTex);
            const textureKey = `${sheet.key}.${i}`;
            textures.set(textureKey, frameTex);
            return { textureKey, mask: maskFromAlpha(pixels, width, height, ALPHA_THRESHOLD) };
        });
        const set: FrameSet = { frames, frameDuration: FRAME_DURATIONS[sheet.key] };
        if (isPose(sheet.key)) catalog.player[sheet.key] = set;
        else catalog.entities[sheet.key] = set;
    }
    console.info(`[assets] ${textures.size} artwork frames loaded`);
    return { catalog: validateCatalog(catalog), textures };
}
