import { Container, Graphics, Sprite, type Application, type Texture } from 'pixi.js';
import { DRAGON_WINGS_DOWN, DRAGON_WINGS_UP } from '../assets/procedural';
import type { GameConfig } from '../config';
import type { ParallaxLayer } from '../environment';
import type { EntityView, FrameSnapshot, PlayerView } from '../simulation';
import type { EntityKind } from '../types';

const COLORS = {
    ground: 0x654321,
    grass: 0x32c832,
    sun: 0xffffc8,
    moon: 0xdcdcdc,
    cloud: 0xffffff,
    pagoda: 0x5a2d2d,
    lantern: 0xff8c00,
    samurai: 0x1e1e28,
    sash: 0xc83232,
    hitbox: 0xff0000,
    playerHitbox: 0x00ff00,
};

const ENTITY_COLORS: Record<EntityKind, number> = {
    rock: 0x808080,
    barrel: 0x8b5a2b,
    bamboo: 0x28a03c,
    boulder: 0x5a5a5a,
    dragonRed: 0xc83232,
    dragonGreen: 0x32a050,
    dragonBlack: 0x282828,
    blueDash: 0x64b4ff,
    yellowTornado: 0xffd700,
};

// Vector stand-in for an entity without artwork, drawn in its own local space.
function drawPlaceholder(g: Graphics, v: EntityView) {
    g.clear();
    const color = ENTITY_COLORS[v.kind];
    const { width: w, height: h } = v;
    switch (v.kind) {
        case 'rock':
        case 'boulder':
            g.circle(0, 0, w / 2).fill(color);
            break;
        case 'barrel':
            g.roundRect(-w / 2, -h / 2, w, h, 6).fill(color);
            g.rect(-w / 2, -h / 4, w, 4).fill(0x3c2814);
            g.rect(-w / 2, h / 4, w, 4).fill(0x3c2814);
            break;
        case 'bamboo':
            g.rect(-5, -h / 2, 10, h).fill(color);
            break;
        case 'dragonRed':
        case 'dragonGreen':
        case 'dragonBlack':
            g.poly((v.frame === 0 ? DRAGON_WINGS_UP : DRAGON_WINGS_DOWN).map(p => ({ x: p.x - w / 2, y: p.y - h / 2 }))).fill(color);
            break;
        case 'blueDash':
            g.circle(0, 0, w / 2).fill({ color, alpha: 0.85 });
            break;
        case 'yellowTornado':
            g.ellipse(0, 0, w / 2, h / 2).fill(color);
            break;
    }
}

function drawSamurai(g: Graphics, p: PlayerView) {
    g.clear();
    const { width: w, height: h } = p;
    if (p.pose === 'duck') {
        g.circle(30, 10, 9).fill(COLORS.samurai);
        g.rect(6, 18, 40, h - 18).fill(COLORS.samurai);
        return;
    }
    const head = Math.round(h * 0.14);
    const legTop = Math.round(h * 0.68);
    const stride = p.pose === 'jump' ? 6 : (p.frame === 0 ? 4 : -2);
    g.circle(w / 2, head, head).fill(COLORS.samurai);
    g.rect(Math.round(w * 0.25), head * 2, Math.round(w * 0.5), legTop - head * 2).fill(COLORS.samurai);
    g.rect(Math.round(w * 0.25), head * 2 + 8, Math.round(w * 0.5), 4).fill(COLORS.sash);
    g.rect(Math.round(w * 0.25) - stride, legTop, 8, h - legTop).fill(COLORS.samurai);
    g.rect(Math.round(w * 0.75) - 8 + stride, legTop, 8, h - legTop).fill(COLORS.samurai);
}

export class SceneRenderer {
    private readonly sky = new Graphics();
    private readonly backdrop = new Graphics();
    private readonly entityLayer = new Container();
    private readonly playerLayer = new Container();
    private readonly particleLayer = new Graphics();
    private readonly shade = new Graphics();
    private readonly hitboxes = new Graphics();
    private readonly views = new Map<number, Sprite | Graphics>();
    private playerSprite: Sprite | null = null;
    private readonly playerGraphic = new Graphics();

    constructor(app: Application, private readonly textures: Map<string, Texture>, private readonly config: GameConfig) {
        app.stage.addChild(this.sky, this.backdrop, this.entityLayer, this.playerLayer, this.particleLayer, this.shade, this.hitboxes);
        this.playerLayer.addChild(this.playerGraphic);
    }

    draw(snap: FrameSnapshot) {
        const { width, height, groundY } = this.config.screen;
        const env = snap.environment;

        this.sky.clear();
        this.sky.rect(0, 0, width, height).fill(env.sky);
        const { body, x, y } = env.celestial;
        if (body === 'sun') {
            this.sky.circle(x, y, 40).fill(COLORS.sun);
        } else {
            this.sky.circle(x, y, 30).fill(COLORS.moon);
            this.sky.circle(x - 10, y - 5, 25).fill(env.sky);
        }

        this.backdrop.clear();
        for (const layer of env.layers) this.drawLayer(layer);
        this.backdrop.rect(0, groundY, width, height - groundY).fill(COLORS.ground);
        this.backdrop.rect(0, groundY - 2, width, 4).fill(COLORS.grass);

        this.drawEntities(snap.entities);
        this.drawPlayer(snap.player);

        this.particleLayer.clear();
        for (const p of snap.particles) this.particleLayer.circle(p.x, p.y, p.size / 2).fill({ color: p.color, alpha: p.alpha });

        // night dims the whole scene a little
        this.shade.clear();
        this.shade.rect(0, 0, width, height).fill({ color: 0x000000, alpha: (1 - env.light) * 0.35 });

        this.hitboxes.clear();
        if (snap.showHitboxes) {
            const pl = snap.player;
            this.hitboxes.rect(pl.x, pl.y, pl.width, pl.height).stroke({ color: COLORS.playerHitbox, width: 2 });
            for (const e of snap.entities) this.hitboxes.rect(e.x, e.y, e.width, e.height).stroke({ color: COLORS.hitbox, width: 2 });
        }
    }

    private drawLayer(layer: ParallaxLayer) {
        const g = this.backdrop;
        for (const item of layer.items) {
            switch (layer.name) {
                case 'pagodas':
                    g.rect(item.x + 35, item.y + 40, 80, 80).fill(COLORS.pagoda);
                    g.poly([item.x, item.y + 40, item.x + 75, item.y, item.x + 150, item.y + 40]).fill(COLORS.pagoda);
                    break;
                case 'clouds': {
                    const w = 80 * item.scale; const h = 40 * item.scale;
                    g.ellipse(item.x + (w - 10) / 2, item.y + 10 + (h - 10) / 2, (w - 10) / 2, (h - 10) / 2).fill({ color: COLORS.cloud, alpha: 0.8 });
                    g.ellipse(item.x + w / 2, item.y + (h - 20) / 2, (w - 20) / 2, (h - 20) / 2).fill({ color: COLORS.cloud, alpha: 0.8 });
                    break;
                }
                case 'lanterns':
                    g.roundRect(item.x, item.y, 24, 36, 8).fill(COLORS.lantern);
                    break;
                case 'ground':
                    g.rect(item.x, item.y + 12, 32, 4).fill({ color: 0x000000, alpha: 0.15 });
                    break;
            }
        }
    }

    private drawEntities(entities: readonly EntityView[]) {
        const seen = new Set<number>();
        for (const e of entities) {
            seen.add(e.id);
            const tex = this.textures.get(e.textureKey);
            let view = this.views.get(e.id);
            if (!view) {
                view = tex ? new Sprite(tex) : new Graphics();
                if (view instanceof Sprite) view.anchor.set(0.5);
                this.views.set(e.id, view);
                this.entityLayer.addChild(view);
            }
            if (view instanceof Sprite) {
                if (tex) view.texture = tex;
            } else {
                drawPlaceholder(view, e);
            }
            // views are centred so boulders spin in place
            view.position.set(e.x + e.width / 2, e.y + e.height / 2);
            view.rotation = e.rotation;
        }
        for (const [id, view] of this.views) {
            if (seen.has(id)) continue;
            view.destroy();
            this.views.delete(id);
        }
    }

    private drawPlayer(p: PlayerView) {
        const tex = this.textures.get(p.textureKey);
        if (tex) {
            if (!this.playerSprite) {
                this.playerSprite = new Sprite(tex);
                this.playerLayer.addChild(this.playerSprite);
            }
            this.playerSprite.texture = tex;
            this.playerSprite.position.set(p.x, p.y);
            this.playerSprite.visible = true;
            this.playerGraphic.visible = false;
        } else {
            if (this.playerSprite) this.playerSprite.visible = false;
            this.playerGraphic.visible = true;
            drawSamurai(this.playerGraphic, p);
            this.playerGraphic.position.set(p.x, p.y);
        }
        // dash shimmer
        this.playerLayer.alpha = p.invincible ? 0.6 + 0.4 * Math.abs(Math.sin((p.powerUp?.remaining ?? 0) * 20)) : 1;
        this.playerLayer.tint = p.invincible ? 0x64b4ff : 0xffffff;
    }
}
