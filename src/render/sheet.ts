import { Rectangle, Texture } from 'pixi.js';

// Slice a grid spritesheet into uniform cells, row by row.
export function sliceGrid(texture: Texture, cols: number, rows: number): Texture[] {
    const fw = Math.floor(texture.width / cols); const fh = Math.floor(texture.height / rows);
    const list: Texture[] = [];
    for (let ry = 0; ry < rows; ry++) {
        for (let cx = 0; cx < cols; cx++) {
            list.push(new Texture({ source: texture.source, frame: new Rectangle(cx * fw, ry * fh, fw, fh) }));
        }
    }
    return list;
}
