export type Rng = () => number;

// Mulberry32 PRNG for deterministic spawning
export function randomRng(seed: number): Rng {
    let s = seed >>> 0;
    return function () {
        s += 0x6D2B79F5;
        let t = Math.imul(s ^ (s >>> 15), 1 | s);
        t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function randRange(rng: Rng, min: number, max: number): number {
    return min + rng() * (max - min);
}

export function randInt(rng: Rng, min: number, max: number): number {
    return min + Math.floor(rng() * (max - min + 1));
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
    if (!items.length) throw new Error('pick() on empty list');
    return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}

// Weighted choice over [key, weight] entries; zero-weight keys are never returned.
export type WeightTable<K> = readonly (readonly [K, number])[];

export function weightedPick<K>(rng: Rng, table: WeightTable<K>): K {
    let total = 0;
    for (const [, w] of table) total += Math.max(0, w);
    if (total <= 0) throw new Error('weightedPick() needs a positive total weight');
    let roll = rng() * total;
    let last: K | undefined;
    for (const [key, weight] of table) {
        const w = Math.max(0, weight);
        if (w === 0) continue;
        if (roll < w) return key;
        roll -= w;
        last = key;
    }
    // float drift past the end lands on the last weighted key
    if (last === undefined) throw new Error('weightedPick() found no weighted entry');
    return last;
}
