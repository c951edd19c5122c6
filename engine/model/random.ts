/**
 * Seeded pseudo-random numbers (mulberry32).
 *
 * Same seed → same sequence on every platform, which the synthetic training
 * set and the forest's bootstrap sampling both depend on.
 */

export type Random = () => number;

/**
 * Uniform floats in [0, 1).
 */
export function createRandom(seed: number): Random {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Uniform integer in [min, max).
 */
export function randomInt(random: Random, min: number, max: number): number {
    return min + Math.floor(random() * (max - min));
}

/**
 * First `count` entries of a seeded Fisher–Yates shuffle of 0..n-1.
 */
export function sampleIndices(random: Random, n: number, count: number): number[] {
    const pool = Array.from({ length: n }, (_, i) => i);
    const take = Math.min(count, n);
    for (let i = 0; i < take; i++) {
        const j = randomInt(random, i, n);
        const tmp = pool[i];
        pool[i] = pool[j];
        pool[j] = tmp;
    }
    return pool.slice(0, take);
}
