/**
 * Seeded generator (Mulberry32). Every component that needs randomness takes one
 * of these as an argument; there is no process-wide generator.
 */
export interface Rng {
    /** Uniform in [0, 1). */
    next(): number;
    /** Uniform integer in [0, maxExclusive). */
    int(maxExclusive: number): number;
}

export function mulberry32(seed: number): Rng {
    let t = seed >>> 0;
    const next = () => {
        t = (t + 0x6d2b79f5) >>> 0;
        let x = Math.imul(t ^ (t >>> 15), 1 | t);
        x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
    return {
        next,
        int: (maxExclusive: number) => Math.floor(next() * maxExclusive),
    };
}

/**
 * Derives an independent 32-bit seed for stream `index` of a parent seed
 * (murmur3 finalizer over the mixed pair).
 */
export function deriveSeed(seed: number, index: number): number {
    let h = (seed >>> 0) ^ Math.imul((index + 1) >>> 0, 0x9e3779b1);
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
    return h >>> 0;
}

export const forkRng = (seed: number, index: number): Rng => mulberry32(deriveSeed(seed, index));

