import { RandomFn } from "./utils"

/**
 * Mulberry32, a small 32-bit seeded PRNG.
 * Returns a function that generates numbers in [0, 1).
 */
export function createSeededRandom(seed: number): RandomFn {
    let state = seed >>> 0
    return function() {
        let t = state = (state + 0x6D2B79F5) >>> 0
        t = Math.imul(t ^ t >>> 15, t | 1)
        t ^= t + Math.imul(t ^ t >>> 7, t | 61)
        return ((t ^ t >>> 14) >>> 0) / 4294967296
    }
}

// independent sub-seed for the index-th random stream of a run
export function deriveSeed(baseSeed: number, index: number): number {
    let h = baseSeed ^ Math.imul(index, 0x9E3779B9)
    h = Math.imul(h ^ h >>> 16, 0x85EBCA6B)
    h = Math.imul(h ^ h >>> 13, 0xC2B2AE35)
    return (h ^ h >>> 16) >>> 0
}
