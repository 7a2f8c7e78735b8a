// Seedable pseudo-random sources.
// Layout and gameplay each get their own generator so that drawing launch
// angles can never shift where the reinforced and bonus targets land.

/** Returns a float in [0, 1) */
export type Rng = () => number

/**
 * mulberry32 generator. Same seed, same sequence.
 */
export function createRng(seed: number): Rng {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

// Integer in [0, n)
export function randomInt(rng: Rng, n: number): number {
  return Math.min(n - 1, Math.floor(rng() * n))
}

export function randomSign(rng: Rng): -1 | 1 {
  return rng() < 0.5 ? -1 : 1
}

// Wall-clock seed for gameplay generators when the host does not inject one.
export function timeSeed(): number {
  return Date.now() >>> 0
}
