// Random sources for the simulation.
// Everything random in a match goes through one injected RandomSource so a match
// can be replayed from a seed, or driven draw-by-draw from a script in tests.

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number

export const systemRandom: RandomSource = () => Math.random()

/**
 * Deterministic source from a 32-bit seed (mulberry32).
 * Two sources built from the same seed produce the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let t = seed >>> 0
  return () => {
    t = (t + 0x6d2b79f5) >>> 0
    let r = t
    r = Math.imul(r ^ (r >>> 15), r | 1)
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61)
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Replays the given draws in order.
 * @throws Error when more draws are requested than were scripted
 */
export function scriptedRandom(draws: readonly number[]): RandomSource {
  let index = 0
  return () => {
    if (index >= draws.length) {
      throw new Error(`Scripted random source exhausted after ${draws.length} draws`)
    }
    const value = draws[index]
    index++
    return value
  }
}

/**
 * Pick a bucket index from cumulative probabilities using a single draw.
 * The last bucket catches anything at or above the final threshold.
 */
export function pickWeighted(cumulative: readonly number[], random: RandomSource): number {
  const roll = random()
  for (let i = 0; i < cumulative.length - 1; i++) {
    if (roll < cumulative[i]) return i
  }
  return cumulative.length - 1
}

// Uniform integer in [min, max]
export function randomInt(min: number, max: number, random: RandomSource): number {
  if (max < min) return min
  return Math.min(max, min + Math.floor(random() * (max - min + 1)))
}

export function chance(probability: number, random: RandomSource): boolean {
  return random() < probability
}
