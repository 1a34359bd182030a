/**
 * Seeded PRNG (mulberry32) returning floats in [0, 1).
 * Seeds wider than 32 bits are folded so their high bits still count.
 */
export function createRandom(seed: number): () => number {
  const low = seed >>> 0
  const high = Math.floor(seed / 0x1_00_00_00_00)
  let state = (low ^ Math.imul(high, 0x9E_37_79_B1)) >>> 0

  return () => {
    state = (state + 0x6D_2B_79_F5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 0x1_00_00_00_00
  }
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const swap = result[i]
    result[i] = result[j]
    result[j] = swap
  }

  return result
}

export function permutation(size: number, seed: number): number[] {
  const indexes = Array.from({ length: size }, (_, index) => index)
  return shuffle(indexes, createRandom(seed))
}
