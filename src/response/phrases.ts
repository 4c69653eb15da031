export type RandomSource = () => number

/** Small seedable PRNG (mulberry32); returns floats in [0, 1). */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Picks response variants without hidden randomness. With no random source
 * it walks the list in order and wraps around.
 */
export class PhraseSelector {
  private random: RandomSource | null
  private position = 0

  constructor(random?: RandomSource) {
    this.random = random || null
  }

  pick(options: readonly string[]): string {
    if (options.length === 0) {
      throw new Error('Cannot pick from an empty phrase list')
    }

    if (this.random) {
      const index = Math.min(options.length - 1, Math.floor(this.random() * options.length))
      return options[index]
    }

    const phrase = options[this.position % options.length]
    this.position++
    return phrase
  }

  reset(): void {
    this.position = 0
  }
}
