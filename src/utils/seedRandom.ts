// Mulberry32 - simple seeded PRNG
export class SeededRandom {
  private state: number
  readonly seed: number

  constructor(seed: number = randomSeed()) {
    this.seed = seed >>> 0
    this.state = this.seed
  }

  // Returns a random number between 0 and 1
  next(): number {
    this.state |= 0
    this.state = (this.state + 0x6d2b79f5) | 0
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  // Returns a random integer between min (inclusive) and max (exclusive)
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min
  }

  // Returns a random element from a non-empty array
  pick<T>(arr: readonly T[]): T {
    if (arr.length === 0) throw new RangeError('Cannot pick from an empty array')
    return arr[this.nextInt(0, arr.length)]
  }

  // Weighted random selection; a zero-weight item is never returned while another has weight
  weightedPick<T>(items: readonly T[], weights: readonly number[]): T {
    if (items.length === 0) throw new RangeError('Cannot pick from an empty array')
    const totalWeight = weights.reduce((a, b) => a + b, 0)
    let random = this.next() * totalWeight
    for (let i = 0; i < items.length; i++) {
      random -= weights[i]
      if (random < 0) return items[i]
    }
    return items[items.length - 1]
  }
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0
}
