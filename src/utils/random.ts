// Seedable random source for cluster seeding and wallpaper picks

export type Rng = () => number

/**
 * Park-Miller minimal standard generator. Returns values in [0, 1).
 * String seeds are hashed; a missing seed falls back to the clock.
 */
export function createRng(seed?: string | number): Rng {
  let state = (() => {
    if (seed === undefined) return Date.now() % 2147483647 || 1
    if (typeof seed === 'number') return Math.abs(Math.trunc(seed)) % 2147483647 || 1
    let hash = 0
    for (let i = 0; i < seed.length; i++) {
      hash = (hash * 31 + seed.charCodeAt(i)) | 0
    }
    return Math.abs(hash) % 2147483647 || 1
  })()

  return () => {
    state = (state * 48271) % 2147483647
    return (state - 1) / 2147483647
  }
}

/**
 * Integer in [0, max)
 */
export function randomIndex(rng: Rng, max: number): number {
  return Math.min(max - 1, Math.floor(rng() * max))
}

/**
 * Pick `count` distinct items by a partial Fisher-Yates shuffle over a copy
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, rng: Rng): T[] {
  const pool = [...items]
  const picked: T[] = []
  for (let i = 0; i < count && i < pool.length; i++) {
    const j = i + randomIndex(rng, pool.length - i)
    const tmp = pool[i]
    pool[i] = pool[j]
    pool[j] = tmp
    picked.push(pool[i])
  }
  return picked
}

export function pickRandom<T>(items: readonly T[], rng: Rng): T | undefined {
  if (items.length === 0) return undefined
  return items[randomIndex(rng, items.length)]
}
