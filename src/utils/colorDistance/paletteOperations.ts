// Palette operations - diverse subsets and display ordering

import { hexToHsl, hexToLab } from './colorConversion'
import { deltaE2000 } from './distanceMetrics'
import { InvalidInputError } from '../errors'
import { Color } from './types'

/**
 * Greedy farthest-point selection of the n most mutually distinct colors.
 *
 * Starts from the first color, then repeatedly adds the color whose nearest
 * selected neighbour is farthest away (CIEDE2000). Earlier colors win ties.
 * Input of length <= n comes back unchanged. n must be a non-negative integer.
 */
export function selectDiverse(colors: readonly Color[], n: number): Color[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidInputError(`Selection size must be a non-negative integer, got ${n}`)
  }
  if (colors.length <= n) return [...colors]
  if (n === 0) return []

  const labs = colors.map(c => hexToLab(c))
  const selected = [0]
  // Distance from each color to its nearest selected color
  const nearest = labs.map(lab => deltaE2000(lab, labs[0]))
  const taken = colors.map((_, i) => i === 0)

  while (selected.length < n) {
    let bestIdx = -1
    let bestDist = -Infinity
    for (let i = 0; i < colors.length; i++) {
      if (taken[i]) continue
      if (nearest[i] > bestDist) {
        bestDist = nearest[i]
        bestIdx = i
      }
    }

    selected.push(bestIdx)
    taken[bestIdx] = true
    for (let i = 0; i < colors.length; i++) {
      if (taken[i]) continue
      nearest[i] = Math.min(nearest[i], deltaE2000(labs[i], labs[bestIdx]))
    }
  }

  return selected.map(i => colors[i])
}

/**
 * Order colors by hue, then lightness. Near-grays (saturation < 0.1) go first, dark to light.
 */
export function sortColors(colors: readonly Color[]): Color[] {
  const withHsl = colors.map(hex => ({ hex, ...hexToHsl(hex) }))
  return withHsl
    .sort((a, b) => {
      const aGray = a.s < 0.1
      const bGray = b.s < 0.1
      if (aGray !== bGray) return aGray ? -1 : 1
      if (aGray) return a.l - b.l
      return (a.h - b.h) || (a.l - b.l)
    })
    .map(c => c.hex)
}
