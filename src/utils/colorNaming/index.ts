// Nearest CSS color names for palette colors

import { hexToLab, isColor, normalizeHex } from '../colorDistance/colorConversion'
import { deltaE2000 } from '../colorDistance/distanceMetrics'
import { Color, LABTuple } from '../colorDistance/types'
import cssColors from './cssColors.json'

export interface NamedColor {
  name: string
  hex: Color
}

interface NamedLab extends NamedColor {
  lab: LABTuple
}

export const CSS_COLORS: readonly NamedColor[] = cssColors

// Aliases share a hex value; the first name in table order is kept
const exactNames = new Map<Color, string>()
for (const { name, hex } of CSS_COLORS) {
  if (!exactNames.has(hex)) exactNames.set(hex, name)
}

let labTable: NamedLab[] | null = null

function getLabTable(): NamedLab[] {
  if (!labTable) {
    labTable = CSS_COLORS.map(c => ({ ...c, lab: hexToLab(c.hex) }))
  }
  return labTable
}

/**
 * Name of the CSS color closest to `color` by CIEDE2000.
 * Exact matches short-circuit; the first table entry wins ties.
 */
export function nearestColorName(color: Color): string {
  const hex = normalizeHex(color)
  const exact = exactNames.get(hex)
  if (exact) return exact

  const lab = hexToLab(hex)
  let best = ''
  let bestDist = Infinity
  for (const entry of getLabTable()) {
    const dist = deltaE2000(lab, entry.lab)
    if (dist < bestDist) {
      bestDist = dist
      best = entry.name
    }
  }
  return best
}

/**
 * One name per input color, in order; null where the input is not a valid color
 */
export function estimateNames(colors: readonly string[]): (string | null)[] {
  return colors.map(c => (isColor(c) ? nearestColorName(c) : null))
}
