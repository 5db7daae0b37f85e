// Pick wallpapers for a scheme variant and spread them over displays

import { MATCHING } from '../constants'
import { backgroundOf, schemeTargetColors } from '../scheme/variants'
import { SchemeVariant } from '../types/scheme'
import { Display, WallpaperAssignment, WallpaperRecord } from '../types/wallpaper'
import { createLogger } from '../utils/logger'
import { createRng, pickRandom, Rng } from '../utils/random'
import { rankCandidates } from '../utils/ranking/similarityRanker'
import { RankOptions, RankReport } from '../utils/ranking/types'

const log = createLogger('Matching')

export type CompatibleOptions = Omit<RankOptions<WallpaperRecord>, 'variantType' | 'targetBackground'>

/**
 * Wallpapers suited to the variant's type, ranked by similarity to its background and color1..color6
 */
export function getCompatibleWallpapers(
  wallpapers: readonly WallpaperRecord[],
  variant: SchemeVariant,
  options: CompatibleOptions = {}
): RankReport<WallpaperRecord> {
  const targetColors = schemeTargetColors(variant)
  log.info(`Scheme colors: ${targetColors.join(' ')}`)
  return rankCandidates(wallpapers, targetColors, {
    ...options,
    variantType: variant.type,
    targetBackground: backgroundOf(variant),
  })
}

export interface AssignOptions {
  /** Draw from the best-ranked share instead of always taking the top wallpaper */
  random?: boolean
  filterThreshold?: number
  rng?: Rng
  /** Resolves a wallpaper to the file handed to the setter */
  pathOf: (wallpaper: WallpaperRecord) => string
}

/**
 * One wallpaper per display, from those at least as large as the display.
 * `wallpapers` is expected best-first. Displays without a fitting wallpaper are left out.
 */
export function assignWallpapers(
  wallpapers: readonly WallpaperRecord[],
  displays: readonly Display[],
  options: AssignOptions
): WallpaperAssignment[] {
  const rng = options.rng ?? createRng()
  const threshold = options.filterThreshold ?? MATCHING.DEFAULT_FILTER_THRESHOLD
  const result: WallpaperAssignment[] = []

  for (const display of displays) {
    const candidates = wallpapers.filter(w =>
      w.resolution.width >= display.width && w.resolution.height >= display.height
    )

    const selected = options.random
      ? pickRandom(candidates.slice(0, Math.max(1, Math.floor(candidates.length * threshold))), rng)
      : candidates[0]

    if (selected) {
      result.push({ display: display.identifier, wallpaper: options.pathOf(selected) })
    } else {
      log.warn(`No suitable wallpaper found for display ${display.identifier} (${display.width}x${display.height})`)
    }
  }

  return result
}
