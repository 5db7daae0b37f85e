// Two-stage wallpaper ranking: filter by type and background, then score by color similarity

import { InvalidColorError, InvalidInputError, MissingColorDataError } from '../errors'
import { createLogger } from '../logger'
import { normalizeHex } from '../colorDistance/colorConversion'
import { perceptualDistance, similarity } from '../colorDistance/distanceMetrics'
import { selectDiverse } from '../colorDistance/paletteOperations'
import { Color } from '../colorDistance/types'
import { RankCandidate, RankOptions, RankReport, RankedCandidate, VariantType } from './types'

const log = createLogger('Rank')

export const DEFAULT_DIVERSE_COUNT = 4
export const DEFAULT_BACKGROUND_THRESHOLD = 20.0
export const DEFAULT_BACKGROUND_WEIGHT = 0.6

export function matchesVariantType(candidate: RankCandidate, variantType: VariantType): boolean {
  return candidate.type === variantType || candidate.type === 'both'
}

/**
 * Mean over `colors` of each color's best similarity against any of `targets`
 */
export function averageBestSimilarity(colors: readonly Color[], targets: readonly Color[]): number {
  if (colors.length === 0 || targets.length === 0) return 0
  let total = 0
  for (const color of colors) {
    let best = 0
    for (const target of targets) {
      best = Math.max(best, similarity(perceptualDistance(color, target)))
    }
    total += best
  }
  return total / colors.length
}

function defaultBackgroundOf(candidate: RankCandidate): Color | undefined {
  return candidate.colors?.[0]
}

function validateFraction(keepFraction: number | undefined) {
  if (keepFraction === undefined) return
  if (!(keepFraction > 0 && keepFraction <= 1)) {
    throw new InvalidInputError(`keepFraction must be in (0, 1], got ${keepFraction}`)
  }
}

/**
 * Number of results kept for a fraction: ceil(n * p), never below one unless n is zero
 */
export function keepCount(total: number, keepFraction: number): number {
  if (total === 0) return 0
  return Math.max(1, Math.ceil(total * keepFraction))
}

/**
 * Rank candidates against target colors, best match first, with a report of
 * what was filtered or skipped. Ties keep input order.
 */
export function rankCandidates<T extends RankCandidate>(
  candidates: readonly T[],
  targetColors: readonly Color[],
  options: RankOptions<T> = {}
): RankReport<T> {
  validateFraction(options.keepFraction)

  const report: RankReport<T> = { ranked: [], skipped: [], typeFiltered: 0, backgroundFiltered: 0 }

  const { variantType } = options
  const typed = variantType
    ? candidates.filter(c => matchesVariantType(c, variantType))
    : [...candidates]
  report.typeFiltered = candidates.length - typed.length
  log.info(`Candidates after type filtering: ${typed.length} of ${candidates.length}`)

  if (typed.length === 0) return report

  if (targetColors.length === 0) {
    throw new InvalidInputError('At least one target color is required')
  }
  const targets = targetColors.map(normalizeHex)
  const targetBackground = normalizeHex(options.targetBackground ?? targets[0])
  const diverseCount = options.diverseCount ?? DEFAULT_DIVERSE_COUNT
  const threshold = options.backgroundThreshold ?? DEFAULT_BACKGROUND_THRESHOLD
  const weight = options.backgroundWeight ?? DEFAULT_BACKGROUND_WEIGHT
  const backgroundOf = options.backgroundOf ?? defaultBackgroundOf
  const targetAccents = targets.filter(c => c !== targetBackground)

  const scored: RankedCandidate<T>[] = []
  for (const candidate of typed) {
    try {
      if (!candidate.colors || candidate.colors.length === 0) {
        throw new MissingColorDataError('Candidate')
      }

      const background = backgroundOf(candidate)
      const needsBackground = options.backgroundFilter || options.backgroundWeighting
      if (needsBackground && !background) {
        throw new MissingColorDataError('Candidate background')
      }

      if (options.backgroundFilter && background) {
        const bgDistance = perceptualDistance(background, targetBackground)
        if (bgDistance > threshold) {
          log.debug(`Background ${background} is ${bgDistance.toFixed(2)} from ${targetBackground}, rejected`)
          report.backgroundFiltered++
          continue
        }
      }

      const diverse = selectDiverse(candidate.colors.map(normalizeHex), diverseCount)
      let score: number
      if (options.backgroundWeighting && background) {
        const candidateBackground = normalizeHex(background)
        const bgSimilarity = similarity(perceptualDistance(candidateBackground, targetBackground))
        const accents = diverse.filter(c => c !== candidateBackground)
        const accentSimilarity = accents.length > 0
          ? averageBestSimilarity(accents, targetAccents.length > 0 ? targetAccents : targets)
          : bgSimilarity
        score = weight * bgSimilarity + (1 - weight) * accentSimilarity
      } else {
        score = averageBestSimilarity(diverse, targets)
      }

      log.debug(`Colors ${diverse.join(', ')} scored ${score.toFixed(4)}`)
      scored.push({ item: candidate, score })
    } catch (err) {
      if (err instanceof MissingColorDataError) {
        log.warn('Candidate has no colors, skipping')
        report.skipped.push({ item: candidate, reason: 'missing-colors' })
      } else if (err instanceof InvalidColorError) {
        log.warn(`Candidate has an invalid color ${err.value}, skipping`)
        report.skipped.push({ item: candidate, reason: 'invalid-color' })
      } else {
        throw err
      }
    }
  }

  // Array.prototype.sort is stable, equal scores keep input order
  scored.sort((a, b) => b.score - a.score)

  report.ranked = options.keepFraction === undefined
    ? scored
    : scored.slice(0, keepCount(scored.length, options.keepFraction))
  log.info(`Ranked ${scored.length} candidates, returning ${report.ranked.length}`)
  return report
}

/**
 * Ranked candidates only, best match first
 */
export function rank<T extends RankCandidate>(
  candidates: readonly T[],
  targetColors: readonly Color[],
  options: RankOptions<T> = {}
): T[] {
  return rankCandidates(candidates, targetColors, options).ranked.map(r => r.item)
}
