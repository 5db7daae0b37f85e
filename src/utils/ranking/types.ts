// Ranking types

import { Color } from '../colorDistance/types'

export type VariantType = 'dark' | 'light'

export type CandidateType = VariantType | 'both'

/**
 * Anything rankable: a type tag and the palette extracted for it
 */
export interface RankCandidate {
  type: CandidateType
  colors?: Color[]
}

export interface RankOptions<T extends RankCandidate = RankCandidate> {
  /** Drop candidates tagged for the other variant type */
  variantType?: VariantType
  /** Keep the top ceil(n * keepFraction) results, at least one. Must be in (0, 1] */
  keepFraction?: number
  /** Colors taken from each candidate's palette before scoring */
  diverseCount?: number
  /** Target background; defaults to the first target color */
  targetBackground?: Color
  /** Reject candidates whose background is farther than backgroundThreshold from the target's */
  backgroundFilter?: boolean
  backgroundThreshold?: number
  /** Score as backgroundWeight * bgSimilarity + (1 - backgroundWeight) * accentSimilarity */
  backgroundWeighting?: boolean
  backgroundWeight?: number
  /** Background of a candidate; defaults to its first palette color */
  backgroundOf?: (candidate: T) => Color | undefined
}

export interface RankedCandidate<T> {
  item: T
  score: number
}

export type SkipReason = 'missing-colors' | 'invalid-color'

export interface SkippedCandidate<T> {
  item: T
  reason: SkipReason
}

export interface RankReport<T> {
  ranked: RankedCandidate<T>[]
  /** Candidates left out for lack of usable color data */
  skipped: SkippedCandidate<T>[]
  /** Removed by the type filter */
  typeFiltered: number
  /** Removed by the background pre-filter */
  backgroundFiltered: number
}
