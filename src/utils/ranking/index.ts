export type {
  VariantType,
  CandidateType,
  RankCandidate,
  RankOptions,
  RankedCandidate,
  SkipReason,
  SkippedCandidate,
  RankReport,
} from './types'

export {
  DEFAULT_DIVERSE_COUNT,
  DEFAULT_BACKGROUND_THRESHOLD,
  DEFAULT_BACKGROUND_WEIGHT,
  matchesVariantType,
  averageBestSimilarity,
  keepCount,
  rankCandidates,
  rank,
} from './similarityRanker'
