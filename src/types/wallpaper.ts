import { Color } from '../utils/colorDistance/types'
import { CandidateType } from '../utils/ranking/types'

export type Orientation = 'landscape' | 'portrait' | 'both'

export type NameSource = 'filename' | 'manual'

export interface Resolution {
  width: number
  height: number
}

/**
 * Metadata stored next to each imported wallpaper as <id>.json
 */
export interface WallpaperRecord {
  id: string
  name: string
  type: CandidateType
  nameSource: NameSource
  resolution: Resolution
  orientation: Orientation
  filesize: number
  /** Includes the dot, e.g. ".png" */
  extension: string
  /** SHA-256 of the file contents */
  hash: string
  /** Dominant colors, present once analyzed */
  colors?: Color[]
}

export interface Display {
  identifier: string
  width: number
  height: number
}

export interface WallpaperAssignment {
  display: string
  wallpaper: string
}
