/**
 * Application-wide constants
 * Centralizes magic numbers and configuration values for easier maintenance
 */

// ============================================================================
// Analysis
// ============================================================================

export const ANALYSIS = {
  /** Colors extracted per wallpaper */
  WALLPAPER_PALETTE_SIZE: 6,
  /** Colors extracted by `colorweave palette` unless -k is given */
  DEFAULT_PALETTE_SIZE: 4,
  /** Width/height difference, relative to the short side, still treated as square */
  SQUARE_TOLERANCE: 0.05,
} as const

// ============================================================================
// Matching
// ============================================================================

export const MATCHING = {
  /** Minimum name similarity (0-1) for fuzzy wallpaper lookup */
  FUZZY_THRESHOLD: 0.7,
  /** Share of the ranked list a random wallpaper is drawn from */
  DEFAULT_FILTER_THRESHOLD: 0.2,
  /** Scheme slots compared against wallpapers besides the background */
  ACCENT_SLOTS: ['color1', 'color2', 'color3', 'color4', 'color5', 'color6'],
} as const

// ============================================================================
// Display
// ============================================================================

export const DISPLAY = {
  /** Wallpapers listed next to a scheme variant */
  MAX_WALLPAPER_ROWS: 8,
  /** Swatches shown per wallpaper */
  SWATCH_COUNT: 4,
  /** Characters of an id shown in listings */
  SHORT_ID_LENGTH: 6,
  MAX_NAME_LENGTH: 20,
} as const
