import { Color } from '../utils/colorDistance/types'
import { VariantType } from '../utils/ranking/types'

/**
 * One variant of a color scheme, e.g. "mocha" of catppuccin.
 * Slots are base16-style names: background, foreground, cursor, color0..color15
 */
export interface SchemeVariant {
  name: string
  type: VariantType
  colors: Record<string, Color>
}

export interface Scheme {
  name: string
  variants: Record<string, SchemeVariant>
}

/**
 * Slot mapping written by scheme analysis
 */
export interface ColorProfile {
  analysisType: 'base16'
  mapping: Record<'background' | 'foreground' | 'accent1' | 'accent2', string>
  variants: Record<string, Record<'background' | 'foreground' | 'accent1' | 'accent2', Color | null>>
}
