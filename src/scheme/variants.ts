// Scheme variant helpers

import { MATCHING } from '../constants'
import { Scheme, SchemeVariant, ColorProfile } from '../types/scheme'
import { brightness } from '../utils/colorDistance/colorConversion'
import { Color } from '../utils/colorDistance/types'
import { InvalidInputError } from '../utils/errors'
import { VariantType } from '../utils/ranking/types'

export function backgroundOf(variant: SchemeVariant): Color | undefined {
  return variant.colors.background ?? variant.colors.color0
}

export function foregroundOf(variant: SchemeVariant): Color | undefined {
  return variant.colors.foreground ?? variant.colors.color7
}

/**
 * Colors a wallpaper is ranked against: the background followed by color1..color6
 */
export function schemeTargetColors(variant: SchemeVariant): Color[] {
  const colors: Color[] = []
  const background = backgroundOf(variant)
  if (background) colors.push(background)
  for (const slot of MATCHING.ACCENT_SLOTS) {
    const color = variant.colors[slot]
    if (color) colors.push(color)
  }
  return colors
}

/**
 * Split "scheme:variant" into its parts
 */
export function parseSchemeIdentifier(identifier: string): { schemeName: string; variant?: string } {
  const [schemeName, variant] = identifier.split(':')
  return variant ? { schemeName, variant } : { schemeName }
}

export function isVariantType(value: unknown): value is VariantType {
  return value === 'dark' || value === 'light'
}

/**
 * Variants picked by name, or every variant of a type for "dark"/"light", or all of them
 */
export function selectVariants(scheme: Scheme, identifier?: string): SchemeVariant[] {
  const all = Object.values(scheme.variants)
  if (!identifier) return all

  const named = scheme.variants[identifier]
  if (named) return [named]
  if (isVariantType(identifier)) return all.filter(v => v.type === identifier)

  throw new InvalidInputError(`Variant '${identifier}' not found in scheme '${scheme.name}'`)
}

/**
 * Variants ordered dark to light by background brightness
 */
export function sortVariantsByBrightness(variants: readonly SchemeVariant[]): SchemeVariant[] {
  const keyed = variants.map(variant => {
    const background = backgroundOf(variant)
    return { variant, level: background ? brightness(background) : 0 }
  })
  return keyed.sort((a, b) => a.level - b.level).map(k => k.variant)
}

const BASE16_MAPPING = {
  background: 'color0',
  foreground: 'color7',
  accent1: 'color1',
  accent2: 'color4',
} as const

export function createColorProfile(scheme: Scheme): ColorProfile {
  const variants: ColorProfile['variants'] = {}
  for (const [name, variant] of Object.entries(scheme.variants)) {
    variants[name] = {
      background: variant.colors[BASE16_MAPPING.background] ?? null,
      foreground: variant.colors[BASE16_MAPPING.foreground] ?? null,
      accent1: variant.colors[BASE16_MAPPING.accent1] ?? null,
      accent2: variant.colors[BASE16_MAPPING.accent2] ?? null,
    }
  }
  return { analysisType: 'base16', mapping: { ...BASE16_MAPPING }, variants }
}
