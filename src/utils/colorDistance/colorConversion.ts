// Color conversion utilities - RGB, YUV, LAB, XYZ, Hex

import { InvalidColorError } from '../errors'
import { Color, RGBTuple, YUVTuple, LABTuple, XYZTuple } from './types'

const HEX_PATTERN = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i

/**
 * Parse #rgb or #rrggbb into an RGB tuple
 * Throws InvalidColorError for anything else
 */
export function hexToRgb(color: string): RGBTuple {
  const match = HEX_PATTERN.exec(color.trim())
  if (!match) {
    throw new InvalidColorError(color)
  }

  let h = match[1]
  if (h.length === 3) {
    h = h[0] + h[0] + h[1] + h[1] + h[2] + h[2]
  }
  const num = parseInt(h, 16)
  return [(num >> 16) & 255, (num >> 8) & 255, num & 255]
}

export function isColor(value: unknown): value is Color {
  return typeof value === 'string' && HEX_PATTERN.test(value.trim())
}

/**
 * Canonical lowercase #rrggbb form of a color
 */
export function normalizeHex(color: string): Color {
  const [r, g, b] = hexToRgb(color)
  return rgbToHex(r, g, b)
}

/**
 * Convert RGB to hex string
 * Channels are rounded and clamped to 0-255
 */
export function rgbToHex(r: number, g: number, b: number): Color {
  return '#' + [r, g, b].map(x => {
    const hex = Math.round(Math.max(0, Math.min(255, x))).toString(16)
    return hex.length === 1 ? '0' + hex : hex
  }).join('')
}

/**
 * RGB (0-255) to YUV using BT.601 coefficients
 */
export function rgbToYuv(r: number, g: number, b: number): YUVTuple {
  const y = 0.299 * r + 0.587 * g + 0.114 * b
  const u = -0.14713 * r - 0.28886 * g + 0.436 * b
  const v = 0.615 * r - 0.51499 * g - 0.10001 * b
  return [y, u, v]
}

/**
 * YUV back to hex. Channels are truncated, not rounded, then clamped.
 */
export function yuvToHex(y: number, u: number, v: number): Color {
  const r = y + 1.13983 * v
  const g = y - 0.39465 * u - 0.58060 * v
  const b = y + 2.03211 * u
  return rgbToHex(truncateChannel(r), truncateChannel(g), truncateChannel(b))
}

function truncateChannel(value: number): number {
  return Math.max(0, Math.min(255, Math.trunc(value)))
}

export function hexToYuv(color: string): YUVTuple {
  const [r, g, b] = hexToRgb(color)
  return rgbToYuv(r, g, b)
}

/**
 * Convert RGB to XYZ color space (intermediate for LAB)
 */
export function rgbToXyz(r: number, g: number, b: number): XYZTuple {
  // Normalize RGB to 0-1 and apply gamma correction
  let rr = r / 255
  let gg = g / 255
  let bb = b / 255

  rr = rr > 0.04045 ? Math.pow((rr + 0.055) / 1.055, 2.4) : rr / 12.92
  gg = gg > 0.04045 ? Math.pow((gg + 0.055) / 1.055, 2.4) : gg / 12.92
  bb = bb > 0.04045 ? Math.pow((bb + 0.055) / 1.055, 2.4) : bb / 12.92

  rr *= 100
  gg *= 100
  bb *= 100

  // sRGB matrix
  const x = rr * 0.4124564 + gg * 0.3575761 + bb * 0.1804375
  const y = rr * 0.2126729 + gg * 0.7151522 + bb * 0.0721750
  const z = rr * 0.0193339 + gg * 0.1191920 + bb * 0.9503041

  return [x, y, z]
}

/**
 * Convert XYZ to LAB color space
 */
export function xyzToLab(x: number, y: number, z: number): LABTuple {
  // Reference white D65
  const refX = 95.047
  const refY = 100.000
  const refZ = 108.883

  let xx = x / refX
  let yy = y / refY
  let zz = z / refZ

  const epsilon = 0.008856
  const kappa = 903.3

  xx = xx > epsilon ? Math.pow(xx, 1/3) : (kappa * xx + 16) / 116
  yy = yy > epsilon ? Math.pow(yy, 1/3) : (kappa * yy + 16) / 116
  zz = zz > epsilon ? Math.pow(zz, 1/3) : (kappa * zz + 16) / 116

  const L = 116 * yy - 16
  const a = 500 * (xx - yy)
  const b = 200 * (yy - zz)

  return [L, a, b]
}

export function rgbToLab(r: number, g: number, b: number): LABTuple {
  const [x, y, z] = rgbToXyz(r, g, b)
  return xyzToLab(x, y, z)
}

export function hexToLab(color: string): LABTuple {
  const [r, g, b] = hexToRgb(color)
  return rgbToLab(r, g, b)
}

/**
 * Hue (degrees), saturation and lightness (0-1), for display ordering
 */
export function hexToHsl(color: string): { h: number; s: number; l: number } {
  const [r8, g8, b8] = hexToRgb(color)
  const r = r8 / 255
  const g = g8 / 255
  const b = b8 / 255
  const max = Math.max(r, g, b)
  const min = Math.min(r, g, b)
  let h = 0
  let s = 0
  const l = (max + min) / 2

  if (max !== min) {
    const d = max - min
    s = l > 0.5 ? d / (2 - max - min) : d / (max + min)
    switch (max) {
      case r: h = (g - b) / d + (g < b ? 6 : 0); break
      case g: h = (b - r) / d + 2; break
      default: h = (r - g) / d + 4; break
    }
    h /= 6
  }

  return { h: h * 360, s, l }
}

/**
 * Perceived brightness 0-1 from BT.601 luma
 */
export function brightness(color: string): number {
  const [y] = hexToYuv(color)
  return y / 255
}
