// Plain-text rendering with 24-bit ANSI color swatches

import fontColorContrast from 'font-color-contrast'
import { DISPLAY } from '../constants'
import { SchemeVariant } from '../types/scheme'
import { WallpaperRecord } from '../types/wallpaper'
import { hexToRgb, isColor } from '../utils/colorDistance/colorConversion'
import { selectDiverse, sortColors } from '../utils/colorDistance/paletteOperations'
import { Color } from '../utils/colorDistance/types'

const RESET = '\x1b[0m'
const SWATCH = '■'

function fg(color: Color): string {
  const [r, g, b] = hexToRgb(color)
  return `\x1b[38;2;${r};${g};${b}m`
}

function bg(color: Color): string {
  const [r, g, b] = hexToRgb(color)
  return `\x1b[48;2;${r};${g};${b}m`
}

export function swatch(color: Color): string {
  return `${fg(color)}${SWATCH}${RESET}`
}

export function swatches(colors: readonly Color[]): string {
  return colors.map(swatch).join(' ')
}

/**
 * Text on a colored background, black or white depending on the background
 */
export function label(text: string, background: Color): string {
  return `${bg(background)}${fg(fontColorContrast(background))} ${text} ${RESET}`
}

/**
 * Swatch followed by the hex digits, e.g. "■ 1e1e2e"
 */
export function colorEntry(color: Color, name?: string | null): string {
  const text = `${swatch(color)} ${color.slice(1)}`
  return name ? `${text} ${name}` : text
}

function formatRows(rows: string[][]): string[] {
  const widths: number[] = []
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length)
    })
  }
  // The last column may carry escape codes and is never padded
  return rows.map(row => row.map((cell, i) => (i < row.length - 1 ? cell.padEnd(widths[i]) : cell)).join('  '))
}

export function renderVariant(variant: SchemeVariant, showTitle = true): string {
  const lines: string[] = []
  if (showTitle) lines.push(`${variant.name} (${variant.type})`)
  const rows = Object.entries(variant.colors).map(([slot, color]) => [slot, colorEntry(color)])
  lines.push(...formatRows(rows))
  return lines.join('\n')
}

/**
 * The wallpaper's most distinct colors, ordered for display
 */
export function displayColors(wallpaper: WallpaperRecord): Color[] {
  if (!wallpaper.colors) return []
  const sorted = sortColors(selectDiverse(wallpaper.colors.filter(isColor), DISPLAY.SWATCH_COUNT))
  return wallpaper.type === 'light' ? sorted.reverse() : sorted
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(2)} MB`
}

export function renderWallpaperTable(wallpapers: readonly WallpaperRecord[], title?: string): string {
  const rows = [['ID', 'Name', 'Type', 'Colors']]
  for (const wallpaper of wallpapers.slice(0, DISPLAY.MAX_WALLPAPER_ROWS)) {
    rows.push([
      wallpaper.id.slice(0, DISPLAY.SHORT_ID_LENGTH),
      wallpaper.name.slice(0, DISPLAY.MAX_NAME_LENGTH),
      wallpaper.type,
      wallpaper.colors ? swatches(displayColors(wallpaper)) : 'N/A',
    ])
  }
  const lines = formatRows(rows)
  return title ? [title, ...lines].join('\n') : lines.join('\n')
}

export function renderWallpaperList(wallpapers: readonly WallpaperRecord[]): string {
  const rows = [['id', 'name', 'type', 'resolution', 'orientation', 'filesize', 'colors']]
  for (const wallpaper of wallpapers) {
    rows.push([
      wallpaper.id.slice(0, DISPLAY.SHORT_ID_LENGTH),
      wallpaper.name.slice(0, DISPLAY.MAX_NAME_LENGTH),
      wallpaper.type,
      `${wallpaper.resolution.width}x${wallpaper.resolution.height}`,
      wallpaper.orientation,
      formatMegabytes(wallpaper.filesize),
      wallpaper.colors ? swatches(displayColors(wallpaper)) : 'N/A',
    ])
  }
  return formatRows(rows).join('\n')
}

export function renderWallpaperDetails(wallpaper: WallpaperRecord): string {
  const rows = [
    ['id', wallpaper.id],
    ['name', wallpaper.name],
    ['type', wallpaper.type],
    ['name source', wallpaper.nameSource],
    ['resolution', `${wallpaper.resolution.width}x${wallpaper.resolution.height}`],
    ['orientation', wallpaper.orientation],
    ['filesize', formatMegabytes(wallpaper.filesize)],
    ['extension', wallpaper.extension],
    ['hash', wallpaper.hash],
    ['colors', wallpaper.colors ? wallpaper.colors.map(c => (isColor(c) ? colorEntry(c) : `? ${c}`)).join('  ') : 'N/A'],
  ]
  return formatRows(rows).join('\n')
}

/**
 * Two blocks side by side, line by line
 */
export function sideBySide(left: string, right: string, gap = 4): string {
  const leftLines = left.split('\n')
  const rightLines = right.split('\n')
  const width = Math.max(...leftLines.map(visibleLength))
  const lines: string[] = []
  for (let i = 0; i < Math.max(leftLines.length, rightLines.length); i++) {
    const l = leftLines[i] ?? ''
    lines.push(l + ' '.repeat(width - visibleLength(l) + gap) + (rightLines[i] ?? ''))
  }
  return lines.join('\n')
}

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length
}
