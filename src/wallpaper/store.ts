// Wallpaper library: <id><ext> image files with <id>.json metadata beside them

import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import fs from 'node:fs/promises'
import path from 'node:path'
import { nanoid } from 'nanoid'
import { ColorweaveConfig } from '../config'
import { ANALYSIS, MATCHING } from '../constants'
import { isImageFile, loadImagePixels, readImageSize } from '../system/imageSource'
import { Orientation, Resolution, WallpaperRecord } from '../types/wallpaper'
import { extractPalette } from '../utils/colorDistance/clustering'
import { isColor, normalizeHex } from '../utils/colorDistance/colorConversion'
import { Color } from '../utils/colorDistance/types'
import { DuplicateWallpaperError, InvalidInputError, NotFoundError } from '../utils/errors'
import { createLogger } from '../utils/logger'
import { pickRandom, Rng, createRng } from '../utils/random'
import { CandidateType, VariantType } from '../utils/ranking/types'

const log = createLogger('Wallpaper')

export type PaletteAnalyzer = (imagePath: string) => Promise<Color[]>

export async function calculateFileHash(filePath: string): Promise<string> {
  const hash = createHash('sha256')
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk)
  }
  return hash.digest('hex')
}

/**
 * Square within 5% of the short side counts as "both"
 */
export function orientationOf({ width, height }: Resolution): Orientation {
  if (Math.abs(width - height) <= Math.min(width, height) * ANALYSIS.SQUARE_TOLERANCE) return 'both'
  return width > height ? 'landscape' : 'portrait'
}

export function isCandidateType(value: unknown): value is CandidateType {
  return value === 'dark' || value === 'light' || value === 'both'
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireString(data: Record<string, unknown>, key: string): string {
  const value = data[key]
  if (typeof value !== 'string') {
    throw new InvalidInputError(`Wallpaper metadata is missing "${key}"`)
  }
  return value
}

function requireNumber(data: Record<string, unknown>, key: string): number {
  const value = data[key]
  if (typeof value !== 'number') {
    throw new InvalidInputError(`Wallpaper metadata is missing "${key}"`)
  }
  return value
}

/**
 * Validate parsed metadata JSON into a WallpaperRecord
 */
export function parseWallpaperRecord(data: unknown): WallpaperRecord {
  if (!isRecord(data)) {
    throw new InvalidInputError('Wallpaper metadata must be an object')
  }
  if (!isCandidateType(data.type)) {
    throw new InvalidInputError(`Wallpaper metadata has unknown type ${String(data.type)}`)
  }
  if (!isRecord(data.resolution)) {
    throw new InvalidInputError('Wallpaper metadata is missing "resolution"')
  }

  const resolution = {
    width: requireNumber(data.resolution, 'width'),
    height: requireNumber(data.resolution, 'height'),
  }
  const orientation = data.orientation
  const record: WallpaperRecord = {
    id: requireString(data, 'id'),
    name: requireString(data, 'name'),
    type: data.type,
    nameSource: data.nameSource === 'manual' ? 'manual' : 'filename',
    resolution,
    orientation: orientation === 'landscape' || orientation === 'portrait' || orientation === 'both'
      ? orientation
      : orientationOf(resolution),
    filesize: requireNumber(data, 'filesize'),
    extension: requireString(data, 'extension'),
    hash: requireString(data, 'hash'),
  }

  if (Array.isArray(data.colors)) {
    const colors = data.colors.filter((c): c is string => typeof c === 'string')
    if (colors.length !== data.colors.length) {
      log.warn(`Wallpaper ${record.id} has non-text colors, ignoring them`)
    } else {
      // Malformed entries stay as stored so ranking can skip this wallpaper
      record.colors = colors.map(c => (isColor(c) ? normalizeHex(c) : c))
    }
  }
  return record
}

export function wallpaperPath(config: ColorweaveConfig, wallpaper: WallpaperRecord): string {
  return path.join(config.wallpaperDir, `${wallpaper.id}${wallpaper.extension}`)
}

function metadataPath(config: ColorweaveConfig, id: string): string {
  return path.join(config.wallpaperDir, `${id}.json`)
}

export async function saveWallpaper(config: ColorweaveConfig, wallpaper: WallpaperRecord) {
  await fs.writeFile(metadataPath(config, wallpaper.id), JSON.stringify(wallpaper, null, 2))
}

export async function listWallpapers(config: ColorweaveConfig): Promise<WallpaperRecord[]> {
  await fs.mkdir(config.wallpaperDir, { recursive: true })
  const files = (await fs.readdir(config.wallpaperDir)).filter(f => f.endsWith('.json')).sort()

  const wallpapers: WallpaperRecord[] = []
  for (const file of files) {
    const raw = await fs.readFile(path.join(config.wallpaperDir, file), 'utf8')
    wallpapers.push(parseWallpaperRecord(JSON.parse(raw)))
  }
  return wallpapers
}

/**
 * Look a wallpaper up by id prefix or exact name
 */
export async function getWallpaper(config: ColorweaveConfig, identifier: string): Promise<WallpaperRecord | undefined> {
  const wallpapers = await listWallpapers(config)
  return wallpapers.find(w => w.id.startsWith(identifier) || w.name === identifier)
}

export async function requireWallpaper(config: ColorweaveConfig, identifier: string): Promise<WallpaperRecord> {
  const wallpaper = await getWallpaper(config, identifier)
  if (!wallpaper) {
    throw new NotFoundError('Wallpaper', identifier)
  }
  return wallpaper
}

function bigrams(text: string): string[] {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ').trim()
  const grams: string[] = []
  for (let i = 0; i < normalized.length - 1; i++) {
    grams.push(normalized.slice(i, i + 2))
  }
  return grams
}

/**
 * Dice coefficient over character bigrams, 0-1
 */
export function nameSimilarity(a: string, b: string): number {
  if (a.toLowerCase() === b.toLowerCase()) return 1
  const left = bigrams(a)
  const right = bigrams(b)
  if (left.length === 0 || right.length === 0) return 0

  const counts = new Map<string, number>()
  for (const gram of left) counts.set(gram, (counts.get(gram) ?? 0) + 1)
  let overlap = 0
  for (const gram of right) {
    const count = counts.get(gram) ?? 0
    if (count > 0) {
      overlap++
      counts.set(gram, count - 1)
    }
  }
  return (2 * overlap) / (left.length + right.length)
}

/**
 * Best fuzzy name match above the similarity threshold
 */
export function fuzzyMatchWallpaper(wallpapers: readonly WallpaperRecord[], query: string): WallpaperRecord | undefined {
  let best: WallpaperRecord | undefined
  let bestScore: number = MATCHING.FUZZY_THRESHOLD
  for (const wallpaper of wallpapers) {
    const score = nameSimilarity(query, wallpaper.name)
    if (score > bestScore) {
      bestScore = score
      best = wallpaper
    }
  }
  return best
}

export async function findWallpaper(config: ColorweaveConfig, query: string): Promise<WallpaperRecord | undefined> {
  return (await getWallpaper(config, query)) ?? fuzzyMatchWallpaper(await listWallpapers(config), query)
}

export async function getRandomWallpaper(
  config: ColorweaveConfig,
  type?: VariantType,
  rng: Rng = createRng()
): Promise<WallpaperRecord | undefined> {
  let wallpapers = await listWallpapers(config)
  if (type) {
    wallpapers = wallpapers.filter(w => w.type === type || w.type === 'both')
  }
  return pickRandom(wallpapers, rng)
}

export async function getWallpapersMissingMetadata(config: ColorweaveConfig): Promise<WallpaperRecord[]> {
  return (await listWallpapers(config)).filter(w => !w.colors || w.colors.length === 0)
}

export interface ImportOptions {
  name?: string
  type: CandidateType
}

/**
 * Copy an image into the library and write its metadata.
 * Files already imported (same SHA-256) are rejected.
 */
export async function importWallpaper(
  config: ColorweaveConfig,
  filePath: string,
  options: ImportOptions
): Promise<WallpaperRecord> {
  if (!(await isImageFile(filePath))) {
    throw new InvalidInputError(`${filePath} is not a supported image`)
  }
  await fs.mkdir(config.wallpaperDir, { recursive: true })

  const hash = await calculateFileHash(filePath)
  const existing = (await listWallpapers(config)).find(w => w.hash === hash)
  if (existing) {
    throw new DuplicateWallpaperError(existing.id)
  }

  const resolution = await readImageSize(filePath)
  const extension = path.extname(filePath).toLowerCase()
  const record: WallpaperRecord = {
    id: nanoid(12),
    name: options.name ?? path.basename(filePath, path.extname(filePath)),
    type: options.type,
    nameSource: options.name === undefined ? 'filename' : 'manual',
    resolution,
    orientation: orientationOf(resolution),
    filesize: (await fs.stat(filePath)).size,
    extension,
    hash,
  }

  await fs.copyFile(filePath, wallpaperPath(config, record))
  await saveWallpaper(config, record)
  log.info(`Imported ${record.name} as ${record.id}`)
  return record
}

export const defaultPaletteAnalyzer: PaletteAnalyzer = async (imagePath) => {
  const pixels = await loadImagePixels(imagePath)
  return extractPalette(pixels, ANALYSIS.WALLPAPER_PALETTE_SIZE)
}

/**
 * Extract and store a wallpaper's colors unless already present
 */
export async function analyzeWallpaper(
  config: ColorweaveConfig,
  identifier: string,
  analyze: PaletteAnalyzer = defaultPaletteAnalyzer
): Promise<WallpaperRecord> {
  const wallpaper = await requireWallpaper(config, identifier)
  if (wallpaper.colors && wallpaper.colors.length > 0) {
    log.debug(`${wallpaper.id} already analyzed`)
    return wallpaper
  }

  const colors = await analyze(wallpaperPath(config, wallpaper))
  const updated: WallpaperRecord = { ...wallpaper, colors, orientation: orientationOf(wallpaper.resolution) }
  await saveWallpaper(config, updated)
  log.info(`Analyzed ${wallpaper.id}: ${colors.join(' ')}`)
  return updated
}
