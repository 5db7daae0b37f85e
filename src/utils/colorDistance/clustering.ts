// Dominant color extraction - weighted k-means over YUV points

import { InvalidInputError, InsufficientDataError } from '../errors'
import { createLogger } from '../logger'
import { createRng, Rng, randomIndex, sampleWithoutReplacement } from '../random'
import { hexToRgb, rgbToHex, rgbToYuv, yuvToHex } from './colorConversion'
import { yuvDistance } from './distanceMetrics'
import {
  Color,
  Cluster,
  ClusteringOptions,
  ClusteringResult,
  ColorHistogram,
  ImageInput,
  PixelImage,
  WeightedPoint,
  YUVTuple,
} from './types'

const log = createLogger('Palette')

export const DEFAULT_MIN_DIFF = 1.0
export const DEFAULT_MAX_ITERATIONS = 100
export const THUMBNAIL_SIZE = 200

function assertPixelBuffer(image: PixelImage): number {
  const { width, height, channels, data } = image
  const expected = width * height * channels
  if (data.length < expected) {
    throw new InvalidInputError(`Pixel buffer holds ${data.length} bytes, ${expected} expected for ${width}x${height}x${channels}`)
  }
  return expected
}

/**
 * Nearest-neighbour downscale so the longest side is at most maxDimension.
 * Images already small enough are returned as-is.
 */
export function downscaleImage(image: PixelImage, maxDimension: number = THUMBNAIL_SIZE): PixelImage {
  assertPixelBuffer(image)
  const { width, height, channels, data } = image
  const longest = Math.max(width, height)
  if (longest <= maxDimension) return image

  const scale = maxDimension / longest
  const targetWidth = Math.max(1, Math.round(width * scale))
  const targetHeight = Math.max(1, Math.round(height * scale))
  const out = new Uint8Array(targetWidth * targetHeight * channels)

  for (let y = 0; y < targetHeight; y++) {
    const sy = Math.floor((y * height) / targetHeight)
    for (let x = 0; x < targetWidth; x++) {
      const sx = Math.floor((x * width) / targetWidth)
      const src = (sy * width + sx) * channels
      const dst = (y * targetWidth + x) * channels
      for (let c = 0; c < channels; c++) {
        out[dst + c] = data[src + c]
      }
    }
  }

  return { width: targetWidth, height: targetHeight, channels, data: out }
}

/**
 * Count pixels per distinct RGB value. Fully transparent pixels are ignored.
 */
export function buildColorHistogram(image: PixelImage): ColorHistogram {
  const { channels, data } = image
  const expected = assertPixelBuffer(image)

  const counts = new Map<number, number>()
  for (let i = 0; i < expected; i += channels) {
    if (channels === 4 && data[i + 3] === 0) continue
    const key = (data[i] << 16) | (data[i + 1] << 8) | data[i + 2]
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }

  const histogram: ColorHistogram = new Map()
  for (const [key, count] of counts) {
    histogram.set(rgbToHex((key >> 16) & 255, (key >> 8) & 255, key & 255), count)
  }
  return histogram
}

export function histogramToPoints(histogram: ColorHistogram): WeightedPoint[] {
  const points: WeightedPoint[] = []
  for (const [color, count] of histogram) {
    if (count <= 0) continue
    const [r, g, b] = hexToRgb(color)
    points.push({ coords: rgbToYuv(r, g, b), count })
  }
  return points
}

/**
 * Count-weighted mean of the points' coordinates.
 * Returns null for an empty point list.
 */
export function calculateCenter(points: readonly WeightedPoint[]): YUVTuple | null {
  const sums: YUVTuple = [0, 0, 0]
  let total = 0
  for (const p of points) {
    total += p.count
    sums[0] += p.coords[0] * p.count
    sums[1] += p.coords[1] * p.count
    sums[2] += p.coords[2] * p.count
  }
  if (total === 0) return null
  return [sums[0] / total, sums[1] / total, sums[2] / total]
}

/**
 * Pick k distinct points as initial centers.
 *
 * With fewer distinct points than k every point seeds one cluster (in random order)
 * and the rest are drawn with replacement, unless strict is set.
 */
export function seedClusters(points: readonly WeightedPoint[], k: number, rng: Rng, strict = false): Cluster[] {
  if (points.length >= k) {
    return sampleWithoutReplacement(points, k, rng).map(p => ({ points: [p], center: p.coords }))
  }

  if (strict) {
    throw new InsufficientDataError(points.length, k)
  }

  log.debug(`Only ${points.length} distinct colors for ${k} clusters, seeding with replacement`)
  const seeds = sampleWithoutReplacement(points, points.length, rng)
  while (seeds.length < k) {
    seeds.push(points[randomIndex(rng, points.length)])
  }
  return seeds.map(p => ({ points: [p], center: p.coords }))
}

/**
 * Index of the nearest center; the lower index wins ties
 */
export function nearestCenter(point: WeightedPoint, centers: readonly YUVTuple[]): number {
  let smallestDistance = Infinity
  let idx = 0
  for (let i = 0; i < centers.length; i++) {
    const distance = yuvDistance(point.coords, centers[i])
    if (distance < smallestDistance) {
      smallestDistance = distance
      idx = i
    }
  }
  return idx
}

export function assignPoints(points: readonly WeightedPoint[], centers: readonly YUVTuple[]): WeightedPoint[][] {
  const groups: WeightedPoint[][] = centers.map(() => [])
  for (const p of points) {
    groups[nearestCenter(p, centers)].push(p)
  }
  return groups
}

/**
 * Run k-means until no center moves by minDiff or more.
 * Hitting maxIterations is logged and the last clusters are returned.
 */
export function kMeans(
  points: readonly WeightedPoint[],
  k: number,
  minDiff: number = DEFAULT_MIN_DIFF,
  options: ClusteringOptions = {}
): ClusteringResult {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidInputError(`Cluster count must be a positive integer, got ${k}`)
  }
  if (!(minDiff > 0)) {
    throw new InvalidInputError(`Convergence threshold must be positive, got ${minDiff}`)
  }
  if (points.length === 0) {
    throw new InvalidInputError('Image has no distinct colors')
  }

  const rng = options.rng ?? createRng()
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
  let clusters = seedClusters(points, k, rng, options.strict)

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const groups = assignPoints(points, clusters.map(c => c.center))

    let diff = 0
    clusters = clusters.map((old, i) => {
      const center = calculateCenter(groups[i]) ?? old.center
      diff = Math.max(diff, yuvDistance(old.center, center))
      return { points: groups[i], center }
    })

    if (diff < minDiff) {
      log.debug(`Converged after ${iteration} iterations`)
      return { clusters, iterations: iteration, converged: true }
    }
  }

  log.debug(`No convergence after ${maxIterations} iterations, keeping last centers`)
  return { clusters, iterations: maxIterations, converged: false }
}

/**
 * Dominant colors of an image, one per cluster, in cluster order.
 * Duplicates are possible when the image has fewer colors than k.
 */
export function extractPalette(
  image: ImageInput,
  k: number,
  minDiff: number = DEFAULT_MIN_DIFF,
  options: ClusteringOptions = {}
): Color[] {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidInputError(`Palette size must be a positive integer, got ${k}`)
  }

  const histogram = 'histogram' in image
    ? image.histogram
    : buildColorHistogram(downscaleImage(image, options.maxDimension))

  const points = histogramToPoints(histogram)
  const { clusters } = kMeans(points, k, minDiff, options)
  return clusters.map(c => yuvToHex(...c.center))
}
