// Color distance types

/**
 * sRGB hex color, `#rrggbb`, lowercase
 */
export type Color = string

/**
 * RGB color as tuple [r, g, b] where each value is 0-255
 */
export type RGBTuple = [number, number, number]

/**
 * YUV (BT.601) color as tuple [y, u, v] on the 0-255 RGB scale
 * y: 0-255 (luma)
 * u: about -111 to 111
 * v: about -157 to 157
 */
export type YUVTuple = [number, number, number]

/**
 * LAB color as tuple [L, a, b]
 * L: 0-100 (lightness)
 * a: -128 to 127 (green to red)
 * b: -128 to 127 (blue to yellow)
 */
export type LABTuple = [number, number, number]

/**
 * XYZ color as tuple [x, y, z]
 */
export type XYZTuple = [number, number, number]

/**
 * A distinct pixel color projected into YUV space, weighted by how many pixels share it
 */
export interface WeightedPoint {
  coords: YUVTuple
  count: number
}

export interface Cluster {
  points: WeightedPoint[]
  center: YUVTuple
}

/**
 * Distinct colors of an image mapped to their pixel counts
 */
export type ColorHistogram = Map<Color, number>

/**
 * Decoded bitmap, row-major, 3 (RGB) or 4 (RGBA) bytes per pixel
 */
export interface PixelImage {
  width: number
  height: number
  channels: 3 | 4
  data: Uint8Array | Uint8ClampedArray
}

export type ImageInput = PixelImage | { histogram: ColorHistogram }

export interface ClusteringOptions {
  /** Random source for seeding; defaults to an unseeded generator */
  rng?: () => number
  /** Raise instead of seeding with replacement when colors are scarce */
  strict?: boolean
  maxIterations?: number
  /** Longest side after downscaling */
  maxDimension?: number
}

export interface ClusteringResult {
  clusters: Cluster[]
  iterations: number
  converged: boolean
}
