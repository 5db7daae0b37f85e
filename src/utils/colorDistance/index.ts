// Color distance module exports

export type {
  Color,
  RGBTuple,
  YUVTuple,
  LABTuple,
  XYZTuple,
  WeightedPoint,
  Cluster,
  ColorHistogram,
  PixelImage,
  ImageInput,
  ClusteringOptions,
  ClusteringResult,
} from './types'

export {
  hexToRgb,
  isColor,
  normalizeHex,
  rgbToHex,
  rgbToYuv,
  yuvToHex,
  hexToYuv,
  rgbToXyz,
  xyzToLab,
  rgbToLab,
  hexToLab,
  hexToHsl,
  brightness,
} from './colorConversion'

export {
  yuvDistance,
  deltaE2000,
  perceptualDistance,
  similarity,
} from './distanceMetrics'

export {
  DEFAULT_MIN_DIFF,
  DEFAULT_MAX_ITERATIONS,
  THUMBNAIL_SIZE,
  downscaleImage,
  buildColorHistogram,
  histogramToPoints,
  calculateCenter,
  seedClusters,
  nearestCenter,
  assignPoints,
  kMeans,
  extractPalette,
} from './clustering'

export {
  selectDiverse,
  sortColors,
} from './paletteOperations'
