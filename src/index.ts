// Public API

export * from './utils/colorDistance'
export * from './utils/ranking'
export { CSS_COLORS, estimateNames, nearestColorName } from './utils/colorNaming'
export type { NamedColor } from './utils/colorNaming'
export * from './utils/errors'
export { createLogger, configureLogging } from './utils/logger'
export type { Logger, LogLevel } from './utils/logger'
export { createRng } from './utils/random'
export type { Rng } from './utils/random'

export { resolveConfig, ensureDirectories } from './config'
export type { ColorweaveConfig } from './config'
export type { Scheme, SchemeVariant, ColorProfile } from './types/scheme'
export type { WallpaperRecord, Display, WallpaperAssignment, Orientation, Resolution } from './types/wallpaper'

export * from './scheme/variants'
export * from './scheme/store'
export { applyVariant, toPywalScheme } from './scheme/apply'
export type { PywalScheme } from './scheme/apply'
export * from './wallpaper/store'
export * from './wallpaper/matching'
export { setWallpapers } from './wallpaper/setter'
export { getDisplays, parseXrandr, parseWlrRandr, parseSystemProfiler } from './system/displays'
export { loadImagePixels, readImageSize, isImageFile } from './system/imageSource'
export { nodeCommandRunner } from './system/processRunner'
export type { CommandRunner, CommandResult } from './system/processRunner'
