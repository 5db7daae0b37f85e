// Error types shared by the color engine and its collaborators

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'INSUFFICIENT_DATA'
  | 'INVALID_COLOR'
  | 'MISSING_COLOR_DATA'
  | 'NOT_FOUND'
  | 'DUPLICATE_WALLPAPER'
  | 'EXTERNAL_TOOL'

export class ColorweaveError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Raised for arguments the engine cannot work with at all,
 * e.g. an image without a single opaque pixel or k < 1
 */
export class InvalidInputError extends ColorweaveError {
  constructor(message: string) {
    super('INVALID_INPUT', message)
  }
}

/**
 * Raised in strict mode when an image has fewer distinct colors than clusters requested
 */
export class InsufficientDataError extends ColorweaveError {
  readonly available: number
  readonly requested: number

  constructor(available: number, requested: number) {
    super('INSUFFICIENT_DATA', `Image has ${available} distinct colors, ${requested} clusters requested`)
    this.available = available
    this.requested = requested
  }
}

export class InvalidColorError extends ColorweaveError {
  readonly value: string

  constructor(value: string) {
    super('INVALID_COLOR', `Invalid color "${value}", expected #rgb or #rrggbb`)
    this.value = value
  }
}

export class MissingColorDataError extends ColorweaveError {
  constructor(subject: string) {
    super('MISSING_COLOR_DATA', `${subject} has no color data`)
  }
}

export class NotFoundError extends ColorweaveError {
  constructor(kind: string, identifier: string) {
    super('NOT_FOUND', `${kind} "${identifier}" not found`)
  }
}

export class DuplicateWallpaperError extends ColorweaveError {
  readonly existingId: string

  constructor(existingId: string) {
    super('DUPLICATE_WALLPAPER', `This wallpaper already exists with ID: ${existingId}`)
    this.existingId = existingId
  }
}

export class ExternalToolError extends ColorweaveError {
  readonly tool: string
  readonly exitCode: number | null

  constructor(tool: string, message: string, exitCode: number | null = null) {
    super('EXTERNAL_TOOL', `${tool}: ${message}`)
    this.tool = tool
    this.exitCode = exitCode
  }
}
