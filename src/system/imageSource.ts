// Image decoding with sharp

import sharp from 'sharp'
import { THUMBNAIL_SIZE } from '../utils/colorDistance/clustering'
import { PixelImage } from '../utils/colorDistance/types'
import { InvalidInputError } from '../utils/errors'
import { Resolution } from '../types/wallpaper'

/**
 * Decode an image into RGBA pixels, shrunk so its longest side is at most maxDimension
 */
export async function loadImagePixels(input: string | Buffer, maxDimension: number = THUMBNAIL_SIZE): Promise<PixelImage> {
  const { data, info } = await sharp(input)
    .rotate()
    .resize(maxDimension, maxDimension, { fit: 'inside', withoutEnlargement: true })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true })

  return {
    width: info.width,
    height: info.height,
    channels: 4,
    data: new Uint8Array(data.buffer, data.byteOffset, data.length),
  }
}

/**
 * Pixel dimensions of an image file without decoding it
 */
export async function readImageSize(input: string | Buffer): Promise<Resolution> {
  const { width, height } = await sharp(input).metadata()
  if (!width || !height) {
    throw new InvalidInputError(`Cannot read image dimensions of ${typeof input === 'string' ? input : 'buffer'}`)
  }
  return { width, height }
}

/**
 * True when sharp recognizes the file as an image
 */
export async function isImageFile(filePath: string): Promise<boolean> {
  try {
    const { format } = await sharp(filePath).metadata()
    return format !== undefined
  } catch {
    return false
  }
}
