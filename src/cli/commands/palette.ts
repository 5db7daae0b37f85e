import { Command, InvalidArgumentError } from 'commander'
import { ANALYSIS } from '../../constants'
import { loadImagePixels } from '../../system/imageSource'
import { DEFAULT_MIN_DIFF, extractPalette } from '../../utils/colorDistance/clustering'
import { estimateNames } from '../../utils/colorNaming'
import { createRng } from '../../utils/random'
import { CliContext } from '../context'
import { colorEntry } from '../render'

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value)
  if (!(parsed > 0)) {
    throw new InvalidArgumentError('Must be a positive number.')
  }
  return parsed
}

export function registerPaletteCommand(program: Command, ctx: CliContext) {
  program
    .command('palette')
    .description('extract the dominant colors of an image')
    .argument('<image>', 'image file')
    .option('-k, --colors <count>', 'number of colors', parsePositiveInt, ANALYSIS.DEFAULT_PALETTE_SIZE)
    .option('--min-diff <distance>', 'convergence threshold in YUV units', parsePositiveNumber, DEFAULT_MIN_DIFF)
    .option('--seed <seed>', 'seed for cluster initialization, for repeatable output')
    .option('--names', 'show the nearest CSS color name of each color')
    .action(async (image: string, options: { colors: number; minDiff: number; seed?: string; names?: boolean }) => {
      const pixels = await loadImagePixels(image)
      const palette = extractPalette(pixels, options.colors, options.minDiff, { rng: createRng(options.seed) })
      const names = options.names ? estimateNames(palette) : []
      palette.forEach((color, i) => ctx.print(colorEntry(color, names[i])))
    })
}
