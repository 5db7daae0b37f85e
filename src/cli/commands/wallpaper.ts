import { Command, InvalidArgumentError, Option } from 'commander'
import { WallpaperRecord } from '../../types/wallpaper'
import { NotFoundError } from '../../utils/errors'
import { createRng } from '../../utils/random'
import { CandidateType } from '../../utils/ranking/types'
import {
  analyzeWallpaper,
  findWallpaper,
  getRandomWallpaper,
  getWallpapersMissingMetadata,
  importWallpaper,
  isCandidateType,
  listWallpapers,
  wallpaperPath,
} from '../../wallpaper/store'
import { CliContext } from '../context'
import { colorEntry, renderWallpaperDetails, renderWallpaperList } from '../render'

type OutputFormat = 'stdout' | 'json'

function parseCandidateType(value: string): CandidateType {
  if (!isCandidateType(value)) {
    throw new InvalidArgumentError('Must be dark, light or both.')
  }
  return value
}

export interface WallpaperJsonView extends WallpaperRecord {
  filesizeMb: number
  path?: string
}

/**
 * Metadata as printed by --format json: the stored record plus size in MB and the file path
 */
export function toJsonView(wallpaper: WallpaperRecord, path?: string): WallpaperJsonView {
  const view: WallpaperJsonView = { ...wallpaper, filesizeMb: wallpaper.filesize / 1024 / 1024 }
  if (path) view.path = path
  return view
}

const formatOption = () =>
  new Option('--format <format>', 'output format').choices(['stdout', 'json']).default('stdout')

export function registerWallpaperCommands(program: Command, ctx: CliContext) {
  const wallpaper = program.command('wallpaper').description('manage wallpapers')

  wallpaper
    .command('import')
    .description('copy an image into the wallpaper library')
    .argument('<path>', 'image file')
    .option('--name <name>', 'name for the wallpaper, defaults to the file name')
    .requiredOption('--type <type>', 'dark, light or both', parseCandidateType)
    .option('-a, --analyze', 'extract colors on import')
    .action(async (file: string, options: { name?: string; type: CandidateType; analyze?: boolean }) => {
      const record = await importWallpaper(ctx.config, file, { name: options.name, type: options.type })
      ctx.print(`Imported wallpaper with ID: ${record.id}`)
      if (options.analyze) {
        const analyzed = await analyzeWallpaper(ctx.config, record.id)
        ctx.print(`Analyzed wallpaper. Extracted colors: ${(analyzed.colors ?? []).join(' ')}`)
      }
    })

  wallpaper
    .command('analyze')
    .description('extract the dominant colors of wallpapers')
    .argument('[id]', 'wallpaper id or name')
    .option('--missing', 'analyze all wallpapers without extracted colors')
    .action(async (id: string | undefined, options: { missing?: boolean }) => {
      let ids: string[]
      if (options.missing) {
        ids = (await getWallpapersMissingMetadata(ctx.config)).map(w => w.id)
        if (ids.length === 0) {
          ctx.print('No unanalyzed wallpapers found.')
          return
        }
      } else if (id) {
        ids = [id]
      } else {
        ctx.print('Please provide a wallpaper id or use --missing flag')
        return
      }

      for (const [i, wallpaperId] of ids.entries()) {
        const analyzed = await analyzeWallpaper(ctx.config, wallpaperId)
        ctx.print(`Analyzed wallpaper ${analyzed.id}:`)
        ctx.print(`${(analyzed.colors ?? []).map(c => colorEntry(c)).join('  ')}  ${analyzed.orientation}`)
        if (i < ids.length - 1) ctx.print()
      }
    })

  wallpaper
    .command('list')
    .description('list wallpapers in the library')
    .addOption(formatOption())
    .action(async (options: { format: OutputFormat }) => {
      const wallpapers = await listWallpapers(ctx.config)
      if (options.format === 'json') {
        ctx.print(JSON.stringify(wallpapers.map(w => toJsonView(w)), null, 2))
        return
      }
      ctx.print(renderWallpaperList(wallpapers))
    })

  wallpaper
    .command('show')
    .description('show one wallpaper; "random", "dark" or "light" pick one at random')
    .argument('<identifier>', 'id prefix, name, or a name to match approximately')
    .option('--open', 'open the wallpaper in the system image viewer')
    .addOption(formatOption())
    .action(async (identifier: string, options: { open?: boolean; format: OutputFormat }) => {
      const found = identifier === 'random' || identifier === 'dark' || identifier === 'light'
        ? await getRandomWallpaper(ctx.config, identifier === 'random' ? undefined : identifier, createRng())
        : await findWallpaper(ctx.config, identifier)

      if (!found) {
        throw new NotFoundError('Wallpaper', identifier)
      }

      const file = wallpaperPath(ctx.config, found)
      if (options.format === 'json') {
        ctx.print(JSON.stringify(toJsonView(found, file), null, 2))
      } else {
        ctx.print(renderWallpaperDetails(found))
      }

      if (options.open) {
        ctx.print(`Opening wallpaper: ${file}`)
        await ctx.runner.run(ctx.config.tools.opener, [file])
      }
    })
}
