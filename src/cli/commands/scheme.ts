import { Command, InvalidArgumentError } from 'commander'
import { applyVariant } from '../../scheme/apply'
import {
  analyzeScheme,
  getSchemesWithoutProfiles,
  importScheme,
  listSchemes,
  loadScheme,
} from '../../scheme/store'
import {
  backgroundOf,
  parseSchemeIdentifier,
  selectVariants,
  sortVariantsByBrightness,
} from '../../scheme/variants'
import { getDisplays } from '../../system/displays'
import { MATCHING } from '../../constants'
import { Scheme, SchemeVariant } from '../../types/scheme'
import { InvalidInputError } from '../../utils/errors'
import { assignWallpapers, getCompatibleWallpapers } from '../../wallpaper/matching'
import { setWallpapers } from '../../wallpaper/setter'
import { listWallpapers, wallpaperPath } from '../../wallpaper/store'
import { CliContext } from '../context'
import { label, renderVariant, renderWallpaperTable, sideBySide, swatches } from '../render'

export function parseFraction(value: string): number {
  const parsed = Number(value)
  if (!(parsed > 0 && parsed <= 1)) {
    throw new InvalidArgumentError('Must be a number in (0, 1].')
  }
  return parsed
}

/**
 * The variant `scheme apply` acts on: named, first of a type, or the scheme's first
 */
export function variantToApply(scheme: Scheme, identifier?: string): SchemeVariant {
  const variants = selectVariants(scheme, identifier)
  if (variants.length === 0) {
    throw new InvalidInputError(identifier
      ? `No ${identifier} variant found in scheme '${scheme.name}'`
      : `Scheme '${scheme.name}' has no variants`)
  }
  return variants[0]
}

export function registerSchemeCommands(program: Command, ctx: CliContext) {
  const scheme = program.command('scheme').description('manage color schemes')

  scheme
    .command('list')
    .description('list imported schemes and their variants')
    .action(async () => {
      for (const name of await listSchemes(ctx.config)) {
        const loaded = await loadScheme(ctx.config, name)
        ctx.print(name)
        for (const variant of sortVariantsByBrightness(Object.values(loaded.variants))) {
          const background = backgroundOf(variant)
          const title = background ? label(variant.name, background) : variant.name
          const accents = MATCHING.ACCENT_SLOTS.flatMap(slot => variant.colors[slot] ?? [])
          ctx.print(`  ${title} ${swatches(accents)}`)
        }
        ctx.print()
      }
    })

  scheme
    .command('show')
    .description('show the colors of a scheme or one of its variants')
    .argument('<scheme>', 'scheme name, optionally followed by :variant, :dark or :light')
    .option('--wallpapers', 'show compatible wallpapers, ranked by color similarity')
    .action(async (identifier: string, options: { wallpapers?: boolean }) => {
      const { schemeName, variant } = parseSchemeIdentifier(identifier)
      const loaded = await loadScheme(ctx.config, schemeName)
      const wallpapers = options.wallpapers ? await listWallpapers(ctx.config) : []

      for (const selected of selectVariants(loaded, variant)) {
        const table = renderVariant(selected)
        if (options.wallpapers) {
          const { ranked } = getCompatibleWallpapers(wallpapers, selected)
          ctx.print(sideBySide(table, renderWallpaperTable(ranked.map(r => r.item), 'wallpapers')))
        } else {
          ctx.print(table)
        }
        ctx.print()
      }
    })

  scheme
    .command('import')
    .description('import a scheme from a JSON file')
    .argument('<file>', 'scheme JSON file')
    .option('-a, --analyze', 'create a color profile for the scheme')
    .action(async (file: string, options: { analyze?: boolean }) => {
      const imported = await importScheme(ctx.config, file)
      if (options.analyze) {
        await analyzeScheme(ctx.config, imported.name)
        ctx.print(`Created color profile for scheme '${imported.name}'`)
      }
      ctx.print(`Imported scheme '${imported.name}' successfully.`)
    })

  scheme
    .command('analyze')
    .description('create color profiles for schemes')
    .argument('[scheme]', 'scheme name')
    .option('--missing', 'analyze all schemes without color profiles')
    .action(async (name: string | undefined, options: { missing?: boolean }) => {
      const names = options.missing ? await getSchemesWithoutProfiles(ctx.config) : name ? [name] : []
      if (!options.missing && !name) {
        ctx.print('Please provide a scheme name or use --missing flag')
        return
      }
      if (names.length === 0) {
        ctx.print('No schemes found without color profiles.')
        return
      }
      for (const schemeName of names) {
        await analyzeScheme(ctx.config, schemeName)
        ctx.print(`Created color profile for scheme '${schemeName}'`)
      }
    })

  scheme
    .command('apply')
    .description('apply a scheme variant, optionally with matching wallpapers')
    .argument('<scheme>', 'scheme name, optionally followed by :variant, :dark or :light')
    .option('-w, --wallpapers', 'set matching wallpapers for connected displays')
    .option('-r, --random', 'pick wallpapers at random from the best matches')
    .option('-f, --filter-threshold <fraction>', 'share of best matches to pick from', parseFraction, MATCHING.DEFAULT_FILTER_THRESHOLD)
    .action(async (identifier: string, options: { wallpapers?: boolean; random?: boolean; filterThreshold: number }) => {
      const { schemeName, variant } = parseSchemeIdentifier(identifier)
      const loaded = await loadScheme(ctx.config, schemeName)
      const selected = variantToApply(loaded, variant)

      await applyVariant(selected, ctx.config, ctx.runner, ctx.platform)
      ctx.print(`Applied ${loaded.name} - ${selected.name} (${selected.type})`)

      const table = renderVariant(selected, false)
      if (!options.wallpapers) {
        ctx.print(table)
        return
      }

      const displays = await getDisplays(ctx.config, ctx.runner, ctx.platform, ctx.env)
      const { ranked } = getCompatibleWallpapers(await listWallpapers(ctx.config), selected)
      const byPath = new Map(ranked.map(r => [wallpaperPath(ctx.config, r.item), r.item]))
      const assignments = assignWallpapers(ranked.map(r => r.item), displays, {
        random: options.random,
        filterThreshold: options.filterThreshold,
        pathOf: w => wallpaperPath(ctx.config, w),
      })

      if (assignments.length === 0) {
        ctx.print('No suitable wallpapers found for any display')
        return
      }

      ctx.print(await setWallpapers(assignments, ctx.config, ctx.runner, ctx.platform, ctx.env))
      const applied = assignments.flatMap(a => byPath.get(a.wallpaper) ?? [])
      ctx.print(sideBySide(table, renderWallpaperTable(applied)))
    })
}
