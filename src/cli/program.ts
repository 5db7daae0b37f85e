import { Command, InvalidArgumentError } from 'commander'
import { ensureDirectories } from '../config'
import { configureLogging, LOG_LEVEL_NAMES, LogLevel } from '../utils/logger'
import { CliContext } from './context'
import { registerPaletteCommand } from './commands/palette'
import { registerSchemeCommands } from './commands/scheme'
import { registerWallpaperCommands } from './commands/wallpaper'

function parseDebugLevel(value: string): LogLevel {
  const level = Number(value)
  if (level !== 0 && level !== 1 && level !== 2) {
    throw new InvalidArgumentError('Must be 0, 1 or 2.')
  }
  return level
}

export function buildProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('colorweave')
    .description('match wallpapers to color schemes and apply them')
    .option('-D, --debug <level>', 'logging level: 0=WARNING (default), 1=INFO, 2=DEBUG', parseDebugLevel, 0)
    .hook('preAction', async (thisCommand) => {
      const level: LogLevel = thisCommand.opts<{ debug: LogLevel }>().debug
      configureLogging(level)
      if (level > 0) ctx.print(`Logging level: ${LOG_LEVEL_NAMES[level]}`)
      await ensureDirectories(ctx.config)
    })

  registerSchemeCommands(program, ctx)
  registerWallpaperCommands(program, ctx)
  registerPaletteCommand(program, ctx)
  return program
}
