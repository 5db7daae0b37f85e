// Apply wallpapers to displays with the platform's wallpaper tool

import { ColorweaveConfig } from '../config'
import { detectDisplayServer } from '../system/displays'
import { CommandRunner, nodeCommandRunner } from '../system/processRunner'
import { WallpaperAssignment } from '../types/wallpaper'
import { ExternalToolError } from '../utils/errors'

function appleScriptString(value: string): string {
  return '"' + value.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"'
}

/**
 * Set one wallpaper per display and return a summary line.
 * macOS goes through System Events, Wayland through swaybg, X11 through a single feh call.
 */
export async function setWallpapers(
  assignments: WallpaperAssignment[],
  config: ColorweaveConfig,
  runner: CommandRunner = nodeCommandRunner,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  if (assignments.length === 0) {
    return 'No valid wallpapers to set'
  }

  const server = detectDisplayServer(platform, env)
  switch (server) {
    case 'macos':
      for (const item of assignments) {
        const script = `tell application "System Events" to set picture of desktop ${item.display} to ${appleScriptString(item.wallpaper)}`
        await runner.run(config.tools.osascript, ['-e', script])
      }
      break
    case 'wayland':
      for (const item of assignments) {
        runner.spawnDetached(config.tools.swaybg, ['-o', item.display, '-i', item.wallpaper, '-m', 'fill'])
      }
      break
    case 'x11':
      await runner.run(config.tools.feh, assignments.flatMap(item => ['--bg-fill', item.wallpaper]))
      break
    default:
      throw new ExternalToolError('wallpaper', `setting wallpapers is not supported on ${platform}`)
  }

  return `Successfully set wallpapers for ${assignments.length} displays`
}
