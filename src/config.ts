import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

export interface ColorweaveConfig {
  /** Root data directory */
  dataDir: string
  schemesDir: string
  profilesDir: string
  wallpaperDir: string
  /** Directory wallust reads its templates from */
  wallustConfigDir: string
  tools: {
    wallust: string
    feh: string
    swaybg: string
    osascript: string
    xrandr: string
    wlrRandr: string
    systemProfiler: string
    /** Opens a file in the desktop's default viewer */
    opener: string
  }
}

/**
 * Resolve paths and tool names from the environment.
 * COLORWEAVE_DIR moves all data; COLORWEAVE_<TOOL> overrides a tool binary.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ColorweaveConfig {
  const home = env.HOME ?? os.homedir()
  const dataDir = env.COLORWEAVE_DIR ?? path.join(home, '.local', 'share', 'colorweave')
  const schemesDir = path.join(dataDir, 'schemes')

  return {
    dataDir,
    schemesDir,
    profilesDir: path.join(schemesDir, '_profiles'),
    wallpaperDir: path.join(dataDir, 'wallpapers'),
    wallustConfigDir: env.COLORWEAVE_WALLUST_CONFIG ?? path.join(home, '.config', 'wallust'),
    tools: {
      wallust: env.COLORWEAVE_WALLUST ?? 'wallust',
      feh: env.COLORWEAVE_FEH ?? 'feh',
      swaybg: env.COLORWEAVE_SWAYBG ?? 'swaybg',
      osascript: 'osascript',
      xrandr: env.COLORWEAVE_XRANDR ?? 'xrandr',
      wlrRandr: env.COLORWEAVE_WLR_RANDR ?? 'wlr-randr',
      systemProfiler: 'system_profiler',
      opener: process.platform === 'darwin' ? 'open' : 'xdg-open',
    },
  }
}

export async function ensureDirectories(config: ColorweaveConfig) {
  for (const dir of [config.dataDir, config.schemesDir, config.profilesDir, config.wallpaperDir]) {
    await fs.mkdir(dir, { recursive: true })
  }
}
