// Connected display discovery via xrandr, wlr-randr or system_profiler

import { ColorweaveConfig } from '../config'
import { Display } from '../types/wallpaper'
import { createLogger } from '../utils/logger'
import { CommandRunner, nodeCommandRunner } from './processRunner'

const log = createLogger('Displays')

export type DisplayServer = 'macos' | 'wayland' | 'x11' | 'unsupported'

export function detectDisplayServer(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): DisplayServer {
  if (platform === 'darwin') return 'macos'
  if (platform === 'linux') return env.WAYLAND_DISPLAY ? 'wayland' : 'x11'
  return 'unsupported'
}

function parseResolution(text: string): { width: number; height: number } | null {
  const match = /(\d+)\s*x\s*(\d+)/.exec(text)
  if (!match) return null
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) }
}

/**
 * Active outputs from `xrandr --current`, e.g.
 * "HDMI-1 connected primary 1920x1080+0+0 (normal left inverted right) 527mm x 296mm"
 */
export function parseXrandr(output: string): Display[] {
  const displays: Display[] = []
  for (const line of output.split('\n')) {
    if (!line.includes(' connected')) continue
    const parts = line.trim().split(/\s+/)
    const geometry = parts.find(p => /^\d+x\d+\+\d+\+\d+$/.test(p))
    if (!geometry) continue
    const resolution = parseResolution(geometry.split('+')[0])
    if (resolution) {
      displays.push({ identifier: parts[0], ...resolution })
    }
  }
  return displays
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Enabled outputs from `wlr-randr --json`, using each output's current mode
 */
export function parseWlrRandr(json: string): Display[] {
  const data: unknown = JSON.parse(json)
  if (!Array.isArray(data)) return []

  const displays: Display[] = []
  for (const entry of data) {
    if (!isRecord(entry)) continue
    const { name, enabled, modes } = entry
    if (enabled !== true || typeof name !== 'string' || !Array.isArray(modes)) continue
    const mode: unknown = modes.find((m: unknown) => isRecord(m) && m.current === true)
    if (isRecord(mode) && typeof mode.width === 'number' && typeof mode.height === 'number') {
      displays.push({ identifier: name, width: mode.width, height: mode.height })
    }
  }
  return displays
}

/**
 * Displays from `system_profiler SPDisplaysDataType -json`.
 * Identifiers are 1-based desktop numbers, matching what System Events expects.
 */
export function parseSystemProfiler(json: string): Display[] {
  const data: unknown = JSON.parse(json)
  if (!isRecord(data) || !Array.isArray(data.SPDisplaysDataType)) return []

  const displays: Display[] = []
  for (const gpu of data.SPDisplaysDataType) {
    if (!isRecord(gpu) || !Array.isArray(gpu.spdisplays_ndrvs)) continue
    for (const screen of gpu.spdisplays_ndrvs) {
      if (!isRecord(screen)) continue
      const pixels = screen._spdisplays_pixels
      const resolution = typeof pixels === 'string' ? parseResolution(pixels) : null
      if (resolution) {
        displays.push({ identifier: String(displays.length + 1), ...resolution })
      }
    }
  }
  return displays
}

export async function getDisplays(
  config: ColorweaveConfig,
  runner: CommandRunner = nodeCommandRunner,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): Promise<Display[]> {
  const server = detectDisplayServer(platform, env)
  switch (server) {
    case 'macos': {
      const { stdout } = await runner.run(config.tools.systemProfiler, ['SPDisplaysDataType', '-json'])
      return parseSystemProfiler(stdout)
    }
    case 'wayland': {
      const { stdout } = await runner.run(config.tools.wlrRandr, ['--json'])
      return parseWlrRandr(stdout)
    }
    case 'x11': {
      const { stdout } = await runner.run(config.tools.xrandr, ['--current'])
      return parseXrandr(stdout)
    }
    default:
      log.warn(`Display discovery is not supported on ${platform}`)
      return []
  }
}
