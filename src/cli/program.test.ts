import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import sharp from 'sharp'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { buildProgram } from './program'
import { CliContext } from './context'
import { resolveConfig } from '../config'
import { FakeRunner } from '../test/fakeRunner'
import { hexToRgb } from '../utils/colorDistance/colorConversion'
import { InvalidInputError } from '../utils/errors'
import { analyzeWallpaper, importWallpaper, wallpaperPath } from '../wallpaper/store'

const HARBOR = {
  name: 'harbor',
  variants: {
    night: {
      type: 'dark',
      colors: { background: '#101820', color0: '#181818', color1: '#e06070', color4: '#6090e0', color7: '#c0c0c0' },
    },
    day: { type: 'light', colors: { background: '#f8f4f0', color1: '#a02030' } },
  },
}

describe('colorweave program', () => {
  let root: string
  let output: string[]
  let runner: FakeRunner
  let ctx: CliContext

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'colorweave-cli-'))
    output = []
    runner = new FakeRunner()
    ctx = {
      config: resolveConfig({ HOME: root, COLORWEAVE_DIR: path.join(root, 'data') }),
      runner,
      platform: 'linux',
      env: {},
      print: (text = '') => output.push(text),
    }
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  function run(...args: string[]) {
    const program = buildProgram(ctx)
      .exitOverride()
      .configureOutput({ writeErr: () => {}, writeOut: () => {} })
    return program.parseAsync(args, { from: 'user' })
  }

  async function writeScheme(): Promise<string> {
    const file = path.join(root, 'harbor.json')
    await fs.writeFile(file, JSON.stringify(HARBOR))
    return file
  }

  async function writeHalves(name: string, left: string, right: string, width = 64, height = 48): Promise<string> {
    const data = Buffer.alloc(width * height * 3)
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const [r, g, b] = hexToRgb(x < width / 2 ? left : right)
        data.set([r, g, b], (y * width + x) * 3)
      }
    }
    const file = path.join(root, name)
    await sharp(data, { raw: { width, height, channels: 3 } }).png().toFile(file)
    return file
  }

  it('imports and analyzes a scheme', async () => {
    await run('scheme', 'import', await writeScheme(), '-a')
    expect(output).toEqual([
      "Created color profile for scheme 'harbor'",
      "Imported scheme 'harbor' successfully.",
    ])
    await fs.access(path.join(ctx.config.profilesDir, 'harbor.json'))
  })

  it('reports schemes without profiles', async () => {
    await run('scheme', 'import', await writeScheme())
    output.length = 0
    await run('scheme', 'analyze', '--missing')
    expect(output).toEqual(["Created color profile for scheme 'harbor'"])
    output.length = 0
    await run('scheme', 'analyze', '--missing')
    expect(output).toEqual(['No schemes found without color profiles.'])
  })

  it('lists variants dark to light', async () => {
    await run('scheme', 'import', await writeScheme())
    output.length = 0
    await run('scheme', 'list')
    expect(output[0]).toBe('harbor')
    expect(output[1]).toContain(' night ')
    expect(output[2]).toContain(' day ')
  })

  it('applies a variant through wallust', async () => {
    await run('scheme', 'import', await writeScheme())
    output.length = 0
    await run('scheme', 'apply', 'harbor:light')
    expect(output[0]).toBe('Applied harbor - day (light)')
    expect(runner.calls).toHaveLength(1)
    expect(runner.calls[0].command).toBe('wallust')
    expect(runner.calls[0].args.slice(0, 1)).toEqual(['cs'])
  })

  it('rejects an unknown variant', async () => {
    await run('scheme', 'import', await writeScheme())
    await expect(run('scheme', 'apply', 'harbor:noon')).rejects.toThrow(InvalidInputError)
  })

  it('sets matching wallpapers on every display', async () => {
    await run('scheme', 'import', await writeScheme())
    const wallpaper = await importWallpaper(ctx.config, await writeHalves('night.png', '#101820', '#e06070'), { type: 'dark' })
    await analyzeWallpaper(ctx.config, wallpaper.id)
    runner.respond('xrandr', 'DP-1 connected primary 64x48+0+0 (normal left inverted right) 0mm x 0mm\n')
    output.length = 0

    await run('scheme', 'apply', 'harbor:night', '--wallpapers')

    expect(runner.calls.map(c => c.command)).toEqual(['wallust', 'xrandr', 'feh'])
    expect(runner.calls[2].args).toEqual(['--bg-fill', wallpaperPath(ctx.config, wallpaper)])
    expect(output[0]).toBe('Applied harbor - night (dark)')
    expect(output[1]).toBe('Successfully set wallpapers for 1 displays')
  })

  it('says so when no wallpaper fits the displays', async () => {
    await run('scheme', 'import', await writeScheme())
    const wallpaper = await importWallpaper(ctx.config, await writeHalves('tiny.png', '#101820', '#e06070', 8, 8), { type: 'dark' })
    await analyzeWallpaper(ctx.config, wallpaper.id)
    runner.respond('xrandr', 'DP-1 connected primary 64x48+0+0 (normal left inverted right) 0mm x 0mm\n')
    output.length = 0

    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    try {
      await run('scheme', 'apply', 'harbor:night', '-w')
    } finally {
      warn.mockRestore()
    }

    expect(output[output.length - 1]).toBe('No suitable wallpapers found for any display')
    expect(runner.calls.map(c => c.command)).toEqual(['wallust', 'xrandr'])
  })

  it('prints wallpaper metadata as JSON', async () => {
    const wallpaper = await importWallpaper(ctx.config, await writeHalves('sea.png', '#2040a0', '#ffffff'), { type: 'both' })
    await run('wallpaper', 'list', '--format', 'json')
    const listed: unknown = JSON.parse(output.join('\n'))
    expect(listed).toEqual([{ ...wallpaper, filesizeMb: wallpaper.filesize / 1024 / 1024 }])
  })

  it('opens a wallpaper with the desktop viewer', async () => {
    const wallpaper = await importWallpaper(ctx.config, await writeHalves('sea.png', '#2040a0', '#ffffff'), { name: 'sea', type: 'both' })
    await run('wallpaper', 'show', 'sea', '--open', '--format', 'json')
    const file = wallpaperPath(ctx.config, wallpaper)
    expect(output[output.length - 1]).toBe(`Opening wallpaper: ${file}`)
    expect(runner.calls).toEqual([{ command: ctx.config.tools.opener, args: [file], detached: false }])
  })

  it('extracts and names a palette', async () => {
    await run('palette', await writeHalves('flag.png', '#ff0000', '#0000ff'), '-k', '2', '--names', '--seed', 'flag')
    expect(output).toHaveLength(2)
    expect(output.map(line => line.split(' ').pop()).sort()).toEqual(['blue', 'red'])
  })

  it('validates the debug level', async () => {
    await expect(run('-D', '5', 'scheme', 'list')).rejects.toThrow('Must be 0, 1 or 2.')
  })
})
