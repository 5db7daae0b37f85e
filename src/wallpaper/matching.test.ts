import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import type { MockInstance } from 'vitest'
import { assignWallpapers, getCompatibleWallpapers } from './matching'
import { listWallpapers } from './store'
import { resolveConfig } from '../config'
import { SchemeVariant } from '../types/scheme'
import { Display, WallpaperRecord } from '../types/wallpaper'

function wallpaper(id: string, overrides: Partial<WallpaperRecord> = {}): WallpaperRecord {
  return {
    id,
    name: id,
    type: 'dark',
    nameSource: 'filename',
    resolution: { width: 2560, height: 1440 },
    orientation: 'landscape',
    filesize: 2048,
    extension: '.jpg',
    hash: `hash-${id}`,
    ...overrides,
  }
}

const night: SchemeVariant = {
  name: 'night',
  type: 'dark',
  colors: {
    background: '#101820',
    color1: '#e06070',
    color2: '#70c080',
    color3: '#e0c070',
  },
}

const pathOf = (w: WallpaperRecord) => `/walls/${w.id}${w.extension}`

describe('getCompatibleWallpapers', () => {
  it('filters by type and ranks by the scheme colors', () => {
    const report = getCompatibleWallpapers(
      [
        wallpaper('bright', { type: 'light', colors: ['#101820'] }),
        wallpaper('off', { colors: ['#ffffff', '#ffff00'] }),
        wallpaper('match', { type: 'both', colors: ['#101820', '#e06070', '#70c080', '#e0c070'] }),
      ],
      night
    )
    expect(report.typeFiltered).toBe(1)
    expect(report.ranked.map(r => r.item.id)).toEqual(['match', 'off'])
    expect(report.ranked[0].score).toBe(1)
  })

  it('uses the variant background for the pre-filter', () => {
    const report = getCompatibleWallpapers(
      [
        wallpaper('dark-bg', { colors: ['#121a22', '#e06070'] }),
        wallpaper('light-bg', { colors: ['#f0f0f0', '#e06070'] }),
      ],
      night,
      { backgroundFilter: true }
    )
    expect(report.backgroundFiltered).toBe(1)
    expect(report.ranked.map(r => r.item.id)).toEqual(['dark-bg'])
  })

  it('skips a stored wallpaper with a malformed color and ranks the rest', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'colorweave-matching-'))
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    try {
      const config = resolveConfig({ COLORWEAVE_DIR: root })
      await fs.mkdir(config.wallpaperDir, { recursive: true })
      for (const [id, color] of [['good', '#101010'], ['bad', '#1010']]) {
        const stored = { ...wallpaper(id), colors: [color] }
        await fs.writeFile(path.join(config.wallpaperDir, `${id}.json`), JSON.stringify(stored))
      }

      const report = getCompatibleWallpapers(await listWallpapers(config), night)
      expect(report.ranked.map(r => r.item.id)).toEqual(['good'])
      expect(report.skipped.map(s => [s.item.id, s.reason])).toEqual([['bad', 'invalid-color']])
      expect(warn).toHaveBeenCalledWith('[Rank]', 'Candidate has an invalid color #1010, skipping')
    } finally {
      warn.mockRestore()
      await fs.rm(root, { recursive: true, force: true })
    }
  })
})

describe('assignWallpapers', () => {
  let warn: MockInstance<typeof console.warn>

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    warn.mockRestore()
  })

  const displays: Display[] = [
    { identifier: 'DP-1', width: 2560, height: 1440 },
    { identifier: 'HDMI-1', width: 1920, height: 1080 },
  ]

  it('gives each display the best wallpaper large enough for it', () => {
    const ranked = [
      wallpaper('small', { resolution: { width: 1920, height: 1080 } }),
      wallpaper('large'),
    ]
    expect(assignWallpapers(ranked, displays, { pathOf })).toEqual([
      { display: 'DP-1', wallpaper: '/walls/large.jpg' },
      { display: 'HDMI-1', wallpaper: '/walls/small.jpg' },
    ])
  })

  it('leaves out displays nothing fits and warns', () => {
    const ranked = [wallpaper('small', { resolution: { width: 1920, height: 1080 } })]
    expect(assignWallpapers(ranked, displays, { pathOf })).toEqual([
      { display: 'HDMI-1', wallpaper: '/walls/small.jpg' },
    ])
    expect(warn).toHaveBeenCalledWith('[Matching]', 'No suitable wallpaper found for display DP-1 (2560x1440)')
  })

  it('draws random picks from the top share only', () => {
    const ranked = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'].map(id => wallpaper(id))
    const single: Display[] = [displays[0]]
    // floor(10 * 0.2) = 2 candidates
    expect(assignWallpapers(ranked, single, { pathOf, random: true, rng: () => 0.99 })).toEqual([
      { display: 'DP-1', wallpaper: '/walls/b.jpg' },
    ])
    expect(assignWallpapers(ranked, single, { pathOf, random: true, rng: () => 0 })).toEqual([
      { display: 'DP-1', wallpaper: '/walls/a.jpg' },
    ])
  })

  it('keeps at least one candidate for tiny thresholds', () => {
    const ranked = ['a', 'b', 'c'].map(id => wallpaper(id))
    expect(assignWallpapers(ranked, [displays[0]], { pathOf, random: true, filterThreshold: 0.01, rng: () => 0.99 }))
      .toEqual([{ display: 'DP-1', wallpaper: '/walls/a.jpg' }])
  })

  it('returns nothing without displays', () => {
    expect(assignWallpapers([wallpaper('a')], [], { pathOf })).toEqual([])
  })
})
