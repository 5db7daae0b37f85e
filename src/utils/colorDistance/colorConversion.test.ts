import { describe, it, expect } from 'vitest'
import {
  brightness,
  hexToHsl,
  hexToLab,
  hexToRgb,
  isColor,
  normalizeHex,
  rgbToHex,
  rgbToYuv,
  yuvToHex,
} from './colorConversion'
import { InvalidColorError } from '../errors'

function channelDiffs(a: string, b: string): number[] {
  const [r1, g1, b1] = hexToRgb(a)
  const [r2, g2, b2] = hexToRgb(b)
  return [Math.abs(r1 - r2), Math.abs(g1 - g2), Math.abs(b1 - b2)]
}

describe('hexToRgb', () => {
  it('parses six and three digit hex', () => {
    expect(hexToRgb('#336699')).toEqual([0x33, 0x66, 0x99])
    expect(hexToRgb('#FFF')).toEqual([255, 255, 255])
    expect(hexToRgb('1e1e2e')).toEqual([0x1e, 0x1e, 0x2e])
  })

  it('rejects anything that is not hex', () => {
    expect(() => hexToRgb('rgb(1,2,3)')).toThrow(InvalidColorError)
    expect(() => hexToRgb('#12345')).toThrow(InvalidColorError)
    expect(() => hexToRgb('#gggggg')).toThrow('Invalid color "#gggggg"')
  })
})

describe('normalizeHex / isColor', () => {
  it('lowercases and expands', () => {
    expect(normalizeHex('#ABC')).toBe('#aabbcc')
    expect(normalizeHex('#FF8800')).toBe('#ff8800')
  })

  it('recognizes valid colors only', () => {
    expect(isColor('#a1b2c3')).toBe(true)
    expect(isColor('red')).toBe(false)
    expect(isColor(42)).toBe(false)
  })
})

describe('rgbToHex', () => {
  it('rounds and clamps channels', () => {
    expect(rgbToHex(0, 127.6, 300)).toBe('#0080ff')
    expect(rgbToHex(-5, 0, 15)).toBe('#00000f')
  })
})

describe('rgbToYuv / yuvToHex', () => {
  it('uses BT.601 coefficients', () => {
    const [y, u, v] = rgbToYuv(255, 0, 0)
    expect(y).toBeCloseTo(76.245, 6)
    expect(u).toBeCloseTo(-37.51815, 6)
    expect(v).toBeCloseTo(156.825, 6)
  })

  it('maps black to the origin', () => {
    expect(rgbToYuv(0, 0, 0)[0]).toBe(0)
    expect(yuvToHex(0, 0, 0)).toBe('#000000')
  })

  it('round-trips within one unit per channel', () => {
    const samples = ['#336699', '#ffffff', '#ff0000', '#00ff00', '#0000ff', '#7f7f7f', '#1e1e2e', '#f5e0dc', '#010203']
    for (const color of samples) {
      const [r, g, b] = hexToRgb(color)
      const back = yuvToHex(...rgbToYuv(r, g, b))
      for (const diff of channelDiffs(color, back)) {
        expect(diff).toBeLessThanOrEqual(1)
      }
    }
  })

  it('truncates instead of rounding', () => {
    // y alone maps straight to gray, 10.9 truncates to 10
    expect(yuvToHex(10.9, 0, 0)).toBe('#0a0a0a')
  })

  it('clamps out-of-range channels', () => {
    expect(yuvToHex(300, 0, 0)).toBe('#ffffff')
    expect(yuvToHex(-20, 0, 0)).toBe('#000000')
  })
})

describe('hexToLab', () => {
  it('puts white at L=100 and black at L=0', () => {
    const [L, a, b] = hexToLab('#ffffff')
    expect(L).toBeCloseTo(100, 2)
    expect(a).toBeCloseTo(0, 2)
    expect(b).toBeCloseTo(0, 2)
    expect(hexToLab('#000000')[0]).toBeCloseTo(0, 6)
  })
})

describe('hexToHsl / brightness', () => {
  it('reports hue in degrees', () => {
    const green = hexToHsl('#00ff00')
    expect(green.h).toBeCloseTo(120, 9)
    expect(green.s).toBe(1)
    expect(green.l).toBe(0.5)
    expect(hexToHsl('#808080').s).toBe(0)
  })

  it('measures brightness by luma', () => {
    expect(brightness('#000000')).toBe(0)
    expect(brightness('#ffffff')).toBeCloseTo(1, 9)
  })
})
