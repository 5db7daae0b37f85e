import { describe, it, expect } from 'vitest'
import {
  deltaE2000,
  perceptualDistance,
  similarity,
  yuvDistance,
} from './distanceMetrics'

describe('yuvDistance', () => {
  it('is Euclidean over the three coordinates', () => {
    expect(yuvDistance([0, 0, 0], [3, 4, 0])).toBe(5)
    expect(yuvDistance([1, 2, 3], [1, 2, 3])).toBe(0)
  })
})

describe('deltaE2000', () => {
  it('matches published reference pairs', () => {
    // Sharma et al. test data, pairs 1 and 7
    expect(deltaE2000([50, 2.6772, -79.7751], [50, 0, -82.7485])).toBeCloseTo(2.0425, 3)
    expect(deltaE2000([50, 0, 0], [50, -1, 2])).toBeCloseTo(2.3669, 3)
  })

  it('is zero for identical input', () => {
    expect(deltaE2000([42, 10, -20], [42, 10, -20])).toBe(0)
  })
})

describe('perceptualDistance', () => {
  it('is symmetric', () => {
    const pairs: Array<[string, string]> = [
      ['#336699', '#ff8800'],
      ['#1e1e2e', '#f5e0dc'],
      ['#00ff00', '#ff00ff'],
    ]
    for (const [a, b] of pairs) {
      expect(perceptualDistance(a, b)).toBe(perceptualDistance(b, a))
    }
  })

  it('is zero for the same color in any spelling', () => {
    expect(perceptualDistance('#abc', '#AABBCC')).toBe(0)
  })

  it('ranks primaries the usual way', () => {
    expect(perceptualDistance('#000000', '#ffffff')).toBeCloseTo(100, 1)
    expect(perceptualDistance('#ff0000', '#00ff00')).toBeCloseTo(86.6, 0)
    expect(perceptualDistance('#ff0000', '#0000ff')).toBeCloseTo(52.9, 0)
  })
})

describe('similarity', () => {
  it('maps distance into (0, 1]', () => {
    expect(similarity(0)).toBe(1)
    expect(similarity(1)).toBe(0.5)
    expect(similarity(3)).toBe(0.25)
  })
})

describe('colorDistance exports', () => {
  it('offers only the metrics the engine uses', async () => {
    const barrel = await import('./index')
    expect(['rgbDistance', 'labDistance', 'labDistanceFromTuples'].filter(name => name in barrel)).toEqual([])
    expect(typeof barrel.perceptualDistance).toBe('function')
  })
})
