import { describe, it, expect } from 'vitest'
import { selectDiverse, sortColors } from './paletteOperations'
import { InvalidInputError } from '../errors'

describe('selectDiverse', () => {
  const colors = ['#ff0000', '#fe0101', '#00ff00', '#0000ff']

  it('picks the farthest color after the first', () => {
    expect(selectDiverse(colors, 2)).toEqual(['#ff0000', '#00ff00'])
  })

  it('skips near duplicates while others remain', () => {
    expect(selectDiverse(colors, 3)).toEqual(['#ff0000', '#00ff00', '#0000ff'])
  })

  it('returns a copy of short input', () => {
    const short = ['#123456', '#654321']
    const result = selectDiverse(short, 4)
    expect(result).toEqual(short)
    expect(result).not.toBe(short)
  })

  it('lets the earlier color win a tie', () => {
    expect(selectDiverse(['#000000', '#ffffff', '#ffffff', '#808080'], 2)).toEqual(['#000000', '#ffffff'])
  })

  it('returns nothing for n of zero', () => {
    expect(selectDiverse(colors, 0)).toEqual([])
  })

  it('rejects fractional and negative sizes', () => {
    expect(() => selectDiverse(colors, 2.5)).toThrow(InvalidInputError)
    expect(() => selectDiverse(colors, -1)).toThrow('Selection size must be a non-negative integer, got -1')
    expect(() => selectDiverse([], 1.5)).toThrow(InvalidInputError)
  })
})

describe('sortColors', () => {
  it('puts grays first, then orders by hue and lightness', () => {
    expect(sortColors(['#0000ff', '#808080', '#ff0000', '#000000', '#00ff00', '#800000']))
      .toEqual(['#000000', '#808080', '#800000', '#ff0000', '#00ff00', '#0000ff'])
  })

  it('leaves its input alone', () => {
    const input = ['#0000ff', '#ff0000']
    sortColors(input)
    expect(input).toEqual(['#0000ff', '#ff0000'])
  })
})
