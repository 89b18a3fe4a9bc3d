import { describe, it, expect } from 'vitest'
import { digitGlyph, renderScore, scoreLayout, scoreWidth } from '../src/pong/score'
import { DEFAULT_FIELD, parseFieldConfig } from '../src/pong/config'

describe('Score Glyphs', () => {
  it('should map digits to 3x5 bitmaps', () => {
    expect(digitGlyph(0)).toEqual(['███', '█ █', '█ █', '█ █', '███'])
    expect(digitGlyph(7)).toEqual(['███', '  █', '  █', '  █', '  █'])
  })

  it('should ignore anything that is not a single digit', () => {
    expect(digitGlyph(10)).toBeUndefined()
    expect(digitGlyph(-1)).toBeUndefined()
    expect(digitGlyph(1.5)).toBeUndefined()
  })

  it('should render a single digit score as its glyph', () => {
    expect(renderScore(4)).toEqual(['█ █', '█ █', '███', '  █', '  █'])
  })

  it('should join digits with one blank column', () => {
    expect(renderScore(10)).toEqual([' █  ███', '██  █ █', ' █  █ █', ' █  █ █', '███ ███'])
    expect(scoreWidth(10)).toBe(7)
  })

  it('should right-align the left score before the net and start the right score after it', () => {
    const [left, right] = scoreLayout(3, 12, DEFAULT_FIELD)
    expect(left.x).toBe(35)
    expect(left.y).toBe(1)
    expect(right.x).toBe(43)
    expect(right.rows[0]).toBe(' █  ███')
  })

  it('should grow the left score leftwards', () => {
    const [left] = scoreLayout(10, 0, DEFAULT_FIELD)
    expect(left.x).toBe(31)
  })

  it('should follow the centre of a wider field', () => {
    const [left, right] = scoreLayout(0, 0, parseFieldConfig({ width: 100 }))
    expect(left.x).toBe(45)
    expect(right.x).toBe(53)
  })
})
