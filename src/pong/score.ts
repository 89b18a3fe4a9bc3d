// Large 3x5 block digits for the scoreboard.

import type { FieldConfig } from './config'
import { centerColumn } from './config'
import { DIGIT_GLYPHS, DIGIT_PITCH } from './constants'

export const GLYPH_ROWS = 5

/** Bitmap for a single digit, or undefined when `digit` is not 0-9 */
export function digitGlyph(digit: number): readonly string[] | undefined {
  if (!Number.isInteger(digit) || digit < 0 || digit > 9) return undefined
  return DIGIT_GLYPHS[digit]
}

/**
 * Render a non-negative score as five text rows, digits separated by one blank column.
 * Characters that are not digits are skipped.
 */
export function renderScore(score: number): string[] {
  const rows: string[] = Array.from({ length: GLYPH_ROWS }, () => '')
  const glyphs = String(Math.max(0, Math.trunc(score)))
    .split('')
    .map((ch) => digitGlyph(Number(ch)))
  glyphs.forEach((glyph, i) => {
    if (!glyph) return
    for (let r = 0; r < GLYPH_ROWS; r++) {
      rows[r] += (i > 0 ? ' ' : '') + glyph[r]
    }
  })
  return rows
}

export function scoreWidth(score: number): number {
  return String(Math.max(0, Math.trunc(score))).length * DIGIT_PITCH - 1
}

export interface ScorePlacement {
  x: number
  y: number
  rows: string[]
}

// Left score ends two columns before the net, right score starts three after it.
export function scoreLayout(leftScore: number, rightScore: number, config: FieldConfig): [ScorePlacement, ScorePlacement] {
  const center = centerColumn(config)
  return [
    { x: center - 2 - scoreWidth(leftScore), y: 1, rows: renderScore(leftScore) },
    { x: center + 3, y: 1, rows: renderScore(rightScore) },
  ]
}
