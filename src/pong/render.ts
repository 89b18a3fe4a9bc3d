// Field rendering: every cell is decided independently from one snapshot.
// Precedence per cell: border, paddles, ball, net, empty.

import type { MatchState } from './engine'
import type { FieldConfig } from './config'
import { centerColumn, paddleColumn } from './config'

export type CellKind = 'border' | 'paddle' | 'ball' | 'net' | 'empty'

export type GlyphSet = Readonly<Record<CellKind, string>>

export const DEFAULT_GLYPHS: GlyphSet = Object.freeze({
  border: '▀',
  paddle: '█',
  ball: '█',
  net: '█',
  empty: ' ',
})

export function cellAt(x: number, y: number, state: MatchState, config: FieldConfig): CellKind {
  if (y === 0 || y === config.height - 1) return 'border'
  if (x === paddleColumn('left', config) && y >= state.leftY && y < state.leftY + config.paddleHeight) return 'paddle'
  if (x === paddleColumn('right', config) && y >= state.rightY && y < state.rightY + config.paddleHeight) return 'paddle'
  if (x === state.ballX && y === state.ballY) return 'ball'
  if (x === centerColumn(config) && y % 3 === 1) return 'net'
  return 'empty'
}

/** Rows of cell kinds, top to bottom, produced on demand */
export function* renderCells(state: MatchState, config: FieldConfig): Generator<CellKind[]> {
  for (let y = 0; y < config.height; y++) {
    const row: CellKind[] = []
    for (let x = 0; x < config.width; x++) {
      row.push(cellAt(x, y, state, config))
    }
    yield row
  }
}

/** The field as `height` strings of `width` characters each */
export function* renderFrame(state: MatchState, config: FieldConfig, glyphs: GlyphSet = DEFAULT_GLYPHS): Generator<string> {
  for (const row of renderCells(state, config)) {
    yield row.map((kind) => glyphs[kind]).join('')
  }
}
