// Frame painting against an abstract Painter; no terminal code here.

import type { FrameView } from '../pong/loop'
import { renderCells, DEFAULT_GLYPHS, type CellKind, type GlyphSet } from '../pong/render'
import { scoreLayout } from '../pong/score'

export type Style = 'plain' | 'dim' | 'bold' | 'accent' | 'flash'

/** Zero-based text output onto a surface of the given size */
export interface Painter {
  readonly width: number
  readonly height: number
  // Only ever called with runs that fit on the surface
  write(x: number, y: number, text: string, style: Style): void
}

export const TITLE = 'AutoPong - the computer playing Pong against itself'

const CELL_STYLES: Readonly<Record<CellKind, Style>> = {
  border: 'dim',
  net: 'dim',
  paddle: 'bold',
  ball: 'bold',
  empty: 'plain',
}

// Clip a run to the visible area; anything off-screen is simply not drawn.
export function clipRun(x: number, y: number, text: string, width: number, height: number): { x: number; text: string } | null {
  if (y < 0 || y >= height || x >= width) return null
  const skip = Math.max(0, -x)
  const visible = text.slice(skip, skip + width - Math.max(0, x))
  if (visible.length === 0) return null
  return { x: Math.max(0, x), text: visible }
}

function put(painter: Painter, x: number, y: number, text: string, style: Style): void {
  const run = clipRun(x, y, text, painter.width, painter.height)
  if (run) painter.write(run.x, y, run.text, style)
}

// Split a row into runs of equal style so each run is one write.
export function styledRuns(row: readonly CellKind[], glyphs: GlyphSet = DEFAULT_GLYPHS): Array<{ x: number; text: string; style: Style }> {
  const runs: Array<{ x: number; text: string; style: Style }> = []
  row.forEach((kind, x) => {
    const style = CELL_STYLES[kind]
    const last = runs[runs.length - 1]
    if (last && last.style === style) last.text += glyphs[kind]
    else runs.push({ x, text: glyphs[kind], style })
  })
  return runs
}

export function paintFrame(painter: Painter, view: FrameView, flash = false): void {
  const { state, config } = view
  let y = 0
  for (const row of renderCells(state, config)) {
    for (const run of styledRuns(row)) {
      put(painter, run.x, y, run.text, flash ? 'flash' : run.style)
    }
    y++
  }

  for (const placement of scoreLayout(state.leftScore, state.rightScore, config)) {
    placement.rows.forEach((text, i) => put(painter, placement.x, placement.y + i, text, 'dim'))
  }

  const infoRow = config.height
  put(painter, 0, infoRow, TITLE.padEnd(config.width), 'accent')

  const status: Array<[string, Style]> = [
    ['Press ESC to exit, S for sound [', 'dim'],
    [view.soundOn ? 'ON' : 'OFF', 'accent'],
    ['], +/- for framerate [', 'dim'],
    [view.rateLabel, 'accent'],
    [']', 'dim'],
  ]
  let x = 0
  for (const [text, style] of status) {
    put(painter, x, infoRow + 1, text, style)
    x += text.length
  }
  if (x < config.width) put(painter, x, infoRow + 1, ' '.repeat(config.width - x), 'plain')
}
