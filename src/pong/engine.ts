// Deterministic, tick-driven Pong engine.
// Integer cell kinematics: one call to stepMatch advances the whole match by one frame.
// All randomness comes from the injected RandomSource, so a seeded or scripted
// source replays a match exactly.

import type { FieldConfig } from './config'
import { clampPaddleTop, centerColumn, paddleColumn } from './config'
import { decidePaddle, DEFAULT_AI, type AiTuning } from './ai'
import { randomInt, chance, type RandomSource } from './random'
import { SERVE_SPREAD, VERTICAL_SPEEDS } from './constants'

export type Side = 'left' | 'right'
export type Direction = -1 | 1
export type VerticalSpeed = (typeof VERTICAL_SPEEDS)[number]

export interface MatchState {
  readonly tick: number
  // Paddle tops: left is player A, right is player B
  readonly leftY: number
  readonly rightY: number
  readonly ballX: number
  readonly ballY: number
  readonly vx: Direction
  readonly vy: VerticalSpeed
  readonly leftScore: number
  readonly rightScore: number
}

export interface StepResult {
  state: MatchState
  // Who won a point this tick, if anyone
  point: Side | null
  // Which paddle returned the ball this tick, if any
  paddleHit: Side | null
  wallHit: boolean
}

export function toVerticalSpeed(n: number): VerticalSpeed {
  const index = Math.max(0, Math.min(VERTICAL_SPEEDS.length - 1, Math.round(n) + 2))
  return VERTICAL_SPEEDS[index]
}

// Bounce angle from where the ball meets the paddle, top row = 0.
// 0 → steep up, 1-2 → up, 3-4 → straight, 5 → down, 6+ → steep down
export function bounceSpeed(offset: number): VerticalSpeed {
  if (offset <= 0) return -2
  if (offset <= 2) return -1
  if (offset <= 4) return 0
  if (offset <= 5) return 1
  return 2
}

function serveRow(config: FieldConfig, random: RandomSource): number {
  const center = Math.floor(config.height / 2)
  const row = center + randomInt(-SERVE_SPREAD, SERVE_SPREAD, random)
  return Math.max(1, Math.min(config.height - 2, row))
}

function serveSpeed(random: RandomSource): VerticalSpeed {
  return toVerticalSpeed(randomInt(-2, 2, random))
}

/**
 * Fresh match: paddles centred, ball on the centre column at a random row,
 * heading a random way at a random angle.
 * Draw order: ball row, horizontal direction, vertical speed.
 */
export function createMatch(config: FieldConfig, random: RandomSource): MatchState {
  const paddleTop = clampPaddleTop(Math.floor((config.height - config.paddleHeight) / 2), config)
  const ballY = serveRow(config, random)
  const vx: Direction = chance(0.5, random) ? 1 : -1
  const vy = serveSpeed(random)
  return {
    tick: 0,
    leftY: paddleTop,
    rightY: paddleTop,
    ballX: centerColumn(config),
    ballY,
    vx,
    vy,
    leftScore: 0,
    rightScore: 0,
  }
}

function withinPaddle(y: number, paddleTop: number, config: FieldConfig): boolean {
  return y >= paddleTop && y <= paddleTop + config.paddleHeight - 1
}

/**
 * Advance the match by one tick.
 * Every stage reads only the state at entry and the stages before it; the new
 * snapshot is assembled at the end and the input is never touched.
 */
export function stepMatch(
  state: MatchState,
  config: FieldConfig,
  random: RandomSource,
  tuning: AiTuning = DEFAULT_AI
): StepResult {
  // 1. AI decides both paddles from the state at entry (left draws first)
  const leftY = decidePaddle('left', state, config, random, tuning)
  const rightY = decidePaddle('right', state, config, random, tuning)

  // 2. Ball moves by its velocity
  const nx = state.ballX + state.vx
  const ny = state.ballY + state.vy

  // 3. Top/bottom walls: touching the playable edge counts as a bounce
  const top = 1
  const bottom = config.height - 2
  const wallHit = ny <= top || ny >= bottom
  const wallY = Math.max(top, Math.min(bottom, ny))
  const wallVy = wallHit ? toVerticalSpeed(-state.vy) : state.vy

  // 4. Paddles, tested against where the AI just put them
  let vx: Direction = state.vx
  let vy: VerticalSpeed = wallVy
  let paddleHit: Side | null = null
  if (nx <= paddleColumn('left', config) && state.vx < 0 && withinPaddle(wallY, leftY, config)) {
    vx = 1
    vy = bounceSpeed(wallY - leftY)
    paddleHit = 'left'
  } else if (nx >= paddleColumn('right', config) && state.vx > 0 && withinPaddle(wallY, rightY, config)) {
    vx = -1
    vy = bounceSpeed(wallY - rightY)
    paddleHit = 'right'
  }

  // 5. Ball past a paddle column: point to the other side
  let point: Side | null = null
  if (nx < paddleColumn('left', config)) point = 'right'
  else if (nx > paddleColumn('right', config)) point = 'left'

  // 6. Assemble the next snapshot
  const tick = state.tick + 1
  if (point === null) {
    return {
      state: {
        tick,
        leftY,
        rightY,
        ballX: nx,
        ballY: wallY,
        vx,
        vy,
        leftScore: state.leftScore,
        rightScore: state.rightScore,
      },
      point,
      paddleHit,
      wallHit,
    }
  }

  // Serve from one cell on the conceding side of the net, heading toward the scorer
  const center = centerColumn(config)
  const scoredLeft = point === 'left'
  const ballY = serveRow(config, random)
  const serveVy = serveSpeed(random)
  return {
    state: {
      tick,
      leftY,
      rightY,
      ballX: scoredLeft ? center + 1 : center - 1,
      ballY,
      vx: scoredLeft ? -1 : 1,
      vy: serveVy,
      leftScore: state.leftScore + (scoredLeft ? 1 : 0),
      rightScore: state.rightScore + (scoredLeft ? 0 : 1),
    },
    point,
    // A ball past the column is out of play even if a paddle moved over it
    paddleHit: null,
    wallHit,
  }
}
