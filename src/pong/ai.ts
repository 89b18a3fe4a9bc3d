import type { MatchState, Side } from './engine'
import type { FieldConfig } from './config'
import { clampPaddleTop } from './config'
import { pickWeighted, chance, type RandomSource } from './random'
import {
  AI_TRIGGER_ZONE,
  AI_TRICK_WEIGHTS,
  AI_AIM_OFFSETS,
  AI_TRACK_CHANCE,
  AI_DEAD_ZONE,
} from './constants'

export interface AiTuning {
  /** Cells from the wall within which an approaching ball triggers a trick shot */
  triggerZone: number
  /** Cumulative bucket probabilities; must end at 1 */
  trickWeights: readonly number[]
  /** Paddle-top offset above the ball for each bucket */
  aimOffsets: readonly number[]
  /** Probability of tracking the ball at all on a given tick */
  trackChance: number
  /** Rows at each paddle end the tracker ignores */
  deadZone: number
}

export const DEFAULT_AI: AiTuning = Object.freeze({
  triggerZone: AI_TRIGGER_ZONE,
  trickWeights: AI_TRICK_WEIGHTS,
  aimOffsets: AI_AIM_OFFSETS,
  trackChance: AI_TRACK_CHANCE,
  deadZone: AI_DEAD_ZONE,
})

// Is the ball heading for this side and already inside its trigger zone?
export function isBallClosing(side: Side, state: MatchState, config: FieldConfig, tuning: AiTuning = DEFAULT_AI): boolean {
  if (side === 'left') return state.vx < 0 && state.ballX <= tuning.triggerZone
  return state.vx > 0 && state.ballX >= config.width - 1 - tuning.triggerZone
}

// Trick shot: line the paddle up so the ball lands on a chosen hit zone.
export function aimPaddle(state: MatchState, config: FieldConfig, random: RandomSource, tuning: AiTuning = DEFAULT_AI): number {
  const bucket = pickWeighted(tuning.trickWeights, random)
  const offset = tuning.aimOffsets[bucket] ?? 0
  return clampPaddleTop(state.ballY - offset, config)
}

// Defensive tracking: step toward the ball unless it is already inside the paddle's middle.
export function trackBall(paddleY: number, state: MatchState, config: FieldConfig, tuning: AiTuning = DEFAULT_AI): number {
  if (state.ballY < paddleY + tuning.deadZone) {
    return clampPaddleTop(paddleY - config.paddleSpeed, config)
  }
  if (state.ballY > paddleY + config.paddleHeight - 1 - tuning.deadZone) {
    return clampPaddleTop(paddleY + config.paddleSpeed, config)
  }
  return clampPaddleTop(paddleY, config)
}

/**
 * Next paddle-top position for one side.
 * Uses exactly one draw from the random source: the trick bucket when the ball
 * is closing in, otherwise the track-or-hold roll.
 */
export function decidePaddle(
  side: Side,
  state: MatchState,
  config: FieldConfig,
  random: RandomSource,
  tuning: AiTuning = DEFAULT_AI
): number {
  const current = side === 'left' ? state.leftY : state.rightY
  if (isBallClosing(side, state, config, tuning)) {
    return aimPaddle(state, config, random, tuning)
  }
  if (chance(tuning.trackChance, random)) {
    return trackBall(current, state, config, tuning)
  }
  // Holding still is part of the imperfection; still keep the paddle on the field.
  return clampPaddleTop(current, config)
}
