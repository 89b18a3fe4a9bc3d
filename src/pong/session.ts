import type { FieldConfig } from './config'
import { createMatch, stepMatch, type MatchState, type StepResult } from './engine'
import { DEFAULT_AI, type AiTuning } from './ai'
import type { RandomSource } from './random'

export interface SessionStats {
  ticks: number
  leftScore: number
  rightScore: number
  points: number
  paddleHits: number
  wallHits: number
}

export interface SessionOptions {
  tuning?: AiTuning
  // Start from this snapshot instead of a freshly served match
  initial?: MatchState
}

/**
 * One running match. Owns its snapshot and random source; the shell only
 * ever sees immutable snapshots, one per advance().
 */
export class MatchSession {
  readonly config: FieldConfig
  private readonly random: RandomSource
  private readonly tuning: AiTuning
  private current: MatchState
  private paddleHits = 0
  private wallHits = 0
  private closed = false

  constructor(config: FieldConfig, random: RandomSource, options: SessionOptions = {}) {
    this.config = config
    this.random = random
    this.tuning = options.tuning ?? DEFAULT_AI
    this.current = options.initial ?? createMatch(config, random)
  }

  get state(): MatchState {
    return this.current
  }

  get isClosed(): boolean {
    return this.closed
  }

  // Step once and publish the new snapshot.
  advance(): StepResult {
    if (this.closed) {
      throw new Error('Match session is closed')
    }
    const result = stepMatch(this.current, this.config, this.random, this.tuning)
    if (result.paddleHit) this.paddleHits++
    if (result.wallHit) this.wallHits++
    this.current = result.state
    return result
  }

  stats(): SessionStats {
    return {
      ticks: this.current.tick,
      leftScore: this.current.leftScore,
      rightScore: this.current.rightScore,
      points: this.current.leftScore + this.current.rightScore,
      paddleHits: this.paddleHits,
      wallHits: this.wallHits,
    }
  }

  close(): SessionStats {
    this.closed = true
    return this.stats()
  }
}
