import type { StepResult } from './engine'
import { MIN_BOUNCE_TONE_INTERVAL_MS, SCORE_PAUSE_MS } from './constants'

/** What the terminal can do for us: a short tone and a brief flash */
export interface Alerts {
  tone(): void
  flash(pauseMs: number): Promise<void>
}

export type SoundEvent = 'score' | 'bounce' | null

// Score beats bounce; a bounce is a sign flip of vx without a point.
export function soundEventFor(prevVx: number, result: StepResult): SoundEvent {
  if (result.point) return 'score'
  if (prevVx * result.state.vx < 0) return 'bounce'
  return null
}

/**
 * Sound toggle plus rate limiting for paddle tones.
 * Effects only play while sound is on and pacing is capped.
 */
export class SoundBoard {
  private enabledValue: boolean
  private lastToneAt = Number.NEGATIVE_INFINITY
  private readonly alerts: Alerts
  private readonly minToneIntervalMs: number

  constructor(alerts: Alerts, enabled = false, minToneIntervalMs = MIN_BOUNCE_TONE_INTERVAL_MS) {
    this.alerts = alerts
    this.enabledValue = enabled
    this.minToneIntervalMs = minToneIntervalMs
  }

  get enabled(): boolean {
    return this.enabledValue
  }

  toggle(): boolean {
    this.enabledValue = !this.enabledValue
    return this.enabledValue
  }

  /**
   * Play whatever the step calls for.
   * @returns the effect that actually played
   */
  async play(event: SoundEvent, nowMs: number, uncapped: boolean): Promise<SoundEvent> {
    if (!this.enabledValue || uncapped || event === null) return null
    if (event === 'score') {
      await this.alerts.flash(SCORE_PAUSE_MS)
      return 'score'
    }
    if (nowMs - this.lastToneAt < this.minToneIntervalMs) return null
    this.lastToneAt = nowMs
    this.alerts.tone()
    return 'bounce'
  }
}
