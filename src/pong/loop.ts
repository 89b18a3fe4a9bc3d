// Frame loop: one key, one step, one paint, effects, then wait out the frame.
// The loop owns no terminal code; it talks to a Display and a KeySource so it
// can run against a real terminal or a fake one.

import { setTimeout as delay, setImmediate as yieldToEventLoop } from 'node:timers/promises'
import type { FieldConfig } from './config'
import type { MatchState } from './engine'
import type { MatchSession, SessionStats } from './session'
import type { FrameRate } from './pacing'
import { soundEventFor, type SoundBoard } from './sound'

export type KeyAction = 'quit' | 'toggle-sound' | 'faster' | 'slower'

/** Everything a display needs to paint one frame */
export interface FrameView {
  state: MatchState
  config: FieldConfig
  soundOn: boolean
  rateLabel: string
}

export interface Display {
  draw(view: FrameView): void
}

export interface KeySource {
  // Next pending key name, or undefined; never waits
  nextKey(): string | undefined
}

export interface LoopOptions {
  session: MatchSession
  display: Display
  keys: KeySource
  sound: SoundBoard
  rate: FrameRate
  now?: () => number
  sleep?: (ms: number) => Promise<void>
  // Stop after this many frames (headless checks); unlimited when omitted
  maxFrames?: number
}

export function keyAction(key: string): KeyAction | null {
  switch (key) {
    case 'ESCAPE':
    case 'CTRL_C':
      return 'quit'
    case 's':
    case 'S':
      return 'toggle-sound'
    case '+':
      return 'faster'
    case '-':
      return 'slower'
    default:
      return null
  }
}

async function defaultSleep(ms: number): Promise<void> {
  if (ms > 0) await delay(ms)
  // Uncapped frames still let key events in
  else await yieldToEventLoop()
}

/**
 * Run frames until quit (or maxFrames).
 * @returns the session's statistics at the moment the loop stopped
 */
export async function runFrameLoop(options: LoopOptions): Promise<SessionStats> {
  const { session, display, keys, sound, rate } = options
  const now = options.now ?? (() => performance.now())
  const sleep = options.sleep ?? defaultSleep
  let measuredFps = rate.fps
  let frames = 0
  let last = now()

  while (options.maxFrames === undefined || frames < options.maxFrames) {
    const key = keys.nextKey()
    const action = key === undefined ? null : keyAction(key)
    if (action === 'quit') break
    if (action === 'toggle-sound') sound.toggle()
    else if (action === 'faster') rate.faster()
    else if (action === 'slower') rate.slower()

    const frameStart = now()
    const prevVx = session.state.vx
    const result = session.advance()

    display.draw({
      state: result.state,
      config: session.config,
      soundOn: sound.enabled,
      rateLabel: rate.label(measuredFps),
    })

    await sound.play(soundEventFor(prevVx, result), now(), rate.uncapped)

    const finished = now()
    const frameTime = finished - frameStart
    if (frameTime > 0) measuredFps = 1000 / frameTime

    // Pace against the end of the previous frame, not this frame's start
    await sleep(rate.uncapped ? 0 : rate.remainingMs(finished - last))
    last = now()
    frames++
  }

  return session.stats()
}
