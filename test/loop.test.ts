import { describe, it, expect, vi } from 'vitest'
import { runFrameLoop, keyAction, type Display, type FrameView, type KeySource } from '../src/pong/loop'
import { MatchSession } from '../src/pong/session'
import { FrameRate } from '../src/pong/pacing'
import { SoundBoard, type Alerts } from '../src/pong/sound'
import { DEFAULT_FIELD } from '../src/pong/config'
import { DEFAULT_AI } from '../src/pong/ai'
import type { MatchState } from '../src/pong/engine'
import { scriptedRandom, seededRandom } from '../src/pong/random'

class RecordingDisplay implements Display {
  readonly views: FrameView[] = []
  draw(view: FrameView): void {
    this.views.push(view)
  }
}

class ScriptedKeys implements KeySource {
  private readonly queue: string[]
  constructor(keys: string[]) {
    this.queue = [...keys]
  }
  nextKey(): string | undefined {
    return this.queue.shift()
  }
}

const silentAlerts: Alerts = {
  tone: () => {},
  flash: async () => {},
}

function served(overrides: Partial<MatchState>): MatchState {
  return { tick: 0, leftY: 9, rightY: 9, ballX: 40, ballY: 12, vx: 1, vy: 0, leftScore: 0, rightScore: 0, ...overrides }
}

function recordingAlerts() {
  const tone = vi.fn()
  const flash = vi.fn(async (_pauseMs: number) => {})
  const alerts: Alerts = { tone, flash }
  return { alerts, tone, flash }
}

function setup(keys: string[], fps = 30) {
  const display = new RecordingDisplay()
  const sleep = vi.fn(async (_ms: number) => {})
  const options = {
    session: new MatchSession(DEFAULT_FIELD, seededRandom(11)),
    display,
    keys: new ScriptedKeys(keys),
    sound: new SoundBoard(silentAlerts),
    rate: new FrameRate(fps),
    now: () => 0,
    sleep,
  }
  return { options, display, sleep }
}

describe('Frame Loop', () => {
  it('should map keys to actions', () => {
    expect(keyAction('ESCAPE')).toBe('quit')
    expect(keyAction('CTRL_C')).toBe('quit')
    expect(keyAction('s')).toBe('toggle-sound')
    expect(keyAction('S')).toBe('toggle-sound')
    expect(keyAction('+')).toBe('faster')
    expect(keyAction('-')).toBe('slower')
    expect(keyAction('q')).toBeNull()
  })

  it('should quit before stepping when ESC is waiting', async () => {
    const { options, display } = setup(['ESCAPE'])
    const stats = await runFrameLoop(options)
    expect(stats.ticks).toBe(0)
    expect(display.views).toHaveLength(0)
  })

  it('should step, draw and pace once per frame', async () => {
    const { options, display, sleep } = setup([])
    const stats = await runFrameLoop({ ...options, maxFrames: 3 })
    expect(stats.ticks).toBe(3)
    expect(display.views.map((v) => v.state.tick)).toEqual([1, 2, 3])
    expect(sleep).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledWith(1000 / 30)
  })

  it('should show the sound toggle on the same frame', async () => {
    const { options, display } = setup(['s'])
    await runFrameLoop({ ...options, maxFrames: 2 })
    expect(display.views.map((v) => v.soundOn)).toEqual([true, true])
  })

  it('should raise the frame rate per key press', async () => {
    const { options, display } = setup(['+', '+'])
    await runFrameLoop({ ...options, maxFrames: 2 })
    expect(display.views.map((v) => v.rateLabel)).toEqual(['60 fps', '120 fps'])
  })

  it('should not wait between uncapped frames', async () => {
    const { options, display, sleep } = setup(['+'], 120)
    await runFrameLoop({ ...options, maxFrames: 1 })
    expect(display.views[0].rateLabel).toBe('120 fps MAX')
    expect(sleep).toHaveBeenCalledWith(0)
  })

  it('should stop at a quit key after some frames', async () => {
    const { options, display } = setup(['-', 'x', 'ESCAPE'])
    const stats = await runFrameLoop(options)
    expect(stats.ticks).toBe(2)
    expect(display.views[0].rateLabel).toBe('15 fps')
  })

  describe('Effects', () => {
    it('should ring once when a paddle returns the ball', async () => {
      const { alerts, tone, flash } = recordingAlerts()
      // Left paddle aims with offset 0 and the right one holds
      const session = new MatchSession(DEFAULT_FIELD, scriptedRandom([0.1, 0.99]), {
        initial: served({ ballX: 2, ballY: 9, vx: -1 }),
      })
      await runFrameLoop({
        session,
        display: new RecordingDisplay(),
        keys: new ScriptedKeys([]),
        sound: new SoundBoard(alerts, true),
        rate: new FrameRate(30),
        now: () => 0,
        sleep: async () => {},
        maxFrames: 1,
      })
      expect(session.state.vx).toBe(1)
      expect(tone).toHaveBeenCalledTimes(1)
      expect(flash).not.toHaveBeenCalled()
    })

    it('should flash and pause when a point is scored', async () => {
      const { alerts, tone, flash } = recordingAlerts()
      const session = new MatchSession(DEFAULT_FIELD, scriptedRandom([0.99, 0.99, 0.5, 0.5]), {
        initial: served({ ballX: 1, ballY: 3, vx: -1 }),
        tuning: { ...DEFAULT_AI, triggerZone: 0 },
      })
      const display = new RecordingDisplay()
      await runFrameLoop({
        session,
        display,
        keys: new ScriptedKeys([]),
        sound: new SoundBoard(alerts, true),
        rate: new FrameRate(30),
        now: () => 0,
        sleep: async () => {},
        maxFrames: 1,
      })
      expect(display.views[0].state.rightScore).toBe(1)
      expect(flash).toHaveBeenCalledWith(500)
      expect(tone).not.toHaveBeenCalled()
    })
  })
})
