/**
 * terminal-kit front end: paints frames, queues keys, plays the bell and the score flash.
 * The field uses the first `height` rows; two status rows follow it.
 */

import termKit from 'terminal-kit'
import { setTimeout as delay } from 'node:timers/promises'
import type { Display, FrameView, KeySource } from '../pong/loop'
import type { Alerts } from '../pong/sound'
import { paintFrame, type Painter } from './paint'
import { KeyQueue } from './keys'

type Term = typeof termKit.terminal

export function termPainter(term: Term): Painter {
  return {
    get width() {
      return term.width
    },
    get height() {
      return term.height
    },
    write(x, y, text, style) {
      // terminal-kit counts from 1
      term.moveTo(x + 1, y + 1)
      switch (style) {
        case 'dim':
          term.brightBlack(text)
          break
        case 'bold':
          term.bold.brightWhite(text)
          break
        case 'accent':
          term.yellow(text)
          break
        case 'flash':
          term.bgGreen.black(text)
          break
        default:
          term.styleReset(text)
      }
    },
  }
}

/**
 * Owns the terminal for the length of a session.
 * open() takes over the screen and keyboard, close() gives them back.
 */
export class TerminalScreen implements Display, KeySource, Alerts {
  private readonly term: Term
  private readonly painter: Painter
  private readonly keys = new KeyQueue()
  private lastView: FrameView | null = null
  private opened = false

  constructor(term: Term = termKit.terminal) {
    this.term = term
    this.painter = termPainter(term)
  }

  open(): void {
    if (this.opened) return
    this.term.fullscreen(true)
    this.term.hideCursor()
    this.term.grabInput(true)
    this.keys.attach(this.term)
    this.term.clear()
    this.opened = true
  }

  close(): void {
    if (!this.opened) return
    this.keys.detach()
    this.term.grabInput(false)
    this.term.styleReset()
    this.term.hideCursor(false)
    this.term.fullscreen(false)
    this.opened = false
  }

  nextKey(): string | undefined {
    return this.keys.nextKey()
  }

  draw(view: FrameView): void {
    this.lastView = view
    paintFrame(this.painter, view)
  }

  tone(): void {
    this.term.bell()
  }

  async flash(pauseMs: number): Promise<void> {
    if (this.lastView) paintFrame(this.painter, this.lastView, true)
    await delay(pauseMs)
    if (this.lastView) paintFrame(this.painter, this.lastView)
  }
}
