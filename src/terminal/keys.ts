import type { KeySource } from '../pong/loop'

/** The part of a terminal that reports key presses by name */
export interface KeyEvents {
  on(event: 'key', listener: (name: string) => void): unknown
  off(event: 'key', listener: (name: string) => void): unknown
}

/**
 * Buffers key names between frames. Only listens while attached, so a closed
 * screen leaves no listener behind on the terminal.
 */
export class KeyQueue implements KeySource {
  private readonly pending: string[] = []
  private source: KeyEvents | null = null
  private readonly onKey = (name: string) => {
    this.pending.push(name)
  }

  get attached(): boolean {
    return this.source !== null
  }

  attach(source: KeyEvents): void {
    if (this.source) return
    source.on('key', this.onKey)
    this.source = source
  }

  detach(): void {
    if (!this.source) return
    this.source.off('key', this.onKey)
    this.source = null
    this.pending.length = 0
  }

  nextKey(): string | undefined {
    return this.pending.shift()
  }
}
