import { DEFAULT_FPS, MIN_FPS, MAX_FPS } from './constants'

/**
 * Target frame rate with an uncapped mode above the cap.
 * '+' doubles up to MAX_FPS, then uncaps; '-' re-caps at MAX_FPS, or halves down to MIN_FPS.
 */
export class FrameRate {
  private fpsValue: number
  private uncappedValue = false

  constructor(initialFps: number = DEFAULT_FPS) {
    this.fpsValue = Math.max(MIN_FPS, Math.min(MAX_FPS, Math.round(initialFps)))
  }

  get fps(): number {
    return this.fpsValue
  }

  get uncapped(): boolean {
    return this.uncappedValue
  }

  faster(): void {
    if (this.uncappedValue) return
    if (this.fpsValue >= MAX_FPS) {
      this.uncappedValue = true
      return
    }
    this.fpsValue = Math.min(MAX_FPS, this.fpsValue * 2)
  }

  slower(): void {
    if (this.uncappedValue) {
      this.uncappedValue = false
      this.fpsValue = MAX_FPS
      return
    }
    const half = Math.floor(this.fpsValue / 2)
    if (half >= MIN_FPS) this.fpsValue = half
  }

  // Milliseconds per frame; 0 when uncapped
  frameIntervalMs(): number {
    return this.uncappedValue ? 0 : 1000 / this.fpsValue
  }

  // How long to wait after a frame that took `elapsedMs`
  remainingMs(elapsedMs: number): number {
    return Math.max(0, this.frameIntervalMs() - elapsedMs)
  }

  label(measuredFps: number): string {
    return this.uncappedValue ? `${Math.floor(measuredFps)} fps MAX` : `${this.fpsValue} fps`
  }
}
