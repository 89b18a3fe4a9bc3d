import { z } from 'zod'
import {
  WIDTH,
  HEIGHT,
  PADDLE_HEIGHT,
  PADDLE_SPEED,
  PADDLE_COLUMN,
  AI_TRIGGER_ZONE,
  DEFAULT_FPS,
  MIN_FPS,
  MAX_FPS,
  DEFAULT_HEADLESS_TICKS,
} from './constants'

export interface FieldConfig {
  readonly width: number
  readonly height: number
  readonly paddleHeight: number
  readonly paddleSpeed: number
}

export const DEFAULT_FIELD: FieldConfig = Object.freeze({
  width: WIDTH,
  height: HEIGHT,
  paddleHeight: PADDLE_HEIGHT,
  paddleSpeed: PADDLE_SPEED,
})

/**
 * Raised once at startup when the field cannot be played on.
 * Never thrown from inside a running match.
 */
export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

const cells = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).int(`${label} must be a whole number`)

// Both trigger zones plus the two paddle columns and a net need to fit side by side.
const MIN_WIDTH = 2 * (AI_TRIGGER_ZONE + PADDLE_COLUMN + 1) + 1

export const fieldConfigSchema = z
  .object({
    width: cells('width').min(MIN_WIDTH, `width must be at least ${MIN_WIDTH}`),
    height: cells('height').min(5, 'height must be at least 5'),
    paddleHeight: cells('paddleHeight').min(1, 'paddleHeight must be at least 1'),
    paddleSpeed: cells('paddleSpeed').min(1, 'paddleSpeed must be at least 1'),
  })
  .refine((c) => c.paddleHeight <= c.height - 2, {
    // Paddle tops live in [1, height - paddleHeight - 1]; that range must not be empty.
    message: 'paddleHeight must leave room for the borders (paddleHeight <= height - 2)',
    path: ['paddleHeight'],
  })

/**
 * Validate a partial override on top of the defaults.
 * @throws ConfigError listing every problem found
 */
export function parseFieldConfig(overrides: Partial<Record<keyof FieldConfig, unknown>> = {}): FieldConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_FIELD }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value
  }
  const result = fieldConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message))
  }
  return Object.freeze(result.data)
}

// Highest row a paddle top may occupy
export function maxPaddleTop(config: FieldConfig): number {
  return config.height - config.paddleHeight - 1
}

export function clampPaddleTop(y: number, config: FieldConfig): number {
  return Math.max(1, Math.min(maxPaddleTop(config), y))
}

export function paddleColumn(side: 'left' | 'right', config: FieldConfig): number {
  return side === 'left' ? PADDLE_COLUMN : config.width - 1 - PADDLE_COLUMN
}

export function centerColumn(config: FieldConfig): number {
  return Math.floor(config.width / 2)
}

export interface RunOptions {
  fps: number
  sound: boolean
  seed?: number
  headless: boolean
  ticks: number
  json: boolean
}

export const runOptionsSchema = z.object({
  fps: cells('fps').min(MIN_FPS, `fps must be at least ${MIN_FPS}`).max(MAX_FPS, `fps must be at most ${MAX_FPS}`).default(DEFAULT_FPS),
  sound: z.boolean().default(false),
  seed: cells('seed').min(0, 'seed must not be negative').max(0xffffffff, 'seed must fit in 32 bits').optional(),
  headless: z.boolean().default(false),
  ticks: cells('ticks').min(1, 'ticks must be at least 1').default(DEFAULT_HEADLESS_TICKS),
  json: z.boolean().default(false),
})

/**
 * Validate the non-field CLI options.
 * @throws ConfigError listing every problem found
 */
export function parseRunOptions(raw: Record<string, unknown>): RunOptions {
  const result = runOptionsSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message))
  }
  return result.data
}
