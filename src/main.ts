#!/usr/bin/env node
/**
 * AutoPong CLI
 * Two AI paddles playing Pong in the terminal, or headless for a fixed number of ticks.
 */

import { Command } from 'commander'
import { parseFieldConfig, parseRunOptions, ConfigError, type FieldConfig, type RunOptions } from './pong/config'
import { MatchSession } from './pong/session'
import { systemRandom, seededRandom } from './pong/random'
import { runHeadless, formatSummary } from './pong/headless'
import { runFrameLoop } from './pong/loop'
import { FrameRate } from './pong/pacing'
import { SoundBoard } from './pong/sound'
import { TerminalScreen } from './terminal/screen'

interface CliOptions {
  fps?: string
  sound?: boolean
  seed?: string
  width?: string
  height?: string
  paddleHeight?: string
  paddleSpeed?: string
  headless?: boolean
  ticks?: string
  json?: boolean
}

// Commander hands us strings; zod decides whether they are acceptable numbers.
function numeric(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value)
}

function loadConfig(cli: CliOptions): { field: FieldConfig; options: RunOptions } {
  const field = parseFieldConfig({
    width: numeric(cli.width),
    height: numeric(cli.height),
    paddleHeight: numeric(cli.paddleHeight),
    paddleSpeed: numeric(cli.paddleSpeed),
  })
  const options = parseRunOptions({
    fps: numeric(cli.fps),
    sound: cli.sound,
    seed: numeric(cli.seed),
    headless: cli.headless,
    ticks: numeric(cli.ticks),
    json: cli.json,
  })
  return { field, options }
}

async function play(session: MatchSession, options: RunOptions): Promise<void> {
  const screen = new TerminalScreen()
  const sound = new SoundBoard(screen, options.sound)
  const rate = new FrameRate(options.fps)

  screen.open()
  try {
    await runFrameLoop({ session, display: screen, keys: screen, sound, rate })
  } finally {
    screen.close()
  }

  const stats = session.close()
  console.log(`[Pong] Session ended after ${stats.ticks} ticks, score ${stats.leftScore}-${stats.rightScore}`)
}

async function run(cli: CliOptions): Promise<void> {
  let config: { field: FieldConfig; options: RunOptions }
  try {
    config = loadConfig(cli)
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[Pong] ${err.message}`)
      process.exitCode = 1
      return
    }
    throw err
  }

  const { field, options } = config
  const random = options.seed === undefined ? systemRandom : seededRandom(options.seed)
  const session = new MatchSession(field, random)

  if (options.headless) {
    const summary = runHeadless(session, options.ticks)
    session.close()
    console.log(options.json ? JSON.stringify(summary) : `[Pong] ${formatSummary(summary)}`)
    return
  }

  await play(session, options)
  // terminal-kit can keep stdin referenced after releasing it
  process.exit(process.exitCode ?? 0)
}

const program = new Command()

program
  .name('autopong')
  .description('AutoPong - the computer playing Pong against itself')
  .version('1.0.0')
  .option('--fps <n>', 'initial frame rate (15-120)')
  .option('--sound', 'start with sound effects on')
  .option('--seed <n>', 'seed the random source for a repeatable match')
  .option('--width <cells>', 'field width')
  .option('--height <cells>', 'field height')
  .option('--paddle-height <cells>', 'paddle height')
  .option('--paddle-speed <cells>', 'paddle cells per tick')
  .option('--headless', 'simulate without a terminal and print a summary')
  .option('--ticks <n>', 'ticks to simulate in headless mode')
  .option('--json', 'print the headless summary as JSON')
  .action(run)

program.parseAsync().catch((err: unknown) => {
  console.error('[Pong] Fatal error:', err)
  process.exit(1)
})
