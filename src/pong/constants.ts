// Game configuration constants
// Field sizes are in terminal cells; every value here can be overridden from the CLI
// except the AI tuning and the digit glyphs.

/** Field width (cells) */
export const WIDTH = 80

/** Field height (cells), borders included */
export const HEIGHT = 25

/** Paddle height (cells) */
export const PADDLE_HEIGHT = 7

/** Maximum paddle movement per tick (cells) */
export const PADDLE_SPEED = 2

/** Column of the left paddle; the right paddle mirrors it at WIDTH - 1 - PADDLE_COLUMN */
export const PADDLE_COLUMN = 1

/** Serve row spread around the vertical centre: ball starts within ±SERVE_SPREAD rows */
export const SERVE_SPREAD = 3

/** Every vertical speed the ball can take, slowest upward to steepest downward */
export const VERTICAL_SPEEDS = [-2, -1, 0, 1, 2] as const

// AI tuning
// Treat these as gameplay knobs: the aim offsets and hit zones are tuned together.

/** Distance (cells) from a paddle's edge at which the AI stops defending and aims */
export const AI_TRIGGER_ZONE = 5

/** Cumulative probabilities of the five trick-shot buckets */
export const AI_TRICK_WEIGHTS = [0.25, 0.5, 0.55, 0.75, 1.0] as const

/** Rows between paddle top and ball for each trick-shot bucket (top edge .. bottom edge) */
export const AI_AIM_OFFSETS = [0, 1, 3, 5, 6] as const

/** Chance per tick that a far-away ball is tracked at all */
export const AI_TRACK_CHANCE = 0.85

/** Rows at each end of the paddle inside which the AI does not react */
export const AI_DEAD_ZONE = 2

// Frame pacing

/** Initial frame rate (frames/second) */
export const DEFAULT_FPS = 30

/** Lowest frame rate '-' can reach */
export const MIN_FPS = 15

/** Highest capped frame rate; '+' beyond it switches to uncapped mode */
export const MAX_FPS = 120

// Effects

/** Paddle tones are dropped when closer together than this (ms); 120 per second */
export const MIN_BOUNCE_TONE_INTERVAL_MS = 1000 / 120

/** Pause after a point while the screen flashes (ms) */
export const SCORE_PAUSE_MS = 500

/** Default number of ticks for a headless run */
export const DEFAULT_HEADLESS_TICKS = 10000

// Score digits, 3 wide by 5 tall
export const DIGIT_GLYPHS: readonly (readonly string[])[] = [
  ['███', '█ █', '█ █', '█ █', '███'],
  [' █ ', '██ ', ' █ ', ' █ ', '███'],
  ['███', '  █', '███', '█  ', '███'],
  ['███', '  █', '███', '  █', '███'],
  ['█ █', '█ █', '███', '  █', '  █'],
  ['███', '█  ', '███', '  █', '███'],
  ['███', '█  ', '███', '█ █', '███'],
  ['███', '  █', '  █', '  █', '  █'],
  ['███', '█ █', '███', '█ █', '███'],
  ['███', '█ █', '███', '  █', '███'],
]

/** Width of one digit glyph plus the blank column that follows it */
export const DIGIT_PITCH = 4
