import type { MatchSession, SessionStats } from './session'

export interface HeadlessSummary extends SessionStats {
  // Ticks at which a point was scored, in order
  pointTicks: number[]
}

// Run the match without a terminal; no pacing and no effects.
export function runHeadless(session: MatchSession, ticks: number): HeadlessSummary {
  const pointTicks: number[] = []
  for (let i = 0; i < ticks; i++) {
    const { point, state } = session.advance()
    if (point) pointTicks.push(state.tick)
  }
  return { ...session.stats(), pointTicks }
}

export function formatSummary(summary: HeadlessSummary): string {
  return (
    `${summary.ticks} ticks, score ${summary.leftScore}-${summary.rightScore} (${summary.points} points), ` +
    `${summary.paddleHits} paddle returns, ${summary.wallHits} wall bounces`
  )
}
