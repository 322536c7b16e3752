import type { TideEvent } from './types.js'

export const DEFAULT_TIDE_WINDOW_HOURS = 2

export type LowTideMatch =
  | { qualifies: true; lowTideAtMs: number }
  | { qualifies: false }

function parseTideTime(event: TideEvent): Date | null {
  const at = new Date(event.time)
  return Number.isNaN(at.getTime()) ? null : at
}

// TODO: switch to nearest-match once alert recipients confirm they want it.
/**
 * First low tide, in series order, within `windowHours` of `target`.
 *
 * This is a first-match scan: a closer low tide later in the series does
 * not replace an earlier one that is already inside the window.
 */
export function findLowTideWithin(
  target: Date,
  events: TideEvent[],
  windowHours = DEFAULT_TIDE_WINDOW_HOURS,
): LowTideMatch {
  const t = target.getTime()
  if (Number.isNaN(t)) return { qualifies: false }

  for (const event of events) {
    if (event.type !== 'low') continue
    const at = parseTideTime(event)
    if (!at) continue

    const diffHours = Math.abs(at.getTime() - t) / (60 * 60 * 1000)
    if (diffHours <= windowHours) {
      return { qualifies: true, lowTideAtMs: at.getTime() }
    }
  }

  return { qualifies: false }
}
