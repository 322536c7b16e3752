import { formatHour, formatTimeRange } from './time.js'
import type { ConditionRange, QualifyingInstant } from './types.js'
import { degreesToCardinal, msToKph, roundTo } from './utils.js'

export interface GroupOptions {
  gapHours: number
  includeWind: boolean
  timeZone: string
}

function closeGroup(
  group: QualifyingInstant[],
  options: GroupOptions,
): ConditionRange {
  const first = group[0]
  const last = group[group.length - 1]

  const heights = group.map((c) => c.waveHeight)
  const waveHeight = `${Math.min(...heights).toFixed(1)}-${Math.max(...heights).toFixed(1)}m`

  const range: ConditionRange = {
    startMs: first.atMs,
    endMs: last.atMs,
    time: formatTimeRange(
      new Date(first.atMs),
      new Date(last.atMs),
      options.timeZone,
    ),
    waveHeight,
    lowTideTime: formatHour(new Date(first.lowTideAtMs), options.timeZone),
  }

  if (options.includeWind) {
    const speeds = group.map((c) => msToKph(c.windSpeed))
    range.wind = {
      speed: `${roundTo(Math.min(...speeds))}-${roundTo(Math.max(...speeds))}kph`,
      direction: degreesToCardinal(first.windDirection),
    }
  }

  return range
}

/**
 * Merges chronologically sorted instants into display ranges.
 *
 * An instant joins the open group when it is at most `gapHours` after the
 * group's last member; the scan never looks further back than that.
 */
export function groupConditions(
  instants: QualifyingInstant[],
  options: GroupOptions,
): ConditionRange[] {
  if (!instants.length) return []

  const maxGapMs = options.gapHours * 60 * 60 * 1000
  const ranges: ConditionRange[] = []
  let current: QualifyingInstant[] = [instants[0]]

  for (const instant of instants.slice(1)) {
    const previous = current[current.length - 1]
    if (instant.atMs - previous.atMs <= maxGapMs) {
      current.push(instant)
      continue
    }

    ranges.push(closeGroup(current, options))
    current = [instant]
  }

  ranges.push(closeGroup(current, options))
  return ranges
}
