import type { LowTideMatch } from './tides.js'
import type { ForecastSample, QualifyingInstant } from './types.js'
import { roundTo } from './utils.js'

export interface DiscardReasons {
  wave: number
  light: number
  tide: number
  duplicate: number
  invalid: number
}

export interface EvaluateOptions {
  waveHeightThreshold: number
  isDaylight: (at: Date) => boolean
  findLowTide: (at: Date) => LowTideMatch
}

export interface EvaluationResult {
  instants: QualifyingInstant[]
  discardReasons: DiscardReasons
}

export function emptyDiscardReasons(): DiscardReasons {
  return { wave: 0, light: 0, tide: 0, duplicate: 0, invalid: 0 }
}

function truncateToMinute(ms: number): number {
  return Math.floor(ms / (60 * 1000)) * 60 * 1000
}

export function evaluateConditions(
  samples: ForecastSample[],
  options: EvaluateOptions,
): EvaluationResult {
  const instants: QualifyingInstant[] = []
  const discardReasons = emptyDiscardReasons()
  const seen = new Set<number>()

  for (const sample of samples) {
    const at = new Date(sample.time)
    const atMs = at.getTime()
    if (Number.isNaN(atMs)) {
      discardReasons.invalid++
      continue
    }

    // First occurrence of a timestamp is authoritative, accepted or not.
    if (seen.has(atMs)) {
      discardReasons.duplicate++
      continue
    }

    if (sample.waveHeight == null) continue
    seen.add(atMs)

    const waveHeight = sample.waveHeight
    const windSpeed = sample.windSpeed ?? 0
    const windDirection = sample.windDirection ?? 0

    if (waveHeight < options.waveHeightThreshold) {
      discardReasons.wave++
      continue
    }

    if (!options.isDaylight(at)) {
      discardReasons.light++
      continue
    }

    const tide = options.findLowTide(at)
    if (!tide.qualifies) {
      discardReasons.tide++
      continue
    }

    instants.push({
      atMs: truncateToMinute(atMs),
      waveHeight: roundTo(waveHeight, 1),
      windSpeed: roundTo(windSpeed, 1),
      windDirection: roundTo(windDirection),
      lowTideAtMs: tide.lowTideAtMs,
    })
  }

  return { instants, discardReasons }
}
