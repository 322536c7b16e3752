import SunCalc from 'suncalc'
import type { Location } from './types.js'

export const DAYLIGHT_PADDING_MINUTES = 30

export interface DaylightWindow {
  startMs: number
  endMs: number
}

function utcNoonOf(at: Date): Date {
  return new Date(
    Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate(), 12),
  )
}

/**
 * Padded daylight window for the UTC calendar day of `at`.
 *
 * Returns null when the sun does not rise or set on that day at the
 * location (polar day or night), or when padding leaves nothing.
 */
export function daylightWindow(
  at: Date,
  location: Pick<Location, 'latitude' | 'longitude'>,
  paddingMinutes = DAYLIGHT_PADDING_MINUTES,
): DaylightWindow | null {
  if (Number.isNaN(at.getTime())) return null

  const times = SunCalc.getTimes(
    utcNoonOf(at),
    location.latitude,
    location.longitude,
  )
  const sunriseMs = times.sunrise.getTime()
  const sunsetMs = times.sunset.getTime()
  if (!Number.isFinite(sunriseMs) || !Number.isFinite(sunsetMs)) return null

  const padMs = paddingMinutes * 60 * 1000
  const startMs = sunriseMs + padMs
  const endMs = sunsetMs - padMs
  if (startMs > endMs) return null

  return { startMs, endMs }
}

export function isDaylight(
  at: Date,
  location: Pick<Location, 'latitude' | 'longitude'>,
  paddingMinutes = DAYLIGHT_PADDING_MINUTES,
): boolean {
  const window = daylightWindow(at, location, paddingMinutes)
  if (!window) return false
  const t = at.getTime()
  return t >= window.startMs && t <= window.endMs
}
