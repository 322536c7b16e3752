import type { ForecastSample, Location, TideEvent } from '../core/types.js'

const API_URL = 'https://api.stormglass.io/v2'
const REQUEST_TIMEOUT_MS = 10_000
const SOURCE_KEY = 'sg'

export type SourceName = 'forecast' | 'tide'

export type SourceErrorKind =
  | 'timeout'
  | 'transport'
  | 'http'
  | 'quota'
  | 'malformed'

export interface SourceError {
  source: SourceName
  kind: SourceErrorKind
  message: string
  status?: number
}

export type SourceResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: SourceError }

export interface StormglassOptions {
  apiKey: string
  forecastDays: number
  includeWind: boolean
  now?: () => Date
  fetchImpl?: typeof fetch
}

function fail(
  source: SourceName,
  kind: SourceErrorKind,
  message: string,
  status?: number,
): { ok: false; error: SourceError } {
  return {
    ok: false,
    error: { source, kind, message, ...(status ? { status } : {}) },
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function sgReading(hour: Record<string, unknown>, key: string): number | null {
  const reading = hour[key]
  const value = isRecord(reading) ? reading[SOURCE_KEY] : undefined
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

function windowParams(
  location: Location,
  options: StormglassOptions,
): URLSearchParams {
  const start = (options.now ?? (() => new Date()))()
  const end = new Date(
    start.getTime() + options.forecastDays * 24 * 60 * 60 * 1000,
  )
  return new URLSearchParams({
    lat: String(location.latitude),
    lng: String(location.longitude),
    start: start.toISOString(),
    end: end.toISOString(),
  })
}

async function getJson(
  source: SourceName,
  url: string,
  options: StormglassOptions,
): Promise<SourceResult<unknown>> {
  const fetchImpl = options.fetchImpl ?? fetch

  let res: Response
  try {
    res = await fetchImpl(url, {
      headers: { Authorization: options.apiKey },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    })
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      return fail(
        source,
        'timeout',
        `request timed out after ${REQUEST_TIMEOUT_MS}ms`,
      )
    }
    return fail(source, 'transport', String(err))
  }

  if (res.status === 402) {
    return fail(source, 'quota', 'quota exceeded or payment required', 402)
  }
  if (!res.ok) {
    return fail(source, 'http', `unexpected status ${res.status}`, res.status)
  }

  try {
    return { ok: true, data: await res.json() }
  } catch (err) {
    return fail(
      source,
      'malformed',
      `invalid JSON body: ${String(err)}`,
      res.status,
    )
  }
}

export function parseForecastHours(body: unknown): ForecastSample[] | null {
  if (!isRecord(body) || !Array.isArray(body.hours)) return null

  return body.hours
    .filter(isRecord)
    .filter((hour): hour is Record<string, unknown> & { time: string } =>
      typeof hour.time === 'string',
    )
    .map((hour) => ({
      time: hour.time,
      waveHeight: sgReading(hour, 'waveHeight'),
      windSpeed: sgReading(hour, 'windSpeed'),
      windDirection: sgReading(hour, 'windDirection'),
    }))
}

export function parseTideExtremes(body: unknown): TideEvent[] | null {
  if (!isRecord(body) || !Array.isArray(body.data)) return null

  const events: TideEvent[] = []
  for (const row of body.data) {
    if (!isRecord(row) || typeof row.time !== 'string') continue
    if (row.type !== 'low' && row.type !== 'high') continue
    events.push({ time: row.time, type: row.type })
  }
  return events
}

export async function fetchForecast(
  location: Location,
  options: StormglassOptions,
): Promise<SourceResult<ForecastSample[]>> {
  const params = windowParams(location, options)
  params.set(
    'params',
    options.includeWind ? 'waveHeight,windDirection,windSpeed' : 'waveHeight',
  )

  const res = await getJson(
    'forecast',
    `${API_URL}/weather/point?${params.toString()}`,
    options,
  )
  if (!res.ok) return res

  const hours = parseForecastHours(res.data)
  if (!hours) {
    return fail('forecast', 'malformed', 'response has no "hours" array')
  }
  return { ok: true, data: hours }
}

export async function fetchTides(
  location: Location,
  options: StormglassOptions,
): Promise<SourceResult<TideEvent[]>> {
  const params = windowParams(location, options)

  const res = await getJson(
    'tide',
    `${API_URL}/tide/extremes/point?${params.toString()}`,
    options,
  )
  if (!res.ok) return res

  const events = parseTideExtremes(res.data)
  if (!events) {
    return fail('tide', 'malformed', 'response has no "data" array')
  }
  return { ok: true, data: events }
}
