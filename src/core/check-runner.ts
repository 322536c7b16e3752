import type { AppConfig } from '../config.js'
import type { DeliveryResult } from '../infra/notifiers.js'
import type { SourceError, SourceResult } from '../infra/stormglass.js'
import {
  emptyDiscardReasons,
  evaluateConditions,
  type DiscardReasons,
} from './conditions.js'
import { isDaylight } from './daylight.js'
import { groupConditions } from './grouping.js'
import { findLowTideWithin } from './tides.js'
import type {
  ConditionRange,
  ForecastSample,
  Location,
  TideEvent,
} from './types.js'

export type CheckSettings = Pick<
  AppConfig,
  | 'waveHeightThreshold'
  | 'tideWindowHours'
  | 'groupingGapHours'
  | 'includeWind'
  | 'displayTimeZone'
  | 'locations'
>

export interface CheckRunnerDeps {
  settings: CheckSettings
  fetchForecast: (location: Location) => Promise<SourceResult<ForecastSample[]>>
  fetchTides: (location: Location) => Promise<SourceResult<TideEvent[]>>
  notify: (
    ranges: ConditionRange[],
    location: Location,
  ) => Promise<DeliveryResult[]>
}

export interface LocationReport {
  location: string
  qualifying: number
  ranges: ConditionRange[]
  discardReasons: DiscardReasons
  deliveries: DeliveryResult[]
}

export type CheckOutcome =
  | {
      ok: true
      status: 'notified' | 'no_conditions'
      locations: LocationReport[]
    }
  | { ok: false; error: SourceError; locations: LocationReport[] }

function logSourceFailure(location: Location, error: SourceError): void {
  const event =
    error.kind === 'quota'
      ? `${error.source}_quota_exceeded`
      : `${error.source}_fetch_failed`
  console.error(
    `${event} location="${location.name}" kind=${error.kind}${
      error.status ? ` status=${error.status}` : ''
    } message="${error.message}"`,
  )
}

export function evaluateLocation(
  location: Location,
  forecast: ForecastSample[],
  tides: TideEvent[],
  settings: CheckSettings,
): Omit<LocationReport, 'deliveries'> {
  const { instants, discardReasons } = evaluateConditions(forecast, {
    waveHeightThreshold: settings.waveHeightThreshold,
    isDaylight: (at) => isDaylight(at, location),
    findLowTide: (at) => findLowTideWithin(at, tides, settings.tideWindowHours),
  })

  const ranges = groupConditions(instants, {
    gapHours: settings.groupingGapHours,
    includeWind: settings.includeWind,
    timeZone: settings.displayTimeZone,
  })

  return {
    location: location.name,
    qualifying: instants.length,
    ranges,
    discardReasons,
  }
}

interface FetchedLocation {
  location: Location
  forecast: ForecastSample[]
  tides: TideEvent[]
}

async function fetchLocation(
  location: Location,
  deps: CheckRunnerDeps,
): Promise<SourceResult<FetchedLocation>> {
  console.log(`check_location location="${location.name}"`)

  const forecast = await deps.fetchForecast(location)
  if (!forecast.ok) {
    logSourceFailure(location, forecast.error)
    return forecast
  }
  console.log(
    `forecast_fetched location="${location.name}" hours=${forecast.data.length}`,
  )

  const tides = await deps.fetchTides(location)
  if (!tides.ok) {
    logSourceFailure(location, tides.error)
    return tides
  }
  console.log(
    `tides_fetched location="${location.name}" events=${tides.data.length}`,
  )

  return {
    ok: true,
    data: { location, forecast: forecast.data, tides: tides.data },
  }
}

/**
 * One evaluation pass over every configured location.
 *
 * Every location is fetched before anything is sent, so a forecast or tide
 * failure anywhere ends the run with no notifications at all. A failed
 * notification only shows up in the location's delivery results.
 */
export async function runCheck(deps: CheckRunnerDeps): Promise<CheckOutcome> {
  const fetched: FetchedLocation[] = []
  for (const location of deps.settings.locations) {
    const res = await fetchLocation(location, deps)
    if (!res.ok) return { ok: false, error: res.error, locations: [] }
    fetched.push(res.data)
  }

  const locations: LocationReport[] = []
  for (const { location, forecast, tides } of fetched) {
    const report = evaluateLocation(location, forecast, tides, deps.settings)
    const d = report.discardReasons
    console.log(
      `conditions_evaluated location="${location.name}" qualifying=${report.qualifying} ranges=${report.ranges.length} discard_wave=${d.wave} discard_light=${d.light} discard_tide=${d.tide} duplicates=${d.duplicate}`,
    )

    const deliveries = report.ranges.length
      ? await deps.notify(report.ranges, location)
      : []
    locations.push({ ...report, deliveries })
  }

  const anyRanges = locations.some((l) => l.ranges.length > 0)
  return {
    ok: true,
    status: anyRanges ? 'notified' : 'no_conditions',
    locations,
  }
}

export function totalDiscardReasons(reports: LocationReport[]): DiscardReasons {
  const total = emptyDiscardReasons()
  for (const report of reports) {
    total.wave += report.discardReasons.wave
    total.light += report.discardReasons.light
    total.tide += report.discardReasons.tide
    total.duplicate += report.discardReasons.duplicate
    total.invalid += report.discardReasons.invalid
  }
  return total
}
