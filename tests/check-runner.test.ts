import test from 'node:test'
import assert from 'node:assert/strict'
import {
  runCheck,
  type CheckRunnerDeps,
  type CheckSettings,
} from '../src/core/check-runner.js'
import type {
  ConditionRange,
  ForecastSample,
  Location,
  TideEvent,
} from '../src/core/types.js'
import { fetchTides } from '../src/infra/stormglass.js'

const LOCATION: Location = {
  name: 'Killiney Beach',
  region: 'Ireland',
  timezone: 'Europe/Dublin',
  latitude: 53.2557,
  longitude: -6.1124,
}

function mkSettings(overrides: Partial<CheckSettings> = {}): CheckSettings {
  return {
    waveHeightThreshold: 1.0,
    tideWindowHours: 2,
    groupingGapHours: 1,
    includeWind: true,
    displayTimeZone: 'UTC',
    locations: [LOCATION],
    ...overrides,
  }
}

function mkSample(
  time: string,
  waveHeight: number,
  windSpeed = 2,
): ForecastSample {
  return { time, waveHeight, windSpeed, windDirection: 250 }
}

function mkForecast(): ForecastSample[] {
  return [
    mkSample('2026-01-15T10:00:00+00:00', 1.2, 2.0),
    mkSample('2026-01-15T11:00:00+00:00', 1.5, 3.5),
    mkSample('2026-01-15T12:00:00+00:00', 0.6),
    mkSample('2026-01-15T13:00:00+00:00', 1.1, 4.1),
    mkSample('2026-01-15T13:00:00+00:00', 3.0),
    mkSample('2026-01-15T20:00:00+00:00', 2.0),
  ]
}

function mkTides(): TideEvent[] {
  return [
    { time: '2026-01-15T04:50:00+00:00', type: 'high' },
    { time: '2026-01-15T11:00:00+00:00', type: 'low' },
    { time: '2026-01-15T17:20:00+00:00', type: 'high' },
  ]
}

function mkDeps(overrides: Partial<CheckRunnerDeps> = {}): CheckRunnerDeps & {
  notified: ConditionRange[][]
} {
  const notified: ConditionRange[][] = []
  return {
    settings: mkSettings(),
    fetchForecast: async () => ({ ok: true, data: mkForecast() }),
    fetchTides: async () => ({ ok: true, data: mkTides() }),
    notify: async (ranges) => {
      notified.push(ranges)
      return [{ channel: 'email', ok: true }]
    },
    notified,
    ...overrides,
  }
}

test('runCheck groups qualifying hours and notifies once per location', async () => {
  const deps = mkDeps()

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok, true)
  assert.equal(outcome.ok && outcome.status, 'notified')
  assert.equal(deps.notified.length, 1)
  assert.deepEqual(
    deps.notified[0].map((r) => [r.time, r.waveHeight, r.wind?.speed]),
    [
      ['Thursday 10:00-11:00', '1.2-1.5m', '7-13kph'],
      ['Thursday 13:00-13:00', '1.1-1.1m', '15-15kph'],
    ],
  )
  assert.deepEqual(outcome.locations[0].discardReasons, {
    wave: 1,
    light: 1,
    tide: 0,
    duplicate: 1,
    invalid: 0,
  })
  assert.equal(outcome.locations[0].qualifying, 3)
  assert.deepEqual(outcome.locations[0].deliveries, [
    { channel: 'email', ok: true },
  ])
})

test('runCheck reports no_conditions and skips notification', async () => {
  const deps = mkDeps({
    settings: mkSettings({ waveHeightThreshold: 5 }),
  })

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok && outcome.status, 'no_conditions')
  assert.equal(deps.notified.length, 0)
  assert.deepEqual(outcome.locations[0].ranges, [])
})

test('runCheck aborts on a forecast failure before fetching tides', async () => {
  let tideCalls = 0
  const deps = mkDeps({
    fetchForecast: async () => ({
      ok: false,
      error: { source: 'forecast', kind: 'timeout', message: 'timed out' },
    }),
    fetchTides: async () => {
      tideCalls++
      return { ok: true, data: [] }
    },
  })

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok, false)
  assert.equal(outcome.ok ? null : outcome.error.kind, 'timeout')
  assert.equal(tideCalls, 0)
  assert.equal(deps.notified.length, 0)
})

test('runCheck fails cleanly when the tide body has no data key', async () => {
  const deps = mkDeps({
    fetchTides: (location) =>
      fetchTides(location, {
        apiKey: 'test-key',
        forecastDays: 5,
        includeWind: true,
        fetchImpl: async () =>
          new Response(JSON.stringify({ meta: { cost: 1 } }), { status: 200 }),
      }),
  })

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok, false)
  assert.deepEqual(outcome.ok ? null : outcome.error, {
    source: 'tide',
    kind: 'malformed',
    message: 'response has no "data" array',
  })
  assert.equal(deps.notified.length, 0)
})

test('runCheck treats a quota response as a failed run', async () => {
  const deps = mkDeps({
    fetchTides: async () => ({
      ok: false,
      error: {
        source: 'tide',
        kind: 'quota',
        message: 'quota exceeded or payment required',
        status: 402,
      },
    }),
  })

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok ? null : outcome.error.kind, 'quota')
})

test('runCheck stays successful when a delivery fails', async () => {
  const deps = mkDeps({
    notify: async () => [
      { channel: 'email', ok: false, error: 'Error: smtp down' },
      { channel: 'telegram', ok: true },
    ],
  })

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok, true)
  assert.equal(outcome.locations[0].deliveries.length, 2)
})

test('runCheck re-notifies the same window on every run', async () => {
  const deps = mkDeps()

  await runCheck(deps)
  await runCheck(deps)

  assert.equal(deps.notified.length, 2)
  assert.deepEqual(deps.notified[0], deps.notified[1])
})

test('runCheck checks every configured location in order', async () => {
  const seen: string[] = []
  const second = { ...LOCATION, name: 'Bray' }
  const deps = mkDeps({
    settings: mkSettings({ locations: [LOCATION, second] }),
    fetchForecast: async (location) => {
      seen.push(location.name)
      return { ok: true, data: mkForecast() }
    },
  })

  const outcome = await runCheck(deps)

  assert.deepEqual(seen, ['Killiney Beach', 'Bray'])
  assert.deepEqual(
    outcome.locations.map((l) => l.location),
    ['Killiney Beach', 'Bray'],
  )
})

test('runCheck sends nothing when a later location fails to fetch', async () => {
  const second = { ...LOCATION, name: 'Bray' }
  const deps = mkDeps({
    settings: mkSettings({ locations: [LOCATION, second] }),
    fetchTides: async (location) =>
      location.name === 'Bray'
        ? {
            ok: false,
            error: {
              source: 'tide',
              kind: 'http',
              message: 'down',
              status: 503,
            },
          }
        : { ok: true, data: mkTides() },
  })

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok, false)
  assert.equal(outcome.ok ? null : outcome.error.status, 503)
  assert.deepEqual(outcome.locations, [])
  assert.equal(deps.notified.length, 0)
})

test('runCheck labels summer hours in UTC by default', async () => {
  const deps = mkDeps({
    fetchForecast: async () => ({
      ok: true,
      data: [mkSample('2026-07-15T10:00:00+00:00', 1.4)],
    }),
    fetchTides: async () => ({
      ok: true,
      data: [{ time: '2026-07-15T11:00:00+00:00', type: 'low' }],
    }),
  })

  const outcome = await runCheck(deps)

  assert.equal(outcome.ok && outcome.status, 'notified')
  assert.deepEqual(
    deps.notified[0].map((r) => [r.time, r.lowTideTime]),
    [['Wednesday 10:00-10:00', '11:00']],
  )
})
