import test from 'node:test'
import assert from 'node:assert/strict'
import { alertSubject, buildAlertMessage } from '../src/core/message.js'
import type { ConditionRange } from '../src/core/types.js'

const LOCATION = { name: 'Killiney Beach' }

const RANGES: ConditionRange[] = [
  {
    startMs: 0,
    endMs: 0,
    time: 'Thursday 10:00-11:00',
    waveHeight: '1.2-1.5m',
    wind: { speed: '7-13kph', direction: 'WSW' },
    lowTideTime: '11:00',
  },
  {
    startMs: 0,
    endMs: 0,
    time: 'Thursday 13:00-13:00',
    waveHeight: '1.1-1.1m',
    lowTideTime: '14:30',
  },
]

test('alertSubject names the location', () => {
  assert.equal(alertSubject(LOCATION), '🏄 Surf Alert - Killiney Beach')
})

test('buildAlertMessage writes one paragraph per range', () => {
  assert.equal(
    buildAlertMessage(RANGES, LOCATION),
    [
      '🏄 Surf Alert - Killiney Beach!',
      '',
      'Thursday 10:00-11:00',
      'Wave Height: 1.2-1.5m',
      'Wind: 7-13kph from WSW',
      'Low Tide at: 11:00',
      '',
      'Thursday 13:00-13:00',
      'Wave Height: 1.1-1.1m',
      'Low Tide at: 14:30',
    ].join('\n'),
  )
})

test('buildAlertMessage appends the reference link after each range', () => {
  const text = buildAlertMessage(RANGES.slice(1), LOCATION, {
    referenceLink: 'https://example.com/spot',
  })

  assert.equal(
    text,
    [
      '🏄 Surf Alert - Killiney Beach!',
      '',
      'Thursday 13:00-13:00',
      'Wave Height: 1.1-1.1m',
      'Low Tide at: 14:30',
      '',
      'https://example.com/spot',
    ].join('\n'),
  )
})
