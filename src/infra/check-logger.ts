import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import {
  totalDiscardReasons,
  type CheckOutcome,
} from '../core/check-runner.js'
import type { DiscardReasons } from '../core/conditions.js'

const MAX_ENTRIES = 48

export interface CheckLogEntry {
  timestamp: string
  ok: boolean
  status: 'notified' | 'no_conditions' | 'failed'
  locations: string[]
  qualifying: number
  ranges: number
  notified: number
  failedDeliveries: number
  durationMs: number
  discardReasons: DiscardReasons
  error?: string
}

function ensureLogFile(path: string): void {
  const dir = dirname(path)
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
  if (!existsSync(path)) {
    writeFileSync(path, JSON.stringify([], null, 2))
  }
}

function isEntryShape(value: unknown): value is CheckLogEntry {
  if (!value || typeof value !== 'object') return false
  const entry = value as Partial<CheckLogEntry>
  return (
    typeof entry.timestamp === 'string' &&
    typeof entry.ok === 'boolean' &&
    typeof entry.status === 'string' &&
    Array.isArray(entry.locations) &&
    typeof entry.durationMs === 'number' &&
    typeof entry.discardReasons === 'object'
  )
}

export function readLog(path: string): CheckLogEntry[] {
  if (!existsSync(path)) return []
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'))
    if (!Array.isArray(parsed)) return []
    return parsed.filter(isEntryShape)
  } catch (err) {
    console.error(`check_log_unreadable path=${path}`, err)
    return []
  }
}

/**
 * The log is diagnostic only: a write failure is logged and reported as
 * `false`, never thrown into the run that produced the entry.
 */
export function appendCheckLog(path: string, entry: CheckLogEntry): boolean {
  const entries = readLog(path)
  entries.push(entry)

  try {
    ensureLogFile(path)
    writeFileSync(path, JSON.stringify(entries.slice(-MAX_ENTRIES), null, 2))
    return true
  } catch (err) {
    console.error(`check_log_write_failed path=${path}`, err)
    return false
  }
}

export function buildCheckLogEntry(
  outcome: CheckOutcome,
  durationMs: number,
  timestamp: string,
): CheckLogEntry {
  const deliveries = outcome.locations.flatMap((l) => l.deliveries)
  return {
    timestamp,
    ok: outcome.ok,
    status: outcome.ok ? outcome.status : 'failed',
    locations: outcome.locations.map((l) => l.location),
    qualifying: outcome.locations.reduce((sum, l) => sum + l.qualifying, 0),
    ranges: outcome.locations.reduce((sum, l) => sum + l.ranges.length, 0),
    notified: deliveries.filter((d) => d.ok).length,
    failedDeliveries: deliveries.filter((d) => !d.ok).length,
    durationMs,
    discardReasons: totalDiscardReasons(outcome.locations),
    ...(outcome.ok
      ? {}
      : {
          error: `${outcome.error.source}:${outcome.error.kind} ${outcome.error.message}`,
        }),
  }
}
