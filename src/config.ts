import { readFileSync } from 'node:fs'
import { isValidTimeZone } from './core/time.js'
import type { Location } from './core/types.js'
import type {
  Channel,
  EmailSettings,
  TelegramSettings,
} from './infra/notifiers.js'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export interface AppConfig {
  stormglassApiKey: string
  waveHeightThreshold: number
  tideWindowHours: number
  groupingGapHours: 1 | 2
  forecastDays: number
  includeWind: boolean
  displayTimeZone: string
  locations: Location[]
  email?: EmailSettings
  telegram?: TelegramSettings
  checkLogPath: string
}

type Env = Record<string, string | undefined>

const CHANNELS: Channel[] = ['email', 'telegram']

function required(env: Env, name: string): string {
  const value = env[name]?.trim()
  if (!value) throw new ConfigError(`Missing ${name}`)
  return value
}

function positiveNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim()
  if (!raw) return fallback
  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got "${raw}"`)
  }
  return value
}

function booleanFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase()
  if (!raw) return fallback
  if (raw === 'true' || raw === '1') return true
  if (raw === 'false' || raw === '0') return false
  throw new ConfigError(`${name} must be true or false, got "${raw}"`)
}

function commaList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}

function isChannel(value: string): value is Channel {
  return CHANNELS.some((c) => c === value)
}

function parseChannels(env: Env): Channel[] {
  const raw = env.NOTIFY_CHANNELS?.trim()
  if (!raw) return [...CHANNELS]

  const channels = commaList(raw.toLowerCase())
  for (const channel of channels) {
    if (!isChannel(channel)) {
      throw new ConfigError(`Unknown notification channel "${channel}"`)
    }
  }
  return channels.filter(isChannel)
}

function isLocationShape(value: unknown): value is Location {
  if (!value || typeof value !== 'object') return false
  const location = value as Partial<Location>
  return (
    typeof location.name === 'string' &&
    typeof location.region === 'string' &&
    typeof location.timezone === 'string' &&
    typeof location.latitude === 'number' &&
    typeof location.longitude === 'number' &&
    Math.abs(location.latitude) <= 90 &&
    Math.abs(location.longitude) <= 180
  )
}

export function parseLocations(raw: string, source: string): Location[] {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError(`${source} is not valid JSON: ${String(err)}`)
  }

  if (!Array.isArray(parsed) || !parsed.length) {
    throw new ConfigError(`${source} must hold a non-empty array of locations`)
  }

  return parsed.map((entry: unknown, idx) => {
    if (!isLocationShape(entry)) {
      throw new ConfigError(`${source}: location #${idx + 1} is invalid`)
    }
    if (!isValidTimeZone(entry.timezone)) {
      throw new ConfigError(
        `${source}: unknown time zone "${entry.timezone}" for ${entry.name}`,
      )
    }
    return Object.freeze({
      name: entry.name,
      region: entry.region,
      timezone: entry.timezone,
      latitude: entry.latitude,
      longitude: entry.longitude,
    })
  })
}

function loadLocations(path: string): Location[] {
  let raw: string
  try {
    raw = readFileSync(path, 'utf-8')
  } catch (err) {
    throw new ConfigError(`Cannot read locations file ${path}: ${String(err)}`)
  }
  return parseLocations(raw, path)
}

function emailSettings(env: Env): EmailSettings {
  const user = required(env, 'SMTP_USER')
  const to = commaList(required(env, 'EMAIL_TO'))
  if (!to.length) throw new ConfigError('EMAIL_TO has no recipients')

  return {
    host: required(env, 'SMTP_HOST'),
    port: positiveNumber(env, 'SMTP_PORT', 587),
    user,
    pass: required(env, 'SMTP_PASS'),
    from: env.EMAIL_FROM?.trim() || user,
    to,
    referenceLink: env.REFERENCE_LINK?.trim() || undefined,
  }
}

function telegramSettings(env: Env): TelegramSettings {
  return {
    token: required(env, 'TELEGRAM_BOT_TOKEN'),
    chatId: required(env, 'TELEGRAM_CHAT_ID'),
  }
}

export function loadConfig(
  env: Env = process.env,
  readLocations: (path: string) => Location[] = loadLocations,
): AppConfig {
  const gap = positiveNumber(env, 'GROUPING_GAP_HOURS', 1)
  if (gap !== 1 && gap !== 2) {
    throw new ConfigError(`GROUPING_GAP_HOURS must be 1 or 2, got ${gap}`)
  }

  const channels = parseChannels(env)

  const displayTimeZone = env.DISPLAY_TIME_ZONE?.trim() || 'UTC'
  if (!isValidTimeZone(displayTimeZone)) {
    throw new ConfigError(`Unknown DISPLAY_TIME_ZONE "${displayTimeZone}"`)
  }

  return {
    stormglassApiKey: required(env, 'STORMGLASS_API_KEY'),
    waveHeightThreshold: positiveNumber(env, 'WAVE_HEIGHT_THRESHOLD', 1.0),
    tideWindowHours: positiveNumber(env, 'TIDE_WINDOW_HOURS', 2),
    groupingGapHours: gap,
    forecastDays: positiveNumber(env, 'FORECAST_DAYS', 5),
    includeWind: booleanFlag(env, 'INCLUDE_WIND', true),
    displayTimeZone,
    locations: readLocations(
      env.LOCATIONS_PATH?.trim() || './config/locations.json',
    ),
    email: channels.includes('email') ? emailSettings(env) : undefined,
    telegram: channels.includes('telegram') ? telegramSettings(env) : undefined,
    checkLogPath: env.CHECK_LOG_PATH?.trim() || './data/check-log.json',
  }
}
