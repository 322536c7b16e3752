const FORMATTER_CACHE_MAX = 64
const formatterCache = new Map<string, Intl.DateTimeFormat>()

export type LocalTimeParts = {
  weekday: string
  hour: string
  minute: string
}

function textPart(
  parts: Intl.DateTimeFormatPart[],
  type: Intl.DateTimeFormatPartTypes,
): string {
  return parts.find((part) => part.type === type)?.value ?? ''
}

function partsFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(timeZone)
  if (cached) return cached

  const formatter = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    weekday: 'long',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  })

  if (formatterCache.size >= FORMATTER_CACHE_MAX) formatterCache.clear()
  formatterCache.set(timeZone, formatter)
  return formatter
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    partsFormatter(timeZone)
    return true
  } catch {
    return false
  }
}

export function localParts(date: Date, timeZone: string): LocalTimeParts {
  const parts = partsFormatter(timeZone).formatToParts(date)
  return {
    weekday: textPart(parts, 'weekday'),
    hour: textPart(parts, 'hour'),
    minute: textPart(parts, 'minute'),
  }
}

export function formatHour(date: Date, timeZone: string): string {
  if (Number.isNaN(date.getTime())) return '--:--'
  const p = localParts(date, timeZone)
  return `${p.hour}:${p.minute}`
}

/** "Tuesday 11:00-13:00", weekday taken from the start. */
export function formatTimeRange(
  start: Date,
  end: Date,
  timeZone: string,
): string {
  if (Number.isNaN(start.getTime())) return 'n/d'
  const { weekday } = localParts(start, timeZone)
  return `${weekday} ${formatHour(start, timeZone)}-${formatHour(end, timeZone)}`
}
