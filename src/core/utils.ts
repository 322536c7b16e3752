export type Cardinal =
  | 'N'
  | 'NNE'
  | 'NE'
  | 'ENE'
  | 'E'
  | 'ESE'
  | 'SE'
  | 'SSE'
  | 'S'
  | 'SSW'
  | 'SW'
  | 'WSW'
  | 'W'
  | 'WNW'
  | 'NW'
  | 'NNW'

const CARDINALS: Cardinal[] = [
  'N',
  'NNE',
  'NE',
  'ENE',
  'E',
  'ESE',
  'SE',
  'SSE',
  'S',
  'SSW',
  'SW',
  'WSW',
  'W',
  'WNW',
  'NW',
  'NNW',
]

const SECTOR_DEGREES = 360 / CARDINALS.length

export function normalizeAngle(deg: number): number {
  if (!Number.isFinite(deg)) return 0
  return ((deg % 360) + 360) % 360
}

export function degreesToCardinal(deg: number): Cardinal {
  const shifted = normalizeAngle(deg + SECTOR_DEGREES / 2)
  const index = Math.floor(shifted / SECTOR_DEGREES) % CARDINALS.length
  return CARDINALS[index]
}

/**
 * Rounds half to even on the stored binary value, so 1.25 becomes 1.2 and
 * 0.35 (really 0.34999...) becomes 0.3.
 */
export function roundTo(value: number, decimals = 0): number {
  if (!Number.isFinite(value)) return value

  // an exact tie is a multiple of 2^-(decimals + 1) with an odd numerator
  const halves = value * 2 ** (decimals + 1)
  if (Number.isInteger(halves) && Math.abs(halves) % 2 === 1) {
    const factor = 10 ** decimals
    const down = Math.floor(value * factor)
    return (down % 2 === 0 ? down : down + 1) / factor
  }

  return Number(value.toFixed(decimals))
}

export function msToKph(speed: number): number {
  return speed * 3.6
}
