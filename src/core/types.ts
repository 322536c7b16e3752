export interface Location {
  name: string
  region: string
  timezone: string
  latitude: number
  longitude: number
}

export interface ForecastSample {
  time: string
  waveHeight: number | null
  windSpeed: number | null
  windDirection: number | null
}

export interface TideEvent {
  time: string
  type: 'low' | 'high'
}

export interface QualifyingInstant {
  atMs: number
  waveHeight: number
  windSpeed: number
  windDirection: number
  lowTideAtMs: number
}

export interface ConditionRange {
  startMs: number
  endMs: number
  time: string
  waveHeight: string
  wind?: { speed: string; direction: string }
  lowTideTime: string
}
