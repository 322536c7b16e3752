import type { ConditionRange, Location } from './types.js'

export interface RenderOptions {
  referenceLink?: string
}

export function alertSubject(location: Pick<Location, 'name'>): string {
  return `🏄 Surf Alert - ${location.name}`
}

function rangeParagraph(range: ConditionRange, options: RenderOptions): string {
  return [
    range.time,
    `Wave Height: ${range.waveHeight}`,
    ...(range.wind
      ? [`Wind: ${range.wind.speed} from ${range.wind.direction}`]
      : []),
    `Low Tide at: ${range.lowTideTime}`,
    ...(options.referenceLink ? ['', options.referenceLink] : []),
  ].join('\n')
}

export function buildAlertMessage(
  ranges: ConditionRange[],
  location: Pick<Location, 'name'>,
  options: RenderOptions = {},
): string {
  return [
    `${alertSubject(location)}!`,
    ...ranges.map((r) => rangeParagraph(r, options)),
  ].join('\n\n')
}
