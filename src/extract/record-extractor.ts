import type { StatisticsCollector } from '../stats/statistics.js'
import type { BusinessCardRecord, RootDescriptor, StartTagEvent, XmlAttribute, XmlEvent } from '../types.js'

export const SENTINEL_COUNTRY = 'XX'
export const DEFAULT_RECORD_ELEMENT = 'businesscard'

const COUNTRY_CODE = /^[\dA-Z]+$/

export interface ExtractOptions {
  onRoot?: (root: RootDescriptor) => void
  recordElement?: string
  statistics?: StatisticsCollector
}

export function localName(qualifiedName: string): string {
  const colon = qualifiedName.indexOf(':')
  return colon === -1 ? qualifiedName : qualifiedName.slice(colon + 1)
}

function findAttribute(attributes: XmlAttribute[], name: string): string | undefined {
  return attributes.find((attribute) => localName(attribute.name) === name)?.value
}

/**
 * Finds the country of a record from its captured events. Events arrive in
 * document order, so the first `entity` start tag is the one a depth-first
 * search would reach first.
 */
export function deriveCountryCode(events: Iterable<XmlEvent>): string {
  for (const event of events) {
    if (event.kind === 'start' && localName(event.name) === 'entity') {
      const code = findAttribute(event.attributes, 'countrycode')
      return normalizeCountryCode(code)
    }
  }

  return SENTINEL_COUNTRY
}

/**
 * Upper-cases a country code. Anything that is not plain letters and digits
 * becomes {@link SENTINEL_COUNTRY}, since the code names the output directory.
 */
export function normalizeCountryCode(code: string | undefined): string {
  const normalized = code?.trim().toUpperCase()
  if (!normalized || !COUNTRY_CODE.test(normalized)) return SENTINEL_COUNTRY
  return normalized
}

/**
 * Turns a stream of tokenizer events into business card records.
 *
 * The first start tag becomes the root descriptor. Each element whose local
 * name matches the record element is captured whole, its inner content
 * copied from the raw event text, and routed by country.
 */
export async function* extractRecords(
  events: AsyncIterable<XmlEvent>,
  options: ExtractOptions = {},
): AsyncGenerator<BusinessCardRecord> {
  const recordElement = options.recordElement ?? DEFAULT_RECORD_ELEMENT
  let rootSeen = false
  let current: undefined | { captured: XmlEvent[]; depth: number; start: StartTagEvent }

  for await (const event of events) {
    if (current) {
      if (event.kind === 'start' && !event.selfClosing) {
        current.depth++
      } else if (event.kind === 'end') {
        current.depth--
        if (current.depth === 0) {
          yield buildRecord(current.start, current.captured, options)
          current = undefined
          continue
        }
      }

      current.captured.push(event)
      continue
    }

    if (event.kind !== 'start') continue

    if (!rootSeen) {
      rootSeen = true
      options.onRoot?.({ attributes: event.attributes, name: event.name })
      continue
    }

    if (localName(event.name) !== recordElement) continue

    if (event.selfClosing) {
      yield buildRecord(event, [], options)
    } else {
      current = { captured: [], depth: 1, start: event }
    }
  }
}

function buildRecord(start: StartTagEvent, captured: XmlEvent[], options: ExtractOptions): BusinessCardRecord {
  const countryCode = deriveCountryCode(captured)
  options.statistics?.increment(countryCode)

  return {
    attributes: start.attributes,
    countryCode,
    elementName: start.name,
    innerContent: captured.map((event) => event.raw).join(''),
  }
}
