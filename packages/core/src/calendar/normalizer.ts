/**
 * Value Normalizer
 *
 * Maps each property of an occurrence onto the canonical value model.
 * Classification is a closed union; anything outside it fails the call.
 */

import { DateTime } from 'luxon'
import { UnsupportedPropertyTypeError } from './errors.js'
import { zoneOf } from './timezones.js'
import type {
  CalendarProperty,
  CanonicalValue,
  DateTimeValue,
  DateValue,
  DurationValue,
  IntegerValue,
  NormalizedRecord,
  Occurrence,
  TextValue,
  ZoneContext,
} from './types.js'

export type PropertyClass =
  | { kind: 'instant'; value: DateTimeValue }
  | { kind: 'date'; value: DateValue }
  | { kind: 'duration'; value: DurationValue }
  | { kind: 'integer'; value: IntegerValue }
  | { kind: 'text'; value: TextValue }
  | { kind: 'unsupported'; raw: unknown }

function assertNever(value: never): never {
  throw new Error(`Unhandled property class: ${JSON.stringify(value)}`)
}

/**
 * Classify all occurrences of one property name on a component.
 * Repeated and multi-valued properties are unsupported.
 */
export function classifyProperty(properties: readonly CalendarProperty[]): PropertyClass {
  if (properties.length !== 1) {
    return { kind: 'unsupported', raw: properties.map((prop) => prop.raw) }
  }
  const [property] = properties
  if (property.values.length !== 1) {
    return { kind: 'unsupported', raw: property.raw }
  }

  const value = property.values[0]
  switch (value.type) {
    case 'date-time':
      return { kind: 'instant', value }
    case 'date':
      return { kind: 'date', value }
    case 'duration':
      return { kind: 'duration', value }
    case 'integer':
      return { kind: 'integer', value }
    case 'text':
      return { kind: 'text', value }
    case 'recur':
    case 'period':
    case 'other':
      return { kind: 'unsupported', raw: property.raw[0] }
  }
}

function toCanonical(name: string, classified: PropertyClass, zones: ZoneContext): CanonicalValue {
  switch (classified.kind) {
    case 'instant': {
      const { value } = classified
      const epochMs = zoneOf(value, zones).toInstant(value.local)
      return { kind: 'instant', value: DateTime.fromMillis(epochMs, { zone: 'utc' }) }
    }
    case 'date':
      return { kind: 'date', value: { ...classified.value.date } }
    case 'duration':
      return { kind: 'duration', value: classified.value.duration }
    case 'integer':
      return { kind: 'integer', value: classified.value.value }
    case 'text':
      return { kind: 'text', value: classified.value.value }
    case 'unsupported':
      throw new UnsupportedPropertyTypeError(name, classified.raw)
    default:
      return assertNever(classified)
  }
}

/**
 * Normalize one occurrence. Keys are upper-case property names;
 * subcomponents such as VALARM are not part of the record.
 *
 * @throws UnsupportedPropertyTypeError for the first property with no canonical form
 */
export function normalizeOccurrence(occurrence: Occurrence): NormalizedRecord {
  const groups = new Map<string, CalendarProperty[]>()
  for (const property of occurrence.properties) {
    const group = groups.get(property.name)
    if (group) {
      group.push(property)
    } else {
      groups.set(property.name, [property])
    }
  }

  const record: NormalizedRecord = {}
  for (const [name, properties] of groups) {
    record[name] = toCanonical(name, classifyProperty(properties), occurrence.zones)
  }
  return record
}
