/**
 * Calendar Parser
 *
 * Turns raw iCalendar bytes into a CalendarDocument. Tokenizing and value
 * typing are done by ical.js (to jCal, RFC 7265); this module checks the
 * structure, validates the values it relies on and resolves VTIMEZONEs
 * for the document.
 */

import ICAL from 'ical.js'
import { Duration } from 'luxon'
import { z } from 'zod'
import { isValidCivilDate, isValidWallClockTime } from './civil-date.js'
import { ParseError } from './errors.js'
import { isIanaZone, vtimezoneZone } from './timezones.js'
import type {
  CalendarComponent,
  CalendarDocument,
  CalendarProperty,
  DateTimeValue,
  DurationValue,
  PropertyValue,
  TimeZoneRule,
} from './types.js'

// ─── jCal shape ───

const jCalParamsSchema = z.record(z.string(), z.union([z.string(), z.array(z.string())]))

const jCalPropertySchema = z.tuple([z.string(), jCalParamsSchema, z.string()]).rest(z.unknown())

type JCalProperty = z.infer<typeof jCalPropertySchema>
type JCalComponent = [string, JCalProperty[], JCalComponent[]]

const jCalComponentSchema: z.ZodType<JCalComponent> = z.lazy(() =>
  z.tuple([z.string(), z.array(jCalPropertySchema), z.array(jCalComponentSchema)]),
)

const jCalRootSchema = z.union([jCalComponentSchema, z.array(jCalComponentSchema)])

// ─── Value grammars ───

const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z)?$/
const DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const DURATION = /^([+-])?P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/

const FREQUENCIES = new Set(['SECONDLY', 'MINUTELY', 'HOURLY', 'DAILY', 'WEEKLY', 'MONTHLY', 'YEARLY'])

const TEXT_TYPES = new Set(['text', 'cal-address', 'uri', 'unknown'])

// ─── Structure check ───

interface ContentLine {
  text: string
  /** 1-based line number where the (folded) line starts */
  line: number
}

/**
 * Unfold RFC 5545 content lines. Blank lines are dropped.
 */
export function unfoldLines(text: string): ContentLine[] {
  const rawLines = text.split(/\r?\n/)
  const unfolded: ContentLine[] = []

  rawLines.forEach((raw, index) => {
    if ((raw.startsWith(' ') || raw.startsWith('\t')) && unfolded.length > 0) {
      unfolded[unfolded.length - 1].text += raw.substring(1)
    } else if (raw.trim().length > 0) {
      unfolded.push({ text: raw, line: index + 1 })
    }
  })

  return unfolded
}

/**
 * Check that components nest and every other line is a property line.
 * ical.js is lenient about unterminated components, so this runs first.
 */
function checkStructure(lines: ContentLine[]): void {
  const stack: string[] = []
  let calendars = 0

  for (const { text, line } of lines) {
    const marker = /^(BEGIN|END):(.*)$/i.exec(text)
    if (marker) {
      const name = marker[2].trim().toUpperCase()
      if (!name) {
        throw new ParseError(`${marker[1].toUpperCase()} without a component name`, line)
      }
      if (marker[1].toUpperCase() === 'BEGIN') {
        if (stack.length === 0) {
          if (name !== 'VCALENDAR') {
            throw new ParseError(`Top-level component must be VCALENDAR, found ${name}`, line)
          }
          calendars++
        }
        stack.push(name)
      } else {
        const open = stack.pop()
        if (open !== name) {
          throw new ParseError(
            open ? `END:${name} does not close BEGIN:${open}` : `END:${name} without matching BEGIN`,
            line,
          )
        }
      }
      continue
    }

    if (stack.length === 0) {
      throw new ParseError('Content outside of any component', line)
    }

    const nameEnd = text.search(/[;:]/)
    if (nameEnd <= 0 || !text.includes(':')) {
      throw new ParseError(`Malformed property line "${truncate(text)}"`, line)
    }
    if (!/^[A-Za-z0-9-]+$/.test(text.substring(0, nameEnd))) {
      throw new ParseError(`Invalid property name in "${truncate(text)}"`, line)
    }
  }

  if (stack.length > 0) {
    throw new ParseError(`Unterminated component ${stack[stack.length - 1]}`)
  }
  if (calendars === 0) {
    throw new ParseError('No VCALENDAR component found')
  }
}

function truncate(text: string): string {
  return text.length > 60 ? `${text.substring(0, 57)}...` : text
}

// ─── Value decoding ───

function decodeDateTime(raw: unknown, propertyName: string, tzid: string | undefined): DateTimeValue {
  const match = typeof raw === 'string' ? DATE_TIME.exec(raw) : null
  if (!match) {
    throw new ParseError(`Invalid DATE-TIME value ${JSON.stringify(raw)} for ${propertyName}`)
  }
  const local = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6]),
  }
  if (!isValidWallClockTime(local)) {
    throw new ParseError(`Invalid DATE-TIME value ${JSON.stringify(raw)} for ${propertyName}`)
  }
  const utc = match[7] === 'Z'
  return utc || tzid === undefined ? { type: 'date-time', local, utc } : { type: 'date-time', local, utc, tzid }
}

/**
 * Parse an RFC 5545 DURATION such as `PT1H30M`, `P1W` or `-PT15M`.
 * Returns null when the text does not follow the grammar.
 */
export function parseIcalDuration(text: string): Duration | null {
  const match = DURATION.exec(text)
  if (!match) return null

  const [, sign, weeks, days, hours, minutes, seconds] = match
  if (text.includes('T') && hours === undefined && minutes === undefined && seconds === undefined) {
    return null
  }

  const units: Record<string, number> = {}
  if (weeks !== undefined) units.weeks = Number(weeks)
  if (days !== undefined) units.days = Number(days)
  if (hours !== undefined) units.hours = Number(hours)
  if (minutes !== undefined) units.minutes = Number(minutes)
  if (seconds !== undefined) units.seconds = Number(seconds)
  if (Object.keys(units).length === 0) return null

  const duration = Duration.fromObject(units)
  return sign === '-' ? duration.negate() : duration
}

function decodeDuration(raw: unknown, propertyName: string): DurationValue {
  const duration = typeof raw === 'string' ? parseIcalDuration(raw) : null
  if (!duration) {
    throw new ParseError(`Invalid DURATION value ${JSON.stringify(raw)} for ${propertyName}`)
  }
  return { type: 'duration', duration }
}

function decodeValue(
  propertyName: string,
  valueType: string,
  raw: unknown,
  tzid: string | undefined,
): PropertyValue {
  switch (valueType) {
    case 'date-time':
      return decodeDateTime(raw, propertyName, tzid)

    case 'date': {
      const match = typeof raw === 'string' ? DATE.exec(raw) : null
      const date = match ? { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) } : null
      if (!date || !isValidCivilDate(date)) {
        throw new ParseError(`Invalid DATE value ${JSON.stringify(raw)} for ${propertyName}`)
      }
      return { type: 'date', date }
    }

    case 'duration':
      return decodeDuration(raw, propertyName)

    case 'integer':
      if (typeof raw !== 'number' || !Number.isInteger(raw)) {
        throw new ParseError(`Invalid INTEGER value ${JSON.stringify(raw)} for ${propertyName}`)
      }
      return { type: 'integer', value: raw }

    case 'period': {
      if (!Array.isArray(raw) || raw.length !== 2) {
        throw new ParseError(`Invalid PERIOD value ${JSON.stringify(raw)} for ${propertyName}`)
      }
      const start = decodeDateTime(raw[0], propertyName, tzid)
      const endRaw: unknown = raw[1]
      const end =
        typeof endRaw === 'string' && /^[+-]?P/.test(endRaw)
          ? decodeDuration(endRaw, propertyName)
          : decodeDateTime(endRaw, propertyName, tzid)
      return { type: 'period', start, end }
    }

    default:
      if (TEXT_TYPES.has(valueType) && typeof raw === 'string') {
        return { type: 'text', value: raw }
      }
      return { type: 'other', valueType, raw }
  }
}

function decodeRecur(prop: JCalProperty, propertyName: string): PropertyValue {
  let rule: unknown
  try {
    rule = new ICAL.Property(prop).getFirstValue()
  } catch (err) {
    throw new ParseError(`Invalid RECUR value for ${propertyName}: ${errorMessage(err)}`, undefined, {
      cause: err,
    })
  }
  if (!(rule instanceof ICAL.Recur)) {
    throw new ParseError(`Invalid RECUR value ${JSON.stringify(prop[3])} for ${propertyName}`)
  }
  const freq: unknown = rule.freq
  if (typeof freq !== 'string' || !FREQUENCIES.has(freq)) {
    throw new ParseError(`Invalid FREQ ${JSON.stringify(freq)} in ${propertyName}`)
  }
  if (!Number.isInteger(rule.interval) || rule.interval < 1) {
    throw new ParseError(`Invalid INTERVAL ${JSON.stringify(rule.interval)} in ${propertyName}`)
  }
  return { type: 'recur', rule }
}

function normalizeParams(params: Record<string, string | string[]>): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(params)) {
    result[key.toUpperCase()] = Array.isArray(value) ? value.join(',') : value
  }
  return result
}

function decodeProperty(prop: JCalProperty): CalendarProperty {
  const [rawName, rawParams, valueType, ...raw] = prop
  const name = rawName.toUpperCase()
  const params = normalizeParams(rawParams)

  const values =
    valueType === 'recur'
      ? [decodeRecur(prop, name)]
      : raw.map((value) => decodeValue(name, valueType, value, params.TZID))

  return { name, params, values, raw }
}

// ─── Components ───

interface Decoded {
  component: CalendarComponent
  /** TZIDs referenced by DATE-TIME values outside VTIMEZONE definitions */
  referencedZones: Set<string>
}

function decodeComponent(jcal: JCalComponent, insideTimezone: boolean, zones: Set<string>): CalendarComponent {
  const [rawName, rawProperties, rawComponents] = jcal
  const name = rawName.toUpperCase()
  const isTimezone = insideTimezone || name === 'VTIMEZONE'

  const properties = rawProperties.map(decodeProperty)
  if (!isTimezone) {
    for (const property of properties) {
      for (const value of property.values) {
        const dateTime = value.type === 'period' ? value.start : value
        if (dateTime.type === 'date-time' && dateTime.tzid !== undefined) {
          zones.add(dateTime.tzid)
        }
      }
    }
  }

  const components = rawComponents.map((child) => decodeComponent(child, isTimezone, zones))
  return { name, properties, components }
}

function decodeCalendar(jcal: JCalComponent): Decoded {
  const referencedZones = new Set<string>()
  const component = decodeComponent(jcal, false, referencedZones)
  return { component, referencedZones }
}

function buildTimezones(calendars: JCalComponent[]): Map<string, TimeZoneRule> {
  const timezones = new Map<string, TimeZoneRule>()

  for (const calendar of calendars) {
    for (const child of calendar[2]) {
      if (child[0].toLowerCase() !== 'vtimezone') continue

      const tzidProperty = child[1].find((prop) => prop[0].toLowerCase() === 'tzid')
      const tzid = tzidProperty?.[3]
      if (typeof tzid !== 'string' || tzid.length === 0) {
        throw new ParseError('VTIMEZONE without TZID')
      }

      const timezone = new ICAL.Timezone({ component: new ICAL.Component(child), tzid })
      timezones.set(tzid, vtimezoneZone(tzid, timezone))
    }
  }

  return timezones
}

// ─── Event shape ───

function single(component: CalendarComponent, name: string): CalendarProperty | undefined {
  const matches = component.properties.filter((prop) => prop.name === name)
  if (matches.length > 1) {
    throw new ParseError(`${describeEvent(component)} has more than one ${name}`)
  }
  const [property] = matches
  if (property && property.values.length !== 1) {
    throw new ParseError(`${describeEvent(component)} has a multi-valued ${name}`)
  }
  return property
}

function describeEvent(component: CalendarComponent): string {
  const uid = component.properties.find((prop) => prop.name === 'UID')?.values[0]
  return uid?.type === 'text' ? `${component.name} "${uid.value}"` : component.name
}

/**
 * Check what the expander relies on: a single DATE or DATE-TIME DTSTART,
 * a DTEND of the same type, never both DTEND and DURATION, and usable
 * RDATE/EXDATE/RECURRENCE-ID values.
 */
function validateEvent(event: CalendarComponent): void {
  const dtstart = single(event, 'DTSTART')
  if (!dtstart) {
    throw new ParseError(`${describeEvent(event)} has no DTSTART`)
  }
  const startType = dtstart.values[0].type
  if (startType !== 'date' && startType !== 'date-time') {
    throw new ParseError(`${describeEvent(event)} has a DTSTART that is neither DATE nor DATE-TIME`)
  }

  const dtend = single(event, 'DTEND')
  const duration = single(event, 'DURATION')
  if (dtend && duration) {
    throw new ParseError(`${describeEvent(event)} has both DTEND and DURATION`)
  }
  if (dtend && dtend.values[0].type !== startType) {
    throw new ParseError(
      `${describeEvent(event)} has DTSTART of type ${startType.toUpperCase()} but DTEND of type ${dtend.values[0].type.toUpperCase()}`,
    )
  }
  if (duration && duration.values[0].type !== 'duration') {
    throw new ParseError(`${describeEvent(event)} has an invalid DURATION`)
  }

  const recurrenceId = single(event, 'RECURRENCE-ID')
  if (recurrenceId && recurrenceId.values[0].type !== 'date' && recurrenceId.values[0].type !== 'date-time') {
    throw new ParseError(`${describeEvent(event)} has an invalid RECURRENCE-ID`)
  }

  for (const prop of event.properties) {
    if (prop.name !== 'RDATE' && prop.name !== 'EXDATE') continue
    for (const value of prop.values) {
      const allowed = value.type === 'date' || value.type === 'date-time' || (prop.name === 'RDATE' && value.type === 'period')
      if (!allowed) {
        throw new ParseError(`${describeEvent(event)} has an invalid ${prop.name} value`)
      }
    }
  }
}

// ─── Entry point ───

/** ICAL.parse returns a bare component for one root, an array of them otherwise */
function isSingleComponent(data: JCalComponent | JCalComponent[]): data is JCalComponent {
  return typeof data[0] === 'string'
}

function decodeText(input: Uint8Array | string): string {
  if (typeof input === 'string') {
    return input.charCodeAt(0) === 0xfeff ? input.substring(1) : input
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input)
  } catch (err) {
    throw new ParseError('Calendar data is not valid UTF-8', undefined, { cause: err })
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Parse iCalendar data.
 *
 * @throws ParseError when the input is not well-formed iCalendar
 */
export function parseCalendar(input: Uint8Array | string): CalendarDocument {
  const lines = unfoldLines(decodeText(input))
  checkStructure(lines)

  let parsed: unknown
  try {
    parsed = ICAL.parse(lines.map((line) => line.text).join('\r\n'))
  } catch (err) {
    throw new ParseError(`Malformed iCalendar: ${errorMessage(err)}`, undefined, { cause: err })
  }

  const root = jCalRootSchema.safeParse(parsed)
  if (!root.success) {
    throw new ParseError(`Unexpected calendar structure: ${root.error.issues[0]?.message ?? 'unknown'}`)
  }
  const calendars = isSingleComponent(root.data) ? [root.data] : root.data

  const timezones = buildTimezones(calendars)
  const components: CalendarComponent[] = []

  for (const calendar of calendars) {
    const { component, referencedZones } = decodeCalendar(calendar)
    for (const tzid of referencedZones) {
      if (!timezones.has(tzid) && !isIanaZone(tzid)) {
        throw new ParseError(`Unknown time zone "${tzid}" (no VTIMEZONE and not an IANA zone)`)
      }
    }
    for (const child of component.components) {
      if (child.name === 'VEVENT') validateEvent(child)
    }
    components.push(component)
  }

  console.debug(
    `[Parser] Parsed ${components.length} calendar(s) with ${timezones.size} VTIMEZONE definition(s)`,
  )

  return { components, timezones }
}
