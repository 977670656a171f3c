/**
 * Recurrence Expander
 *
 * Turns the VEVENTs of a CalendarDocument into the concrete occurrences
 * that fall inside a half-open civil-date window [start, end).
 *
 * Masters (RRULE/RDATE, no RECURRENCE-ID) are expanded into candidate starts;
 * overrides (RECURRENCE-ID) replace the candidate they name. Output keeps
 * document order, each master's occurrences in chronological order.
 */

import type { Duration } from 'luxon'
import {
  addDays,
  civilDateOrdinal,
  formatCivilDate,
  formatWallClock,
  isValidCivilDate,
  parseCivilDate,
  startOfDay,
} from './civil-date.js'
import { ConfigError, InvalidWindowError, ParseError } from './errors.js'
import { normalizeOccurrence } from './normalizer.js'
import { candidateStarts, pointKey, type Candidate, type Horizon } from './recurrence.js'
import { createZoneContext, dateTimeInFrameOf, toTimePoint, zoneOf } from './timezones.js'
import type {
  CalendarComponent,
  CalendarDocument,
  CalendarProperty,
  CivilDate,
  DateTimeValue,
  DateValue,
  ExpandOptions,
  InclusionMode,
  NormalizedRecord,
  Occurrence,
  PropertyValue,
  TimePoint,
  ZoneContext,
} from './types.js'

export const DEFAULT_MAX_ITERATIONS = 100_000

const RECURRENCE_PROPERTIES = new Set(['RRULE', 'RDATE', 'EXDATE'])

export interface DateWindow {
  start: CivilDate
  /** Exclusive */
  end: CivilDate
}

// ─── Window ───

function resolveDate(value: CivilDate | string, label: string): CivilDate {
  if (typeof value === 'string') {
    const date = parseCivilDate(value)
    if (!date) {
      throw new InvalidWindowError(`Invalid window ${label} "${value}", expected YYYY-MM-DD`)
    }
    return date
  }
  if (!isValidCivilDate(value)) {
    throw new InvalidWindowError(`Invalid window ${label} ${JSON.stringify(value)}`)
  }
  return { year: value.year, month: value.month, day: value.day }
}

/**
 * Validate a window. Equal bounds are allowed and select nothing.
 *
 * @throws InvalidWindowError for unparseable dates or start after end
 */
export function resolveWindow(start: CivilDate | string, end: CivilDate | string): DateWindow {
  const window = { start: resolveDate(start, 'start'), end: resolveDate(end, 'end') }
  if (civilDateOrdinal(window.start) > civilDateOrdinal(window.end)) {
    throw new InvalidWindowError(
      `Window start ${formatCivilDate(window.start)} is after window end ${formatCivilDate(window.end)}`,
    )
  }
  return window
}

/** Sign of `point` relative to midnight of `day` in the point's own zone */
function compareToDay(point: TimePoint, day: CivilDate): number {
  if (point.kind === 'date') return civilDateOrdinal(point.date) - civilDateOrdinal(day)
  return point.epochMs - point.zone.toInstant(startOfDay(day))
}

function inWindow(occurrence: Occurrence, window: DateWindow, inclusion: InclusionMode): boolean {
  const startsBeforeEnd = compareToDay(occurrence.start, window.end) < 0
  const startsInside = compareToDay(occurrence.start, window.start) >= 0
  if (inclusion === 'start') return startsInside && startsBeforeEnd
  return startsBeforeEnd && (startsInside || compareToDay(occurrence.end, window.start) > 0)
}

// ─── Event helpers ───

function findProperty(event: CalendarComponent, name: string): CalendarProperty | undefined {
  return event.properties.find((prop) => prop.name === name)
}

function firstValue(event: CalendarComponent, name: string): PropertyValue | undefined {
  return findProperty(event, name)?.values[0]
}

function uidOf(event: CalendarComponent): string | undefined {
  const uid = firstValue(event, 'UID')
  return uid?.type === 'text' ? uid.value : undefined
}

function sequenceOf(event: CalendarComponent): number {
  const sequence = firstValue(event, 'SEQUENCE')
  return sequence?.type === 'integer' ? sequence.value : 0
}

function timeValue(event: CalendarComponent, name: string): DateTimeValue | DateValue | undefined {
  const value = firstValue(event, name)
  return value?.type === 'date' || value?.type === 'date-time' ? value : undefined
}

function dtstartOf(event: CalendarComponent): DateTimeValue | DateValue {
  const dtstart = timeValue(event, 'DTSTART')
  if (!dtstart) {
    const uid = uidOf(event)
    throw new ParseError(`${event.name}${uid ? ` "${uid}"` : ''} has no DATE or DATE-TIME DTSTART`)
  }
  return dtstart
}

/**
 * Shift a time point by a duration. Weeks and days move the wall clock,
 * hours, minutes and seconds move the instant.
 */
function addDuration(point: TimePoint, duration: Duration): TimePoint {
  const days = duration.weeks * 7 + duration.days
  if (point.kind === 'date') {
    return { kind: 'date', date: addDays(point.date, days) }
  }
  const shiftedDay = addDays(point.local, days)
  const base = days === 0 ? point.epochMs : point.zone.toInstant({ ...point.local, ...shiftedDay })
  const epochMs = base + ((duration.hours * 60 + duration.minutes) * 60 + duration.seconds) * 1000
  return { kind: 'instant', epochMs, local: point.zone.toWallClock(epochMs), zone: point.zone }
}

/** DTEND, else DTSTART + DURATION, else one day for dates and zero length for date-times */
function effectiveEnd(properties: readonly CalendarProperty[], start: TimePoint, zones: ZoneContext): TimePoint {
  const dtend = properties.find((prop) => prop.name === 'DTEND')?.values[0]
  if (dtend?.type === 'date' || dtend?.type === 'date-time') {
    return toTimePoint(dtend, zones)
  }
  const duration = properties.find((prop) => prop.name === 'DURATION')?.values[0]
  if (duration?.type === 'duration') {
    return addDuration(start, duration.duration)
  }
  return start.kind === 'date' ? { kind: 'date', date: addDays(start.date, 1) } : start
}

function timeProperty(name: string, value: DateTimeValue | DateValue): CalendarProperty {
  if (value.type === 'date') {
    return { name, params: { VALUE: 'DATE' }, values: [value], raw: [formatCivilDate(value.date)] }
  }
  return {
    name,
    params: value.tzid === undefined ? {} : { TZID: value.tzid },
    values: [value],
    raw: [`${formatWallClock(value.local)}${value.utc ? 'Z' : ''}`],
  }
}

function occurrenceOf(
  properties: readonly CalendarProperty[],
  source: Occurrence['source'],
  uid: string | undefined,
  zones: ZoneContext,
): Occurrence {
  const dtstart = properties.find((prop) => prop.name === 'DTSTART')?.values[0]
  if (dtstart?.type !== 'date' && dtstart?.type !== 'date-time') {
    throw new ParseError(`VEVENT${uid ? ` "${uid}"` : ''} has no DATE or DATE-TIME DTSTART`)
  }
  const start = toTimePoint(dtstart, zones)
  return { uid, source, properties, start, end: effectiveEnd(properties, start, zones), zones }
}

// ─── Synthesis ───

/**
 * DTEND of a generated occurrence: the master's DTSTART→DTEND delta applied
 * to the candidate, in the frame of the master's DTEND.
 */
function shiftedEnd(
  masterStart: DateTimeValue | DateValue,
  masterEnd: DateTimeValue | DateValue,
  candidate: Candidate,
  zones: ZoneContext,
): DateTimeValue | DateValue | undefined {
  if (masterStart.type === 'date' && masterEnd.type === 'date' && candidate.point.kind === 'date') {
    const days = civilDateOrdinal(masterEnd.date) - civilDateOrdinal(masterStart.date)
    return { type: 'date', date: addDays(candidate.point.date, days) }
  }
  if (masterStart.type === 'date-time' && masterEnd.type === 'date-time' && candidate.point.kind === 'instant') {
    const delta =
      zoneOf(masterEnd, zones).toInstant(masterEnd.local) - zoneOf(masterStart, zones).toInstant(masterStart.local)
    return dateTimeInFrameOf(masterEnd, candidate.point.epochMs + delta, zones)
  }
  // Candidate and master disagree on DATE vs DATE-TIME; the default end applies
  return undefined
}

function periodEndValue(candidate: Candidate, zones: ZoneContext): DateTimeValue | undefined {
  const end = candidate.periodEnd
  if (!end || end.type === 'date-time') return end
  if (candidate.value.type !== 'date-time') return undefined
  const shifted = addDuration(candidate.point, end.duration)
  return shifted.kind === 'instant' ? dateTimeInFrameOf(candidate.value, shifted.epochMs, zones) : undefined
}

function synthesize(
  master: CalendarComponent,
  masterStart: DateTimeValue | DateValue,
  candidate: Candidate,
  zones: ZoneContext,
): CalendarProperty[] {
  const masterEnd = timeValue(master, 'DTEND')
  const fromPeriod = candidate.periodEnd !== undefined
  const end = fromPeriod
    ? periodEndValue(candidate, zones)
    : masterEnd && shiftedEnd(masterStart, masterEnd, candidate, zones)

  const properties: CalendarProperty[] = []
  let endPlaced = false

  for (const prop of master.properties) {
    if (RECURRENCE_PROPERTIES.has(prop.name)) continue
    if (prop.name === 'DTSTART') {
      properties.push(timeProperty('DTSTART', candidate.value))
    } else if (prop.name === 'DTEND') {
      if (end) properties.push(timeProperty('DTEND', end))
      endPlaced = true
    } else if (prop.name === 'DURATION' && fromPeriod) {
      continue
    } else {
      properties.push(prop)
    }
  }

  if (end && !endPlaced) properties.push(timeProperty('DTEND', end))
  properties.push(timeProperty('RECURRENCE-ID', candidate.value))
  return properties
}

// ─── Overrides ───

interface OverrideEntry {
  event: CalendarComponent
  sequence: number
  key: string
  point: TimePoint
}

/** Overrides by UID, then by RECURRENCE-ID key; highest SEQUENCE wins, later on a tie */
function collectOverrides(events: CalendarComponent[], zones: ZoneContext): Map<string, Map<string, OverrideEntry>> {
  const overrides = new Map<string, Map<string, OverrideEntry>>()

  for (const event of events) {
    const recurrenceId = timeValue(event, 'RECURRENCE-ID')
    if (!recurrenceId) continue

    const uid = uidOf(event)
    if (uid === undefined) {
      console.debug('[Expander] Dropping RECURRENCE-ID event without UID')
      continue
    }

    const point = toTimePoint(recurrenceId, zones)
    const entry: OverrideEntry = { event, sequence: sequenceOf(event), key: pointKey(point), point }
    const byKey = overrides.get(uid) ?? new Map<string, OverrideEntry>()
    const existing = byKey.get(entry.key)
    if (!existing || entry.sequence >= existing.sequence) {
      byKey.set(entry.key, entry)
    }
    overrides.set(uid, byKey)
  }

  return overrides
}

/** Midnight of `day` in the zone of DTSTART */
function boundAt(day: CivilDate, dtstart: DateTimeValue | DateValue, zones: ZoneContext): Horizon {
  const zone = dtstart.type === 'date-time' ? zoneOf(dtstart, zones) : zones.floating
  return { date: day, epochMs: zone.toInstant(startOfDay(day)) }
}

/**
 * Where RRULE generation for a master stops: the window end, pushed past
 * the latest RECURRENCE-ID so moved-in overrides still find their slot.
 */
function horizonFor(
  dtstart: DateTimeValue | DateValue,
  window: DateWindow,
  overrides: Map<string, OverrideEntry> | undefined,
  zones: ZoneContext,
): Horizon {
  const horizon = boundAt(window.end, dtstart, zones)

  for (const { point } of overrides?.values() ?? []) {
    if (point.kind === 'date') {
      const next = addDays(point.date, 1)
      if (civilDateOrdinal(next) > civilDateOrdinal(horizon.date)) horizon.date = next
    } else {
      horizon.epochMs = Math.max(horizon.epochMs, point.epochMs + 1)
    }
  }

  return horizon
}

// ─── Expansion ───

interface ResolvedOptions {
  inclusion: InclusionMode
  maxIterations: number
  zones: ZoneContext
}

function resolveOptions(document: CalendarDocument, options: ExpandOptions): ResolvedOptions {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new ConfigError(`maxIterations must be a positive integer, got ${maxIterations}`)
  }
  const inclusion = options.inclusion ?? 'start'
  if (inclusion !== 'start' && inclusion !== 'overlap') {
    throw new ConfigError(`Unknown inclusion mode "${String(inclusion)}"`)
  }
  return { inclusion, maxIterations, zones: createZoneContext(document, options.defaultTimezone) }
}

function isMaster(event: CalendarComponent): boolean {
  return (
    findProperty(event, 'RECURRENCE-ID') === undefined &&
    event.properties.some((prop) => prop.name === 'RRULE' || prop.name === 'RDATE')
  )
}

function expandMaster(
  master: CalendarComponent,
  window: DateWindow,
  overrides: Map<string, OverrideEntry> | undefined,
  consumed: Set<OverrideEntry>,
  options: ResolvedOptions,
): Occurrence[] {
  const { zones } = options
  const uid = uidOf(master)
  const dtstart = dtstartOf(master)
  const candidates = candidateStarts(master, dtstart, zones, {
    horizon: horizonFor(dtstart, window, overrides, zones),
    countFrom: boundAt(window.start, dtstart, zones),
    maxIterations: options.maxIterations,
    uid,
  })

  return candidates.map((candidate) => {
    const override = overrides?.get(pointKey(candidate.point))
    if (override) {
      consumed.add(override)
      const properties = override.event.properties.filter((prop) => !RECURRENCE_PROPERTIES.has(prop.name))
      return occurrenceOf(properties, 'override', uid, zones)
    }
    return occurrenceOf(synthesize(master, dtstart, candidate, zones), 'generated', uid, zones)
  })
}

/**
 * Expand every VEVENT of the document into the occurrences inside
 * [start, end).
 *
 * @throws InvalidWindowError for a bad window
 * @throws ExpansionLimitError when a series yields more than `maxIterations` RRULE starts from the window start on
 */
export function expandOccurrences(
  document: CalendarDocument,
  start: CivilDate | string,
  end: CivilDate | string,
  options: ExpandOptions = {},
): Occurrence[] {
  const window = resolveWindow(start, end)
  const resolved = resolveOptions(document, options)
  const { zones } = resolved

  const events = document.components.flatMap((calendar) =>
    calendar.components.filter((component) => component.name === 'VEVENT'),
  )
  const overrides = collectOverrides(events, zones)
  const consumed = new Set<OverrideEntry>()
  const occurrences: Occurrence[] = []

  for (const event of events) {
    if (findProperty(event, 'RECURRENCE-ID')) continue

    const uid = uidOf(event)
    const expanded = isMaster(event)
      ? expandMaster(event, window, uid === undefined ? undefined : overrides.get(uid), consumed, resolved)
      : [occurrenceOf(event.properties, 'single', uid, zones)]

    occurrences.push(...expanded.filter((occurrence) => inWindow(occurrence, window, resolved.inclusion)))
  }

  for (const [uid, byKey] of overrides) {
    for (const entry of byKey.values()) {
      if (!consumed.has(entry)) {
        console.debug(`[Expander] Dropping orphan override of "${uid}" at ${entry.key}`)
      }
    }
  }

  return occurrences
}

/**
 * Expand, then normalize every occurrence into a canonical record.
 *
 * @throws UnsupportedPropertyTypeError when a property has no canonical form
 */
export function expandAndNormalize(
  document: CalendarDocument,
  start: CivilDate | string,
  end: CivilDate | string,
  options: ExpandOptions = {},
): NormalizedRecord[] {
  return expandOccurrences(document, start, end, options).map(normalizeOccurrence)
}
