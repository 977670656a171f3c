/**
 * Recurrence Sets
 *
 * Candidate starts of a recurring master: DTSTART, RRULE instances and
 * RDATEs, minus EXDATEs. RRULEs are iterated by ical.js in the wall clock
 * of DTSTART and bounded by a horizon.
 */

import ICAL from 'ical.js'
import { civilDateOrdinal, formatCivilDate, toCivilDate } from './civil-date.js'
import { ExpansionLimitError } from './errors.js'
import { UTC_ZONE, toTimePoint, zoneOf } from './timezones.js'
import type {
  CalendarComponent,
  CivilDate,
  DateTimeValue,
  DateValue,
  DurationValue,
  Recur,
  TimePoint,
  WallClockTime,
  ZoneContext,
} from './types.js'

type IcalTime = InstanceType<typeof ICAL.Time>

export interface Candidate {
  /** Value written as the occurrence's DTSTART and RECURRENCE-ID */
  value: DateTimeValue | DateValue
  point: TimePoint
  /** End supplied by a PERIOD RDATE */
  periodEnd?: DateTimeValue | DurationValue
}

/**
 * A bound on generated starts. Dates are compared as dates, date-times by
 * instant.
 */
export interface Horizon {
  date: CivilDate
  epochMs: number
}

export interface CandidateOptions {
  /** Exclusive upper bound; generation stops here */
  horizon: Horizon
  /** Steps before this point are generated but not counted against `maxIterations` */
  countFrom: Horizon
  maxIterations: number
  uid?: string
}

/**
 * Stable key of a time point, used to match RECURRENCE-IDs and to dedupe.
 */
export function pointKey(point: TimePoint): string {
  return point.kind === 'date' ? `d:${formatCivilDate(point.date)}` : `t:${point.epochMs}`
}

/** Sort position of a time point; dates sit at UTC midnight */
export function pointOrder(point: TimePoint): number {
  return point.kind === 'date' ? civilDateOrdinal(point.date) * 86_400_000 : point.epochMs
}

function beforeBound(point: TimePoint, bound: Horizon): boolean {
  return point.kind === 'date'
    ? civilDateOrdinal(point.date) < civilDateOrdinal(bound.date)
    : point.epochMs < bound.epochMs
}

function icalDate(date: CivilDate): IcalTime {
  return ICAL.Time.fromData({ year: date.year, month: date.month, day: date.day, isDate: true })
}

function icalDateTime(local: WallClockTime): IcalTime {
  return ICAL.Time.fromData({
    year: local.year,
    month: local.month,
    day: local.day,
    hour: local.hour,
    minute: local.minute,
    second: local.second,
    isDate: false,
  })
}

/**
 * Copy of the rule whose UNTIL is expressed in the wall clock of DTSTART,
 * so ical.js compares like with like.
 */
function localizeRule(recur: Recur, dtstart: DateTimeValue | DateValue, context: ZoneContext): Recur {
  const rule = recur.clone()
  const until: unknown = rule.until
  if (!(until instanceof ICAL.Time)) return rule

  if (dtstart.type === 'date') {
    rule.until = icalDate(until)
    return rule
  }

  if (until.isDate) {
    // A DATE UNTIL on a DATE-TIME series covers the whole day
    rule.until = icalDateTime({
      year: until.year,
      month: until.month,
      day: until.day,
      hour: 23,
      minute: 59,
      second: 59,
    })
    return rule
  }

  if (until.zone?.tzid === 'UTC') {
    const untilMs = UTC_ZONE.toInstant({
      year: until.year,
      month: until.month,
      day: until.day,
      hour: until.hour,
      minute: until.minute,
      second: until.second,
    })
    rule.until = icalDateTime(zoneOf(dtstart, context).toWallClock(untilMs))
  }
  return rule
}

function rruleStarts(
  recur: Recur,
  dtstart: DateTimeValue | DateValue,
  context: ZoneContext,
  options: CandidateOptions,
): Candidate[] {
  const rule = localizeRule(recur, dtstart, context)
  const start = dtstart.type === 'date' ? icalDate(dtstart.date) : icalDateTime(dtstart.local)
  const iterator = rule.iterator(start)
  const candidates: Candidate[] = []
  let counted = 0

  for (;;) {
    const next: unknown = iterator.next()
    if (!(next instanceof ICAL.Time)) break

    const value: DateTimeValue | DateValue =
      dtstart.type === 'date'
        ? { type: 'date', date: { year: next.year, month: next.month, day: next.day } }
        : {
            ...dtstart,
            local: {
              year: next.year,
              month: next.month,
              day: next.day,
              hour: next.hour,
              minute: next.minute,
              second: next.second,
            },
          }
    const point = toTimePoint(value, context)
    if (!beforeBound(point, options.horizon)) break
    if (!beforeBound(point, options.countFrom) && ++counted > options.maxIterations) {
      throw new ExpansionLimitError(options.maxIterations, options.uid)
    }
    candidates.push({ value, point })
  }

  return candidates
}

function rdateStarts(event: CalendarComponent, context: ZoneContext): Candidate[] {
  const candidates: Candidate[] = []
  for (const property of event.properties) {
    if (property.name !== 'RDATE') continue
    for (const value of property.values) {
      if (value.type === 'date' || value.type === 'date-time') {
        candidates.push({ value, point: toTimePoint(value, context) })
      } else if (value.type === 'period') {
        candidates.push({ value: value.start, point: toTimePoint(value.start, context), periodEnd: value.end })
      }
    }
  }
  return candidates
}

/**
 * EXDATE test. DATE-TIME entries match by instant; a DATE entry matches
 * every candidate starting on that date in the candidate's own zone.
 */
function exclusionTest(event: CalendarComponent, context: ZoneContext): (point: TimePoint) => boolean {
  const instants = new Set<number>()
  const dates = new Set<string>()

  for (const property of event.properties) {
    if (property.name !== 'EXDATE') continue
    for (const value of property.values) {
      if (value.type === 'date') {
        dates.add(formatCivilDate(value.date))
      } else if (value.type === 'date-time') {
        const point = toTimePoint(value, context)
        if (point.kind === 'instant') instants.add(point.epochMs)
      }
    }
  }

  return (point) =>
    point.kind === 'date'
      ? dates.has(formatCivilDate(point.date))
      : instants.has(point.epochMs) || dates.has(formatCivilDate(toCivilDate(point.local)))
}

/**
 * Candidate starts of a master event, deduplicated and in chronological
 * order. The master's DTSTART is always the first candidate unless excluded.
 *
 * @throws ExpansionLimitError when an RRULE yields more than `maxIterations` starts
 * between `countFrom` and the horizon
 */
export function candidateStarts(
  event: CalendarComponent,
  dtstart: DateTimeValue | DateValue,
  context: ZoneContext,
  options: CandidateOptions,
): Candidate[] {
  const all: Candidate[] = [{ value: dtstart, point: toTimePoint(dtstart, context) }]

  for (const property of event.properties) {
    if (property.name !== 'RRULE') continue
    for (const value of property.values) {
      if (value.type === 'recur') all.push(...rruleStarts(value.rule, dtstart, context, options))
    }
  }
  all.push(...rdateStarts(event, context))

  const excluded = exclusionTest(event, context)
  const seen = new Set<string>()
  const candidates: Candidate[] = []
  for (const candidate of all) {
    const key = pointKey(candidate.point)
    if (seen.has(key) || excluded(candidate.point)) continue
    seen.add(key)
    candidates.push(candidate)
  }

  return candidates.sort((a, b) => pointOrder(a.point) - pointOrder(b.point))
}
