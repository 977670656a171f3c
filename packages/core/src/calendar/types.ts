/**
 * Calendar Types
 *
 * Document model produced by the parser, the occurrence model produced by
 * the expander, and the canonical value model handed to consumers.
 */

import type ICAL from 'ical.js'
import type { DateTime, Duration } from 'luxon'

export type Recur = InstanceType<typeof ICAL.Recur>

// ─── Time primitives ───

/** A calendar date with no time-of-day and no zone */
export interface CivilDate {
  year: number
  month: number
  day: number
}

/** A wall-clock reading, meaningful only together with a zone */
export interface WallClockTime extends CivilDate {
  hour: number
  minute: number
  second: number
}

/**
 * A zone that can translate between wall-clock time and absolute instants.
 * Backed by a VTIMEZONE definition, an IANA zone, or UTC.
 */
export interface TimeZoneRule {
  readonly id: string
  toInstant(local: WallClockTime): number
  toWallClock(epochMs: number): WallClockTime
}

/**
 * Zones needed to place values on the timeline: the document's VTIMEZONEs
 * plus the zone used for floating values.
 */
export interface ZoneContext {
  timezones: ReadonlyMap<string, TimeZoneRule>
  floating: TimeZoneRule
}

// ─── Decoded property values ───

export interface DateTimeValue {
  type: 'date-time'
  local: WallClockTime
  /** True for values written with a trailing `Z` */
  utc: boolean
  tzid?: string
}

export interface DateValue {
  type: 'date'
  date: CivilDate
}

export interface DurationValue {
  type: 'duration'
  duration: Duration
}

export interface IntegerValue {
  type: 'integer'
  value: number
}

/** TEXT, CAL-ADDRESS, URI and untyped X- values */
export interface TextValue {
  type: 'text'
  value: string
}

export interface RecurValue {
  type: 'recur'
  rule: Recur
}

export interface PeriodValue {
  type: 'period'
  start: DateTimeValue
  end: DateTimeValue | DurationValue
}

/** Values the canonical model has no mapping for (FLOAT, GEO, BOOLEAN, ...) */
export interface OtherValue {
  type: 'other'
  valueType: string
  raw: unknown
}

export type PropertyValue =
  | DateTimeValue
  | DateValue
  | DurationValue
  | IntegerValue
  | TextValue
  | RecurValue
  | PeriodValue
  | OtherValue

// ─── Document ───

export interface CalendarProperty {
  /** Upper-case property name, e.g. "DTSTART" */
  readonly name: string
  /** Parameters keyed by upper-case name; multi-valued parameters are comma-joined */
  readonly params: Readonly<Record<string, string>>
  readonly values: readonly PropertyValue[]
  /** jCal values as produced by the tokenizer, kept for diagnostics */
  readonly raw: readonly unknown[]
}

export interface CalendarComponent {
  /** Upper-case component name, e.g. "VEVENT" */
  readonly name: string
  readonly properties: readonly CalendarProperty[]
  readonly components: readonly CalendarComponent[]
}

/**
 * A parsed iCalendar document.
 * Immutable; VTIMEZONE definitions are resolved per document.
 */
export interface CalendarDocument {
  /** Top-level components, each a VCALENDAR */
  readonly components: readonly CalendarComponent[]
  /** Zones defined by VTIMEZONE components, keyed by TZID */
  readonly timezones: ReadonlyMap<string, TimeZoneRule>
}

// ─── Expansion ───

export type TimePoint =
  | { kind: 'date'; date: CivilDate }
  | { kind: 'instant'; epochMs: number; local: WallClockTime; zone: TimeZoneRule }

export type OccurrenceSource = 'single' | 'generated' | 'override'

/**
 * One concrete event instance.
 * `properties` is what gets normalized; `start`/`end` are resolved copies
 * of its DTSTART and effective end, used for windowing.
 */
export interface Occurrence {
  uid?: string
  source: OccurrenceSource
  properties: readonly CalendarProperty[]
  start: TimePoint
  end: TimePoint
  /** Zones the property values are resolved against */
  zones: ZoneContext
}

/** Which occurrences a window keeps */
export type InclusionMode = 'start' | 'overlap'

export interface ExpandOptions {
  /** Zone for floating date-times (no TZID, no `Z`). Default: UTC */
  defaultTimezone?: string
  /** Default: 'start' */
  inclusion?: InclusionMode
  /** Upper bound on RRULE iterations per master. Default: 100000 */
  maxIterations?: number
}

// ─── Canonical value model ───

export type CanonicalValue =
  | { kind: 'instant'; value: DateTime }
  | { kind: 'date'; value: CivilDate }
  | { kind: 'duration'; value: Duration }
  | { kind: 'integer'; value: number }
  | { kind: 'text'; value: string }

/** Property name (upper-case) to canonical value */
export type NormalizedRecord = Record<string, CanonicalValue>

// ─── Calendar entries ───

export type StartEnd =
  | { kind: 'date'; start: CivilDate; end: CivilDate }
  | { kind: 'date-time'; start: DateTime; end: DateTime }

/**
 * Typed view of a normalized record, the shape a scheduler consumes.
 */
export interface CalendarEntry {
  /** Event title; empty when the event has no SUMMARY */
  summary: string
  description?: string
  location?: string
  uid: string
  status?: string
  /** OPAQUE unless the event says otherwise */
  transp: string
  sequence: number
  startEnd: StartEnd
  stamp: DateTime
  created?: DateTime
  lastModified?: DateTime
  /** Present on occurrences of recurring series */
  recurrenceId?: { kind: 'date'; value: CivilDate } | { kind: 'instant'; value: DateTime }
}
