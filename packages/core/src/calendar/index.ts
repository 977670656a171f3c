/**
 * Calendar System
 *
 * iCalendar parsing, recurrence expansion and value normalization.
 */

// Types
export type {
  CalendarComponent,
  CalendarDocument,
  CalendarEntry,
  CalendarProperty,
  CanonicalValue,
  CivilDate,
  ExpandOptions,
  InclusionMode,
  NormalizedRecord,
  Occurrence,
  OccurrenceSource,
  PropertyValue,
  StartEnd,
  TimePoint,
  TimeZoneRule,
  WallClockTime,
  ZoneContext,
} from './types.js'

// Errors
export {
  CalendarError,
  ConfigError,
  EntryConversionError,
  ExpansionLimitError,
  FetchError,
  InvalidWindowError,
  ParseError,
  UnsupportedPropertyTypeError,
} from './errors.js'
export type { CalendarErrorCode } from './errors.js'

// Implementation
export { parseCalendar, parseIcalDuration, unfoldLines } from './parser.js'
export { createZoneContext, isIanaZone, zoneFromName } from './timezones.js'
export { expandAndNormalize, expandOccurrences, resolveWindow, DEFAULT_MAX_ITERATIONS } from './expander.js'
export type { DateWindow } from './expander.js'
export { classifyProperty, normalizeOccurrence } from './normalizer.js'
export type { PropertyClass } from './normalizer.js'
export { toCalendarEntries, toCalendarEntry } from './entry.js'
export { fetchCalendar, loadCalendar, loadCalendarEntries, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './fetcher.js'
export type { FetchOptions, LoadOptions } from './fetcher.js'
export { formatCivilDate, parseCivilDate } from './civil-date.js'
