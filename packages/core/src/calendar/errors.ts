/**
 * Calendar Errors
 *
 * Every error is fatal to the call that raised it. Callers switch on
 * `code` (or `instanceof`) to decide whether to retry, skip or alert.
 */

export type CalendarErrorCode =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'INVALID_WINDOW'
  | 'UNSUPPORTED_PROPERTY_TYPE'
  | 'EXPANSION_LIMIT'
  | 'ENTRY_CONVERSION'
  | 'INVALID_CONFIG'

/** Base class for all calendar errors. */
export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CalendarError'
    this.code = code
  }
}

/** Retrieving the calendar bytes failed (network, timeout, HTTP status). */
export class FetchError extends CalendarError {
  readonly url: string
  readonly status?: number

  constructor(url: string, message: string, status?: number, options?: ErrorOptions) {
    super('FETCH_FAILED', message, options)
    this.name = 'FetchError'
    this.url = url
    this.status = status
  }
}

/** The input is not well-formed iCalendar. */
export class ParseError extends CalendarError {
  /** 1-based content line, when the failure is tied to one */
  readonly line?: number

  constructor(message: string, line?: number, options?: ErrorOptions) {
    super('PARSE_FAILED', line === undefined ? message : `Line ${line}: ${message}`, options)
    this.name = 'ParseError'
    this.line = line
  }
}

export class InvalidWindowError extends CalendarError {
  constructor(message: string) {
    super('INVALID_WINDOW', message)
    this.name = 'InvalidWindowError'
  }
}

/** A property value has no mapping into the canonical value model. */
export class UnsupportedPropertyTypeError extends CalendarError {
  readonly propertyName: string
  readonly rawValue: unknown

  constructor(propertyName: string, rawValue: unknown) {
    super(
      'UNSUPPORTED_PROPERTY_TYPE',
      `Unsupported value for property ${propertyName}: ${describeRaw(rawValue)}`,
    )
    this.name = 'UnsupportedPropertyTypeError'
    this.propertyName = propertyName
    this.rawValue = rawValue
  }
}

/** RRULE iteration for one series ran past the configured bound. */
export class ExpansionLimitError extends CalendarError {
  readonly uid?: string
  readonly limit: number

  constructor(limit: number, uid?: string) {
    super(
      'EXPANSION_LIMIT',
      `Recurrence expansion of ${uid ? `"${uid}"` : 'an event without UID'} exceeded ${limit} iterations`,
    )
    this.name = 'ExpansionLimitError'
    this.uid = uid
    this.limit = limit
  }
}

export class EntryConversionError extends CalendarError {
  readonly uid?: string

  constructor(message: string, uid?: string) {
    super('ENTRY_CONVERSION', uid ? `${message} (event "${uid}")` : message)
    this.name = 'EntryConversionError'
    this.uid = uid
  }
}

export class ConfigError extends CalendarError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigError'
  }
}

function describeRaw(raw: unknown): string {
  try {
    return JSON.stringify(raw) ?? String(raw)
  } catch {
    return String(raw)
  }
}
