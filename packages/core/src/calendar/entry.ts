/**
 * Calendar Entries
 *
 * Typed view of a normalized record: what a scheduler needs to know about
 * one occurrence.
 */

import { DateTime, Duration } from 'luxon'
import { z } from 'zod'
import { addDays } from './civil-date.js'
import { EntryConversionError } from './errors.js'
import type { CalendarEntry, NormalizedRecord, StartEnd } from './types.js'

// ─── Schemas ───

const dateTimeSchema = z.custom<DateTime>((value) => DateTime.isDateTime(value), 'Expected a luxon DateTime')
const durationSchema = z.custom<Duration>((value) => Duration.isDuration(value), 'Expected a luxon Duration')

const instantValue = z.object({ kind: z.literal('instant'), value: dateTimeSchema })
const dateValue = z.object({
  kind: z.literal('date'),
  value: z.object({ year: z.number().int(), month: z.number().int(), day: z.number().int() }),
})
const timeValue = z.discriminatedUnion('kind', [instantValue, dateValue])
const textValue = z.object({ kind: z.literal('text'), value: z.string() })

const entryRecordSchema = z.object({
  UID: textValue,
  DTSTART: timeValue,
  DTSTAMP: instantValue,
  DTEND: timeValue.optional(),
  DURATION: z.object({ kind: z.literal('duration'), value: durationSchema }).optional(),
  SUMMARY: textValue.optional(),
  DESCRIPTION: textValue.optional(),
  LOCATION: textValue.optional(),
  STATUS: textValue.optional(),
  TRANSP: textValue.optional(),
  SEQUENCE: z.object({ kind: z.literal('integer'), value: z.number().int() }).optional(),
  CREATED: instantValue.optional(),
  'LAST-MODIFIED': instantValue.optional(),
  'RECURRENCE-ID': timeValue.optional(),
})

type EntryRecord = z.infer<typeof entryRecordSchema>

// ─── Conversion ───

function describeKind(kind: 'instant' | 'date'): string {
  return kind === 'instant' ? 'a date-time' : 'a date'
}

function startEndOf(record: EntryRecord): StartEnd {
  const start = record.DTSTART
  const end = record.DTEND
  const uid = record.UID.value

  if (end && end.kind !== start.kind) {
    throw new EntryConversionError(`DTSTART is ${describeKind(start.kind)} but DTEND is ${describeKind(end.kind)}`, uid)
  }

  if (start.kind === 'date') {
    if (end?.kind === 'date') return { kind: 'date', start: start.value, end: end.value }
    const duration = record.DURATION?.value
    const days = duration ? duration.weeks * 7 + duration.days : 1
    return { kind: 'date', start: start.value, end: addDays(start.value, days) }
  }

  if (end?.kind === 'instant') return { kind: 'date-time', start: start.value, end: end.value }
  const duration = record.DURATION?.value
  return { kind: 'date-time', start: start.value, end: duration ? start.value.plus(duration) : start.value }
}

/**
 * Convert one normalized record.
 *
 * @throws EntryConversionError when required fields are missing or DTSTART and DTEND disagree
 */
export function toCalendarEntry(record: NormalizedRecord): CalendarEntry {
  const parsed = entryRecordSchema.safeParse(record)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const uid = record.UID?.kind === 'text' ? record.UID.value : undefined
    throw new EntryConversionError(`Invalid ${issue.path.join('.') || 'record'}: ${issue.message}`, uid)
  }

  const data = parsed.data
  return {
    summary: data.SUMMARY?.value ?? '',
    description: data.DESCRIPTION?.value,
    location: data.LOCATION?.value,
    uid: data.UID.value,
    status: data.STATUS?.value,
    transp: data.TRANSP?.value ?? 'OPAQUE',
    sequence: data.SEQUENCE?.value ?? 0,
    startEnd: startEndOf(data),
    stamp: data.DTSTAMP.value,
    created: data.CREATED?.value,
    lastModified: data['LAST-MODIFIED']?.value,
    recurrenceId: data['RECURRENCE-ID'],
  }
}

export function toCalendarEntries(records: readonly NormalizedRecord[]): CalendarEntry[] {
  return records.map(toCalendarEntry)
}
