/**
 * Calendar Entry Tests
 */

import { readFileSync } from 'node:fs'
import { describe, it, expect } from 'vitest'
import { DateTime, Duration } from 'luxon'
import { toCalendarEntries, toCalendarEntry } from '../src/calendar/entry.js'
import { EntryConversionError } from '../src/calendar/errors.js'
import { expandAndNormalize } from '../src/calendar/expander.js'
import { parseCalendar } from '../src/calendar/parser.js'
import type { NormalizedRecord } from '../src/calendar/types.js'

const utc = (iso: string) => DateTime.fromISO(iso, { zone: 'utc' })

function baseRecord(): NormalizedRecord {
  return {
    UID: { kind: 'text', value: 'entry@example.test' },
    DTSTAMP: { kind: 'instant', value: utc('2019-03-01T00:00:00Z') },
    DTSTART: { kind: 'instant', value: utc('2019-03-10T09:00:00Z') },
  }
}

describe('toCalendarEntry', () => {
  it('fills defaults for optional fields', () => {
    const entry = toCalendarEntry(baseRecord())
    expect(entry.summary).toBe('')
    expect(entry.transp).toBe('OPAQUE')
    expect(entry.sequence).toBe(0)
    expect(entry.uid).toBe('entry@example.test')
    expect(entry.description).toBeUndefined()
    expect(entry.recurrenceId).toBeUndefined()
  })

  it('uses DTEND when present', () => {
    const entry = toCalendarEntry({
      ...baseRecord(),
      DTEND: { kind: 'instant', value: utc('2019-03-10T10:30:00Z') },
      SUMMARY: { kind: 'text', value: 'Boiler service' },
      SEQUENCE: { kind: 'integer', value: 2 },
    })
    expect(entry.summary).toBe('Boiler service')
    expect(entry.sequence).toBe(2)
    expect(entry.startEnd.kind).toBe('date-time')
    if (entry.startEnd.kind === 'date-time') {
      expect(entry.startEnd.end.toMillis()).toBe(Date.UTC(2019, 2, 10, 10, 30, 0))
    }
  })

  it('derives the end from DURATION', () => {
    const entry = toCalendarEntry({
      ...baseRecord(),
      DURATION: { kind: 'duration', value: Duration.fromObject({ minutes: 45 }) },
    })
    expect(entry.startEnd.kind === 'date-time' && entry.startEnd.end.toMillis()).toBe(
      Date.UTC(2019, 2, 10, 9, 45, 0),
    )
  })

  it('ends a date-time event without DTEND or DURATION at its start', () => {
    const entry = toCalendarEntry(baseRecord())
    expect(entry.startEnd.kind === 'date-time' && entry.startEnd.end.toMillis()).toBe(Date.UTC(2019, 2, 10, 9, 0, 0))
  })

  it('gives an all-day event without DTEND one day', () => {
    const entry = toCalendarEntry({ ...baseRecord(), DTSTART: { kind: 'date', value: { year: 2019, month: 2, day: 28 } } })
    expect(entry.startEnd).toEqual({
      kind: 'date',
      start: { year: 2019, month: 2, day: 28 },
      end: { year: 2019, month: 3, day: 1 },
    })
  })

  it('rejects a date-time start with a date end', () => {
    const record: NormalizedRecord = { ...baseRecord(), DTEND: { kind: 'date', value: { year: 2019, month: 3, day: 11 } } }
    expect(() => toCalendarEntry(record)).toThrow(
      new EntryConversionError('DTSTART is a date-time but DTEND is a date', 'entry@example.test'),
    )
    expect(() => toCalendarEntry(record)).toThrow('DTSTART is a date-time but DTEND is a date (event "entry@example.test")')
  })

  it('rejects a date start with a date-time end', () => {
    const record: NormalizedRecord = {
      ...baseRecord(),
      DTSTART: { kind: 'date', value: { year: 2019, month: 3, day: 10 } },
      DTEND: { kind: 'instant', value: utc('2019-03-11T00:00:00Z') },
    }
    expect(() => toCalendarEntry(record)).toThrow('DTSTART is a date but DTEND is a date-time')
  })

  it('rejects records without a UID', () => {
    const { UID: _uid, ...record } = baseRecord()
    expect(() => toCalendarEntry(record)).toThrow(EntryConversionError)
    expect(() => toCalendarEntry(record)).toThrow(/^Invalid UID/)
  })

  it('rejects a DTSTAMP that is not an instant', () => {
    const record: NormalizedRecord = { ...baseRecord(), DTSTAMP: { kind: 'text', value: 'yesterday' } }
    expect(() => toCalendarEntry(record)).toThrow(/^Invalid DTSTAMP/)
  })
})

describe('toCalendarEntries', () => {
  it('converts every expanded occurrence', () => {
    const document = parseCalendar(readFileSync(new URL('./fixtures/household.ics', import.meta.url)))
    const entries = toCalendarEntries(expandAndNormalize(document, '2019-04-01', '2019-05-01'))

    expect(entries.map((e) => e.summary)).toEqual([
      'Put the bins out (holiday)',
      'Put the bins out',
      'Public holiday',
    ])
    expect(entries[0].sequence).toBe(1)
    expect(entries[0].recurrenceId?.kind).toBe('instant')
    expect(entries[2].transp).toBe('TRANSPARENT')
    expect(entries[2].startEnd).toEqual({
      kind: 'date',
      start: { year: 2019, month: 4, day: 19 },
      end: { year: 2019, month: 4, day: 20 },
    })
  })
})
