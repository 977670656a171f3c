/**
 * Civil Date Helpers
 *
 * Calendar-date arithmetic on luxon, evaluated at UTC midnight so no zone
 * rules apply. Dates never acquire a time-of-day or zone.
 */

import { DateTime } from 'luxon'
import type { CivilDate, WallClockTime } from './types.js'

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const EPOCH = DateTime.fromObject({ year: 1970, month: 1, day: 1 }, { zone: 'utc' })

function utcMidnight(date: CivilDate): DateTime {
  return DateTime.fromObject({ year: date.year, month: date.month, day: date.day }, { zone: 'utc' })
}

/**
 * True when the fields name a real day in the proleptic Gregorian calendar.
 */
export function isValidCivilDate(date: CivilDate): boolean {
  if (!Number.isInteger(date.year) || !Number.isInteger(date.month) || !Number.isInteger(date.day)) {
    return false
  }
  return utcMidnight(date).isValid
}

export function isValidWallClockTime(time: WallClockTime): boolean {
  // Leap seconds (60) are allowed by RFC 5545
  return (
    isValidCivilDate(time) &&
    time.hour >= 0 &&
    time.hour <= 23 &&
    time.minute >= 0 &&
    time.minute <= 59 &&
    time.second >= 0 &&
    time.second <= 60
  )
}

/**
 * Parse `YYYY-MM-DD`. Returns null for anything else, including impossible
 * dates such as 2019-02-30.
 */
export function parseCivilDate(value: string): CivilDate | null {
  const match = ISO_DATE.exec(value)
  if (!match) return null
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) }
  return isValidCivilDate(date) ? date : null
}

export function formatCivilDate(date: CivilDate): string {
  const yyyy = String(date.year).padStart(4, '0')
  const mm = String(date.month).padStart(2, '0')
  const dd = String(date.day).padStart(2, '0')
  return `${yyyy}-${mm}-${dd}`
}

/** Days since 1970-01-01; a total order over civil dates */
export function civilDateOrdinal(date: CivilDate): number {
  return utcMidnight(date).diff(EPOCH, 'days').days
}

export function compareCivilDates(a: CivilDate, b: CivilDate): number {
  return civilDateOrdinal(a) - civilDateOrdinal(b)
}

export function addDays(date: CivilDate, days: number): CivilDate {
  const shifted = utcMidnight(date).plus({ days })
  return { year: shifted.year, month: shifted.month, day: shifted.day }
}

export function toCivilDate(time: WallClockTime): CivilDate {
  return { year: time.year, month: time.month, day: time.day }
}

export function startOfDay(date: CivilDate): WallClockTime {
  return { year: date.year, month: date.month, day: date.day, hour: 0, minute: 0, second: 0 }
}

/** `YYYY-MM-DDTHH:MM:SS`, the jCal form of a wall-clock reading */
export function formatWallClock(time: WallClockTime): string {
  const hh = String(time.hour).padStart(2, '0')
  const mm = String(time.minute).padStart(2, '0')
  const ss = String(time.second).padStart(2, '0')
  return `${formatCivilDate(time)}T${hh}:${mm}:${ss}`
}
