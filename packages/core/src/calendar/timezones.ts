/**
 * Time Zone Resolution
 *
 * Maps the zone context of a DATE-TIME value onto a TimeZoneRule:
 * a VTIMEZONE defined in the same document (evaluated by ical.js),
 * an IANA zone (evaluated by luxon), UTC, or the configured zone for
 * floating values. Nothing is registered globally.
 */

import ICAL from 'ical.js'
import { DateTime, FixedOffsetZone, IANAZone, type Zone } from 'luxon'
import { ConfigError, ParseError } from './errors.js'
import type {
  CalendarDocument,
  DateTimeValue,
  DateValue,
  TimePoint,
  TimeZoneRule,
  WallClockTime,
  ZoneContext,
} from './types.js'

type IcalTimezone = InstanceType<typeof ICAL.Timezone>

/**
 * Zone rule backed by a luxon zone. Wall-clock times inside a DST gap are
 * shifted forward, as luxon does.
 */
function luxonZone(id: string, zone: Zone): TimeZoneRule {
  return {
    id,
    toInstant(local) {
      // second 60 is a leap second; luxon rejects it, so it rolls into the next minute
      const leap = local.second === 60 ? 1000 : 0
      const dt = DateTime.fromObject(
        {
          year: local.year,
          month: local.month,
          day: local.day,
          hour: local.hour,
          minute: local.minute,
          second: leap ? 59 : local.second,
        },
        { zone },
      )
      return dt.toMillis() + leap
    },
    toWallClock(epochMs) {
      const dt = DateTime.fromMillis(epochMs, { zone })
      return {
        year: dt.year,
        month: dt.month,
        day: dt.day,
        hour: dt.hour,
        minute: dt.minute,
        second: dt.second,
      }
    },
  }
}

export const UTC_ZONE: TimeZoneRule = luxonZone('UTC', FixedOffsetZone.utcInstance)

export function isIanaZone(tzid: string): boolean {
  return IANAZone.isValidZone(tzid)
}

/** Zone rule for an IANA identifier such as "Australia/Melbourne" */
export function ianaZone(tzid: string): TimeZoneRule {
  return luxonZone(tzid, IANAZone.create(tzid))
}

/**
 * Zone rule for a VTIMEZONE component. Offsets come from the component's
 * STANDARD/DAYLIGHT observances.
 */
export function vtimezoneZone(tzid: string, timezone: IcalTimezone): TimeZoneRule {
  const offsetSecondsAt = (local: WallClockTime): number =>
    timezone.utcOffset(
      ICAL.Time.fromData({
        year: local.year,
        month: local.month,
        day: local.day,
        hour: local.hour,
        minute: local.minute,
        second: local.second,
        isDate: false,
      }),
    )

  return {
    id: tzid,
    toInstant(local) {
      return UTC_ZONE.toInstant(local) - offsetSecondsAt(local) * 1000
    },
    toWallClock(epochMs) {
      // Guess the offset from the UTC reading, then correct it once
      const guess = offsetSecondsAt(UTC_ZONE.toWallClock(epochMs))
      const corrected = offsetSecondsAt(UTC_ZONE.toWallClock(epochMs + guess * 1000))
      return UTC_ZONE.toWallClock(epochMs + corrected * 1000)
    },
  }
}

/**
 * Resolve a configured zone name (used for floating values).
 */
export function zoneFromName(name: string): TimeZoneRule {
  if (name.toUpperCase() === 'UTC' || name === 'Z') return UTC_ZONE
  if (isIanaZone(name)) return ianaZone(name)
  throw new ConfigError(`Unknown time zone "${name}"`)
}

export function createZoneContext(document: CalendarDocument, defaultTimezone = 'UTC'): ZoneContext {
  return { timezones: document.timezones, floating: zoneFromName(defaultTimezone) }
}

/**
 * The zone a DATE-TIME value is written in.
 */
export function zoneOf(value: DateTimeValue, context: ZoneContext): TimeZoneRule {
  if (value.utc) return UTC_ZONE
  if (value.tzid === undefined) return context.floating

  const defined = context.timezones.get(value.tzid)
  if (defined) return defined
  if (isIanaZone(value.tzid)) return ianaZone(value.tzid)

  // The parser rejects unknown TZIDs, so this only fires for hand-built documents
  throw new ParseError(`Unknown time zone "${value.tzid}"`)
}

/**
 * Place a DATE or DATE-TIME value on the timeline.
 */
export function toTimePoint(value: DateTimeValue | DateValue, context: ZoneContext): TimePoint {
  if (value.type === 'date') {
    return { kind: 'date', date: value.date }
  }
  const zone = zoneOf(value, context)
  return { kind: 'instant', epochMs: zone.toInstant(value.local), local: value.local, zone }
}

/**
 * The instant `epochMs` expressed as a DATE-TIME value in the same frame as
 * `template` (same TZID, UTC flag or floating).
 */
export function dateTimeInFrameOf(
  template: DateTimeValue,
  epochMs: number,
  context: ZoneContext,
): DateTimeValue {
  const zone = zoneOf(template, context)
  return { ...template, local: zone.toWallClock(epochMs) }
}
