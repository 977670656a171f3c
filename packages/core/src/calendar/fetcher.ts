/**
 * Calendar Fetcher
 *
 * Retrieves calendar bytes over HTTP and runs the load pipeline:
 * fetch → parse → expand → normalize.
 */

import { toCalendarEntries } from './entry.js'
import { FetchError } from './errors.js'
import { expandAndNormalize } from './expander.js'
import { parseCalendar } from './parser.js'
import type { CalendarEntry, CivilDate, ExpandOptions, NormalizedRecord } from './types.js'

export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_USER_AGENT = 'ical-occurrences/0.1'

export interface FetchOptions {
  /** Defaults to the global fetch */
  fetch?: typeof fetch
  timeoutMs?: number
  userAgent?: string
}

export type LoadOptions = FetchOptions & ExpandOptions

/**
 * GET a calendar.
 *
 * @throws FetchError on network failure, timeout or a non-2xx status
 */
export async function fetchCalendar(url: string, options: FetchOptions = {}): Promise<Uint8Array> {
  const fetchImpl = options.fetch ?? fetch
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS

  let response: Response
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: {
        Accept: 'text/calendar',
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      },
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      throw new FetchError(url, `Timed out after ${timeoutMs}ms fetching ${url}`, undefined, { cause: err })
    }
    const reason = err instanceof Error ? err.message : String(err)
    throw new FetchError(url, `Cannot fetch ${url}: ${reason}`, undefined, { cause: err })
  }

  if (!response.ok) {
    throw new FetchError(url, `Fetching ${url} returned HTTP ${response.status}`, response.status)
  }

  try {
    const body = new Uint8Array(await response.arrayBuffer())
    console.debug(`[Fetcher] ${url}: ${body.byteLength} bytes`)
    return body
  } catch (err) {
    throw new FetchError(url, `Failed to read response body from ${url}`, response.status, { cause: err })
  }
}

/**
 * Fetch a calendar and return the normalized occurrences in [start, end).
 * Errors from each stage propagate unchanged.
 */
export async function loadCalendar(
  url: string,
  start: CivilDate | string,
  end: CivilDate | string,
  options: LoadOptions = {},
): Promise<NormalizedRecord[]> {
  const bytes = await fetchCalendar(url, options)
  const document = parseCalendar(bytes)
  return expandAndNormalize(document, start, end, options)
}

export async function loadCalendarEntries(
  url: string,
  start: CivilDate | string,
  end: CivilDate | string,
  options: LoadOptions = {},
): Promise<CalendarEntry[]> {
  return toCalendarEntries(await loadCalendar(url, start, end, options))
}
