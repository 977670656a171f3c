/**
 * Calendar Fetcher Tests
 *
 * A mocked fetch stands in for the HTTP server.
 */

import { readFileSync } from 'node:fs'
import { describe, it, expect, vi, afterEach } from 'vitest'
import { fetchCalendar, loadCalendar, loadCalendarEntries } from '../src/calendar/fetcher.js'
import { FetchError, InvalidWindowError, ParseError } from '../src/calendar/errors.js'

const URL_UNDER_TEST = 'https://calendar.test/feed.ics'
const meeting = readFileSync(new URL('./fixtures/meeting.ics', import.meta.url), 'utf-8')

function respondWith(body: string, status = 200) {
  return vi.fn<typeof fetch>().mockImplementation(async () => new Response(body, { status }))
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('fetchCalendar', () => {
  it('returns the response body as bytes', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    const fetchMock = respondWith('BEGIN:VCALENDAR')
    const bytes = await fetchCalendar(URL_UNDER_TEST, { fetch: fetchMock })
    expect(new TextDecoder().decode(bytes)).toBe('BEGIN:VCALENDAR')
  })

  it('sends Accept and User-Agent headers', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    const fetchMock = respondWith('')
    await fetchCalendar(URL_UNDER_TEST, { fetch: fetchMock, userAgent: 'household-test/1.0' })

    expect(fetchMock).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        method: 'GET',
        headers: { Accept: 'text/calendar', 'User-Agent': 'household-test/1.0' },
      }),
    )
  })

  it('rejects non-2xx responses with the status', async () => {
    const fetchMock = respondWith('not here', 404)
    let caught: unknown
    try {
      await fetchCalendar(URL_UNDER_TEST, { fetch: fetchMock })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(FetchError)
    if (caught instanceof FetchError) {
      expect(caught.status).toBe(404)
      expect(caught.url).toBe(URL_UNDER_TEST)
      expect(caught.message).toBe('Fetching https://calendar.test/feed.ics returned HTTP 404')
    }
  })

  it('wraps network failures', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error('ECONNREFUSED'))
    await expect(fetchCalendar(URL_UNDER_TEST, { fetch: fetchMock })).rejects.toThrow(
      'Cannot fetch https://calendar.test/feed.ics: ECONNREFUSED',
    )
  })

  it('reports timeouts', async () => {
    const timeout = new Error('The operation was aborted due to timeout')
    timeout.name = 'TimeoutError'
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(timeout)
    await expect(fetchCalendar(URL_UNDER_TEST, { fetch: fetchMock, timeoutMs: 5000 })).rejects.toThrow(
      'Timed out after 5000ms fetching https://calendar.test/feed.ics',
    )
  })
})

describe('loadCalendar', () => {
  it('runs fetch, parse, expand and normalize', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    const records = await loadCalendar(URL_UNDER_TEST, '2019-03-01', '2019-04-01', { fetch: respondWith(meeting) })

    expect(records).toHaveLength(1)
    expect(records[0].SUMMARY).toEqual({ kind: 'text', value: 'Meeting' })
    const start = records[0].DTSTART
    expect(start.kind === 'instant' && start.value.toMillis()).toBe(Date.UTC(2019, 2, 9, 23, 0, 0))
  })

  it('returns nothing when the window misses every event', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    const records = await loadCalendar(URL_UNDER_TEST, '2019-04-01', '2019-05-01', { fetch: respondWith(meeting) })
    expect(records).toEqual([])
  })

  it('propagates parse errors', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    await expect(
      loadCalendar(URL_UNDER_TEST, '2019-03-01', '2019-04-01', { fetch: respondWith('<html></html>') }),
    ).rejects.toThrow(ParseError)
  })

  it('propagates window errors', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    await expect(
      loadCalendar(URL_UNDER_TEST, '2019-04-01', '2019-03-01', { fetch: respondWith(meeting) }),
    ).rejects.toThrow(InvalidWindowError)
  })

  it('converts to calendar entries', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    const entries = await loadCalendarEntries(URL_UNDER_TEST, '2019-03-01', '2019-04-01', {
      fetch: respondWith(meeting),
    })
    expect(entries.map((e) => [e.uid, e.summary, e.sequence])).toEqual([['meeting-0310@example.test', 'Meeting', 0]])
  })
})
