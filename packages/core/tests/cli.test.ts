/**
 * CLI Tests
 */

import { readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { DateTime, Duration } from 'luxon'
import { runCli, toJsonValue } from '../src/index.js'

const meeting = readFileSync(new URL('./fixtures/meeting.ics', import.meta.url), 'utf-8')
const noConfig = path.join(tmpdir(), 'ical-occurrences-missing', 'calendar.yaml')

function harness(body = meeting) {
  const out: string[] = []
  const err: string[] = []
  const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response(body))
  return {
    out,
    err,
    fetchMock,
    deps: { fetch: fetchMock, log: (text: string) => out.push(text), error: (text: string) => err.push(text) },
  }
}

beforeEach(() => {
  vi.stubEnv('ICAL_DEFAULT_TIMEZONE', '')
  vi.spyOn(console, 'debug').mockImplementation(() => {})
})

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

describe('runCli', () => {
  it('prints occurrences as JSON', async () => {
    const h = harness()
    const code = await runCli(
      ['--config', noConfig, 'https://calendar.test/feed.ics', '2019-03-01', '2019-04-01'],
      h.deps,
    )

    expect(code).toBe(0)
    expect(h.err).toEqual([])
    expect(JSON.parse(h.out[0])).toEqual([
      {
        UID: 'meeting-0310@example.test',
        DTSTAMP: '2019-03-01T00:00:00Z',
        DTSTART: '2019-03-09T23:00:00Z',
        DTEND: '2019-03-10T00:00:00Z',
        SUMMARY: 'Meeting',
        SEQUENCE: 0,
      },
    ])
  })

  it('fetches webcal URLs over https', async () => {
    const h = harness()
    await runCli(['--config', noConfig, 'webcal://calendar.test/feed.ics', '2019-03-01', '2019-04-01'], h.deps)
    expect(h.fetchMock.mock.calls[0][0]).toBe('https://calendar.test/feed.ics')
  })

  it('prints usage for the wrong number of arguments', async () => {
    const h = harness()
    expect(await runCli(['https://calendar.test/feed.ics'], h.deps)).toBe(1)
    expect(h.err).toEqual([
      'Usage: ical-occurrences [--config <file>] <url|calendar-name> <start YYYY-MM-DD> <end YYYY-MM-DD>',
    ])
    expect(h.fetchMock).not.toHaveBeenCalled()
  })

  it('reports unknown calendar names', async () => {
    const h = harness()
    expect(await runCli(['--config', noConfig, 'work', '2019-03-01', '2019-04-01'], h.deps)).toBe(1)
    expect(h.err).toEqual(['[CLI] ConfigError: Unknown calendar "work"'])
  })

  it('reports pipeline errors by name', async () => {
    const h = harness()
    const code = await runCli(
      ['--config', noConfig, 'https://calendar.test/feed.ics', '2019-04-01', '2019-03-01'],
      h.deps,
    )
    expect(code).toBe(1)
    expect(h.err).toEqual(['[CLI] InvalidWindowError: Window start 2019-04-01 is after window end 2019-03-01'])
  })
})

describe('toJsonValue', () => {
  it('renders each canonical kind', () => {
    expect(toJsonValue({ kind: 'instant', value: DateTime.fromISO('2019-03-10T10:00:00.500+01:00') })).toBe(
      '2019-03-10T09:00:00.500Z',
    )
    expect(toJsonValue({ kind: 'date', value: { year: 2019, month: 4, day: 9 } })).toBe('2019-04-09')
    expect(toJsonValue({ kind: 'duration', value: Duration.fromObject({ hours: 1, minutes: 30 }) })).toBe('PT1H30M')
    expect(toJsonValue({ kind: 'integer', value: 7 })).toBe(7)
    expect(toJsonValue({ kind: 'text', value: 'Meeting' })).toBe('Meeting')
  })
})
