/**
 * Configuration Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { loadConfig, loadOptionsFrom, resolveCalendarUrl, resolveConfigPath } from '../src/config.js'
import type { AppConfig } from '../src/config.js'
import { ConfigError } from '../src/calendar/errors.js'

let dir: string

function writeConfig(contents: string): string {
  const file = path.join(dir, 'calendar.yaml')
  writeFileSync(file, contents)
  return file
}

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), 'ical-config-'))
  vi.stubEnv('ICAL_DEFAULT_TIMEZONE', '')
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

describe('loadConfig', () => {
  it('uses defaults when the file is missing', () => {
    expect(loadConfig(path.join(dir, 'missing.yaml'))).toEqual({
      defaultTimezone: 'UTC',
      inclusion: 'start',
      maxIterations: 100000,
      fetch: { timeoutMs: 30000, userAgent: 'ical-occurrences/0.1' },
      calendars: {},
    })
  })

  it('uses defaults for an empty file', () => {
    expect(loadConfig(writeConfig('')).inclusion).toBe('start')
  })

  it('reads every setting', () => {
    const file = writeConfig(
      [
        'defaultTimezone: Europe/Berlin',
        'inclusion: overlap',
        'maxIterations: 500',
        'fetch:',
        '  timeoutMs: 1000',
        'calendars:',
        '  bins:',
        '    url: https://calendar.test/bins.ics',
      ].join('\n'),
    )
    expect(loadConfig(file)).toEqual({
      defaultTimezone: 'Europe/Berlin',
      inclusion: 'overlap',
      maxIterations: 500,
      fetch: { timeoutMs: 1000, userAgent: 'ical-occurrences/0.1' },
      calendars: { bins: { url: 'https://calendar.test/bins.ics' } },
    })
  })

  it('lets ICAL_DEFAULT_TIMEZONE override the file', () => {
    vi.stubEnv('ICAL_DEFAULT_TIMEZONE', 'America/New_York')
    const file = writeConfig('defaultTimezone: Europe/Berlin\n')
    expect(loadConfig(file).defaultTimezone).toBe('America/New_York')
  })

  it('rejects invalid YAML', () => {
    const file = writeConfig('calendars: [unclosed\n')
    expect(() => loadConfig(file)).toThrow(ConfigError)
    expect(() => loadConfig(file)).toThrow(/^Could not parse /)
  })

  it('rejects a file that is not a mapping', () => {
    const file = writeConfig('- one\n- two\n')
    expect(() => loadConfig(file)).toThrow(`${file} must contain a YAML mapping`)
  })

  it('rejects unknown time zones', () => {
    const file = writeConfig('defaultTimezone: Mars/Olympus\n')
    expect(() => loadConfig(file)).toThrow(
      `Invalid configuration in ${file}: defaultTimezone: Unknown time zone "Mars/Olympus"`,
    )
  })

  it('rejects an unknown inclusion mode', () => {
    const file = writeConfig('inclusion: sometimes\n')
    expect(() => loadConfig(file)).toThrow(/^Invalid configuration in .*: inclusion: /)
  })

  it('warns about unknown keys', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const file = writeConfig('inclusion: start\ncolour: blue\n')
    loadConfig(file)
    expect(warn).toHaveBeenCalledWith(`[Config] Ignoring unknown key "colour" in ${file}`)
  })
})

describe('resolveConfigPath', () => {
  it('prefers the explicit path, then the environment', () => {
    vi.stubEnv('ICAL_OCCURRENCES_CONFIG', '/etc/ical/calendar.yaml')
    expect(resolveConfigPath('/tmp/other.yaml')).toBe('/tmp/other.yaml')
    expect(resolveConfigPath()).toBe('/etc/ical/calendar.yaml')
  })
})

describe('resolveCalendarUrl', () => {
  const config: AppConfig = {
    defaultTimezone: 'UTC',
    inclusion: 'start',
    maxIterations: 100,
    fetch: { timeoutMs: 1000, userAgent: 'test' },
    calendars: { bins: { url: 'https://calendar.test/bins.ics' }, school: { url: 'https://calendar.test/school.ics' } },
  }

  it('passes http(s) URLs through', () => {
    expect(resolveCalendarUrl(config, 'http://calendar.test/a.ics')).toBe('http://calendar.test/a.ics')
  })

  it('rewrites webcal URLs to https', () => {
    expect(resolveCalendarUrl(config, 'webcal://calendar.test/a.ics')).toBe('https://calendar.test/a.ics')
  })

  it('looks up configured calendars by name', () => {
    expect(resolveCalendarUrl(config, 'bins')).toBe('https://calendar.test/bins.ics')
  })

  it('lists configured names for an unknown calendar', () => {
    expect(() => resolveCalendarUrl(config, 'work')).toThrow('Unknown calendar "work" (configured: bins, school)')
  })

  it('maps settings to load options', () => {
    expect(loadOptionsFrom(config)).toEqual({
      defaultTimezone: 'UTC',
      inclusion: 'start',
      maxIterations: 100,
      timeoutMs: 1000,
      userAgent: 'test',
    })
  })
})
