#!/usr/bin/env node
import { parseArgs } from 'node:util'
import { pathToFileURL } from 'node:url'
import { formatCivilDate } from './calendar/civil-date.js'
import { loadCalendar } from './calendar/fetcher.js'
import type { CanonicalValue, NormalizedRecord } from './calendar/types.js'
import { loadConfig, loadOptionsFrom, resolveCalendarUrl } from './config.js'

const USAGE = 'Usage: ical-occurrences [--config <file>] <url|calendar-name> <start YYYY-MM-DD> <end YYYY-MM-DD>'

export interface CliDeps {
  fetch?: typeof fetch
  log?: (text: string) => void
  error?: (text: string) => void
}

type JsonValue = string | number

export function toJsonValue(value: CanonicalValue): JsonValue {
  switch (value.kind) {
    case 'instant':
      return value.value.toUTC().toISO({ suppressMilliseconds: true }) ?? 'Invalid DateTime'
    case 'date':
      return formatCivilDate(value.value)
    case 'duration':
      return value.value.toISO() ?? 'Invalid Duration'
    case 'integer':
    case 'text':
      return value.value
  }
}

export function toJsonRecord(record: NormalizedRecord): Record<string, JsonValue> {
  const json: Record<string, JsonValue> = {}
  for (const [name, value] of Object.entries(record)) {
    json[name] = toJsonValue(value)
  }
  return json
}

/**
 * Fetch a calendar and print its occurrences as JSON.
 * Returns the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.log ?? ((text: string) => console.log(text))
  const error = deps.error ?? ((text: string) => console.error(text))

  let positionals: string[]
  let configPath: string | undefined
  try {
    const parsed = parseArgs({ args, options: { config: { type: 'string' } }, allowPositionals: true })
    positionals = parsed.positionals
    configPath = parsed.values.config
  } catch (err) {
    error(`[CLI] ${err instanceof Error ? err.message : String(err)}`)
    error(USAGE)
    return 1
  }

  if (positionals.length !== 3) {
    error(USAGE)
    return 1
  }
  const [source, start, end] = positionals

  try {
    const config = loadConfig(configPath)
    const url = resolveCalendarUrl(config, source)
    const records = await loadCalendar(url, start, end, { ...loadOptionsFrom(config), fetch: deps.fetch })
    log(JSON.stringify(records.map(toJsonRecord), null, 2))
    return 0
  } catch (err) {
    error(`[CLI] ${err instanceof Error ? `${err.name}: ${err.message}` : String(err)}`)
    return 1
  }
}

const entry = process.argv[1]
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((err) => {
      console.error('Fatal error:', err)
      process.exit(1)
    })
}
