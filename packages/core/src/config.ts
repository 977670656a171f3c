import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError } from './calendar/errors.js'
import { DEFAULT_MAX_ITERATIONS } from './calendar/expander.js'
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, type LoadOptions } from './calendar/fetcher.js'
import { isIanaZone } from './calendar/timezones.js'

export const CONFIG_FILENAME = 'calendar.yaml'

const zoneName = z
  .string()
  .refine((name) => name.toUpperCase() === 'UTC' || isIanaZone(name), (name) => ({
    message: `Unknown time zone "${name}"`,
  }))

const configSchema = z.object({
  defaultTimezone: zoneName.default('UTC'),
  inclusion: z.enum(['start', 'overlap']).default('start'),
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
      userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    })
    .default({}),
  calendars: z.record(z.string(), z.object({ url: z.string().url() })).default({}),
})

export type AppConfig = z.infer<typeof configSchema>

const KNOWN_KEYS = new Set(Object.keys(configSchema.shape))

/**
 * Where calendar.yaml is looked for: explicit path, then
 * ICAL_OCCURRENCES_CONFIG, then the working directory.
 */
export function resolveConfigPath(configPath?: string): string {
  return configPath ?? process.env.ICAL_OCCURRENCES_CONFIG ?? path.join(process.cwd(), CONFIG_FILENAME)
}

function readYaml(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    )
  }

  if (parsed === null || parsed === undefined) return {}
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${configPath} must contain a YAML mapping`)
  }
  return Object.fromEntries(Object.entries(parsed))
}

/**
 * Load configuration. A missing file means defaults;
 * ICAL_DEFAULT_TIMEZONE overrides `defaultTimezone`.
 *
 * @throws ConfigError when the file is not valid YAML or fails validation
 */
export function loadConfig(configPath?: string): AppConfig {
  const file = resolveConfigPath(configPath)
  const raw = readYaml(file)

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      console.warn(`[Config] Ignoring unknown key "${key}" in ${file}`)
    }
  }

  const envZone = process.env.ICAL_DEFAULT_TIMEZONE
  const result = configSchema.safeParse(envZone ? { ...raw, defaultTimezone: envZone } : raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ConfigError(`Invalid configuration in ${file}: ${issue.path.join('.') || '(root)'}: ${issue.message}`)
  }
  return result.data
}

/**
 * Resolve a CLI calendar argument: a URL is used as-is (webcal:// becomes
 * https://), anything else names an entry under `calendars`.
 */
export function resolveCalendarUrl(config: AppConfig, nameOrUrl: string): string {
  if (/^https?:\/\//i.test(nameOrUrl)) return nameOrUrl
  if (/^webcal:\/\//i.test(nameOrUrl)) return `https://${nameOrUrl.substring('webcal://'.length)}`

  const calendar = config.calendars[nameOrUrl]
  if (!calendar) {
    const known = Object.keys(config.calendars)
    throw new ConfigError(
      `Unknown calendar "${nameOrUrl}"${known.length > 0 ? ` (configured: ${known.join(', ')})` : ''}`,
    )
  }
  return calendar.url
}

export function loadOptionsFrom(config: AppConfig): LoadOptions {
  return {
    defaultTimezone: config.defaultTimezone,
    inclusion: config.inclusion,
    maxIterations: config.maxIterations,
    timeoutMs: config.fetch.timeoutMs,
    userAgent: config.fetch.userAgent,
  }
}
