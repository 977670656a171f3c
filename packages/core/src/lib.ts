// Public API for consumption by other packages (schedulers, automations)

export * from './calendar/index.js'

export { loadConfig, resolveCalendarUrl, resolveConfigPath, loadOptionsFrom, CONFIG_FILENAME } from './config.js'
export type { AppConfig } from './config.js'
