// Shared configuration: log level and decode limits, resolved from the
// environment and validated with zod.

export {
  settings,
  loadSettings,
  settingsSchema,
  DEFAULT_SETTINGS,
  SETTINGS_ENV_KEYS,
  LOG_LEVELS,
  type Settings,
  type LogLevel,
} from './settings'
