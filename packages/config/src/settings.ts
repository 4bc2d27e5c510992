import { z } from 'zod'

/** Runtime settings for the multinomial package. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const settingsSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  maxDecodeEntries: z.coerce.number().int().min(0),
})

export type Settings = z.infer<typeof settingsSchema>

/** Environment variable backing each setting. */
export const SETTINGS_ENV_KEYS = {
  logLevel: 'DIRICHLET_LOG_LEVEL',
  maxDecodeEntries: 'DIRICHLET_MAX_DECODE_ENTRIES',
} as const satisfies Record<keyof Settings, string>

/** Defaults: quiet logs, 2^24 entries per decoded table. */
export const DEFAULT_SETTINGS: Settings = {
  logLevel: 'warn',
  maxDecodeEntries: 16_777_216,
}

type Env = Record<string, string | undefined>

function optional(env: Env, key: string, fallback: string | number): string | number {
  return env[key] ?? fallback
}

/**
 * Resolve settings from an environment map (env override > default).
 * Throws on the first load if a variable holds an invalid value.
 */
export function loadSettings(env: Env = process.env): Settings {
  const result = settingsSchema.safeParse({
    logLevel: optional(env, SETTINGS_ENV_KEYS.logLevel, DEFAULT_SETTINGS.logLevel),
    maxDecodeEntries: optional(env, SETTINGS_ENV_KEYS.maxDecodeEntries, DEFAULT_SETTINGS.maxDecodeEntries),
  })
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${SETTINGS_ENV_KEYS[issueKey(issue.path)]}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid dirichlet-counts settings. ${issues}`)
  }
  return result.data
}

function issueKey(path: ReadonlyArray<string | number>): keyof Settings {
  return path[0] === 'maxDecodeEntries' ? 'maxDecodeEntries' : 'logLevel'
}

/** Settings resolved from process.env at import time. */
export const settings: Settings = loadSettings()
