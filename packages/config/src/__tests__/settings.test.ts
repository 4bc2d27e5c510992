import { describe, it, expect } from 'vitest'
import { loadSettings, settingsSchema, DEFAULT_SETTINGS } from '../settings'

describe('loadSettings', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS)
  })

  it('reads overrides from the environment', () => {
    const resolved = loadSettings({
      DIRICHLET_LOG_LEVEL: 'debug',
      DIRICHLET_MAX_DECODE_ENTRIES: '10',
    })
    expect(resolved).toEqual({ logLevel: 'debug', maxDecodeEntries: 10 })
  })

  it('names the variable holding an unknown log level', () => {
    expect(() => loadSettings({ DIRICHLET_LOG_LEVEL: 'loud' })).toThrow(/DIRICHLET_LOG_LEVEL/)
  })

  it('rejects a non-numeric entry limit', () => {
    expect(() => loadSettings({ DIRICHLET_MAX_DECODE_ENTRIES: 'lots' })).toThrow(/DIRICHLET_MAX_DECODE_ENTRIES/)
  })

  it('rejects a negative entry limit', () => {
    expect(() => loadSettings({ DIRICHLET_MAX_DECODE_ENTRIES: '-5' })).toThrow(/DIRICHLET_MAX_DECODE_ENTRIES/)
  })
})

describe('settingsSchema', () => {
  it('rejects fractional entry limits', () => {
    const result = settingsSchema.safeParse({ logLevel: 'info', maxDecodeEntries: 2.5 })
    expect(result.success).toBe(false)
  })

  it('accepts silent as a log level', () => {
    const result = settingsSchema.safeParse({ logLevel: 'silent', maxDecodeEntries: 0 })
    expect(result.success).toBe(true)
  })
})
