import { availableParallelism } from 'node:os'
import { describe, expect, it } from 'vitest'
import { loadConfig } from './config'
import { ConfigError } from './errors'

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({}, '/nonexistent')).toEqual({
      ffmpeg: 'ffmpeg',
      ffprobe: 'ffprobe',
      jobs: availableParallelism(),
      logLevel: 'info',
    })
  })

  it('should read overrides from the environment', () => {
    expect(
      loadConfig(
        {
          CUESPLIT_FFMPEG: '/opt/ffmpeg/bin/ffmpeg',
          CUESPLIT_JOBS: '3',
          LOG_LEVEL: 'debug',
        },
        '/nonexistent'
      )
    ).toEqual({
      ffmpeg: '/opt/ffmpeg/bin/ffmpeg',
      ffprobe: 'ffprobe',
      jobs: 3,
      logLevel: 'debug',
    })
  })

  it('should reject invalid values', () => {
    expect(() => loadConfig({ CUESPLIT_JOBS: '0' }, '/nonexistent')).toThrow(ConfigError)
    expect(() => loadConfig({ LOG_LEVEL: 'loud' }, '/nonexistent')).toThrow(
      /^invalid environment: LOG_LEVEL/
    )
  })
})
