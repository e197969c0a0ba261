import dotenv from 'dotenv'
import { existsSync } from 'node:fs'
import { availableParallelism } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { ConfigError } from './errors'
import { LOG_LEVELS } from './logger'

const envSchema = z.object({
  CUESPLIT_FFMPEG: z.string().min(1).default('ffmpeg'),
  CUESPLIT_FFPROBE: z.string().min(1).default('ffprobe'),
  CUESPLIT_JOBS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export interface Config {
  ffmpeg: string
  ffprobe: string
  jobs: number
  logLevel: (typeof LOG_LEVELS)[number]
}

/**
 * Loads `.env` from the working directory when there is one, then reads
 * the environment defaults. Command-line flags override these.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd = process.cwd()
): Config {
  const envPath = join(cwd, '.env')
  if (env === process.env && existsSync(envPath)) {
    dotenv.config({ path: envPath })
  }

  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`invalid environment: ${issues}`)
  }

  return {
    ffmpeg: parsed.data.CUESPLIT_FFMPEG,
    ffprobe: parsed.data.CUESPLIT_FFPROBE,
    jobs: parsed.data.CUESPLIT_JOBS ?? availableParallelism(),
    logLevel: parsed.data.LOG_LEVEL,
  }
}
