import { z } from 'zod'
import { InvalidConfigError, createLogger, isLogLevel, type LogLevel, type Logger } from '@sortid/core'

export const VERSION = '0.1.0'

/** Upper bound for `generate --count` */
export const MAX_COUNT = 1_000_000

/** Lines written per console call when generating */
export const OUTPUT_CHUNK = 10_000

const EnvSchema = z.object({
  SORTID_LOG_LEVEL: z
    .custom<LogLevel>(isLogLevel, { message: 'must be one of debug, info, warn, error' })
    .default('warn'),
})

const CountSchema = z.coerce
  .number({ invalid_type_error: 'count must be a number' })
  .int('count must be a whole number')
  .min(1, 'count must be at least 1')
  .max(MAX_COUNT, `count must be at most ${MAX_COUNT}`)

export interface CliConfig {
  logLevel: LogLevel
}

function issues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}

/**
 * Reads CLI settings from the environment
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    throw new InvalidConfigError('Invalid environment configuration', {
      field: 'SORTID_LOG_LEVEL',
      errors: issues(result.error),
    })
  }
  return { logLevel: result.data.SORTID_LOG_LEVEL }
}

/**
 * Validates the value given to `--count`
 */
export function parseCount(value: unknown): number {
  const result = CountSchema.safeParse(value)
  if (!result.success) {
    throw new InvalidConfigError(`Invalid count: ${issues(result.error).join(', ')}`, {
      field: 'count',
      errors: issues(result.error),
    })
  }
  return result.data
}

export function createCliLogger(config: CliConfig = loadConfig()): Logger {
  return createLogger({ component: 'cli' }, config.logLevel)
}
