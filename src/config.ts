import { z } from 'zod'
import { InvalidConfigurationError } from './errors.js'
import { LOG_LEVELS, getLogDirectory, type LogLevel } from './utils/logger.js'
import { DEFAULT_CONCURRENCY } from './scanner/port-scan.js'
import { DEFAULT_PROBE_TIMEOUT } from './scanner/tcp.js'

export interface Config {
  concurrency: number
  timeout: number // ms
  logLevel: LogLevel
  logDir: string
  logToFile: boolean
}

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be greater than 0`)

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes')

const EnvSchema = z.object({
  PORTPROBE_CONCURRENCY: positiveInt('PORTPROBE_CONCURRENCY').default(DEFAULT_CONCURRENCY),
  PORTPROBE_TIMEOUT_MS: positiveInt('PORTPROBE_TIMEOUT_MS').default(DEFAULT_PROBE_TIMEOUT),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_DIR: z.string().optional(),
  LOG_TO_FILE: booleanFlag.default('false'),
})

/**
 * Load configuration from environment variables. Empty values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const input: Record<string, string> = {}
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim()
    if (value) input[key] = value
  }

  const parsed = EnvSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue.path.join('.')
    throw new InvalidConfigurationError(`Invalid ${variable}: ${issue.message}`)
  }

  return {
    concurrency: parsed.data.PORTPROBE_CONCURRENCY,
    timeout: parsed.data.PORTPROBE_TIMEOUT_MS,
    logLevel: parsed.data.LOG_LEVEL,
    logDir: getLogDirectory(parsed.data.LOG_DIR),
    logToFile: parsed.data.LOG_TO_FILE,
  }
}
