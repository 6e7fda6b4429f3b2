import yargs from 'yargs'
import type { Config } from '../config.js'
import { InvalidConfigurationError } from '../errors.js'
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js'
import { PRODUCT_NAME, VERSION } from '../utils/version.js'

export interface CliOptions {
  target: string
  ports: string | undefined
  output: string | undefined
  concurrency: number
  timeout: number
  logLevel: LogLevel
  banner: boolean
  json: boolean
}

/**
 * Parse command-line arguments (without the node/script prefix).
 * Defaults for tunables come from the loaded config.
 */
export function parseCliArgs(argv: string[], config: Config): CliOptions {
  const args = yargs(argv)
    .scriptName(PRODUCT_NAME)
    .usage('$0 -t <host> [options]')
    .option('target', {
      alias: 't',
      type: 'string',
      demandOption: true,
      describe: 'Target IP address or hostname',
    })
    .option('ports', {
      alias: 'p',
      type: 'string',
      describe: 'Ports to scan (e.g. 22,80,443 or 1-1000); defaults to common service ports',
    })
    .option('output', {
      alias: 'o',
      type: 'string',
      describe: 'Write JSON results to this file',
    })
    .option('threads', {
      type: 'number',
      default: config.concurrency,
      describe: 'Number of concurrent probes',
    })
    .option('timeout', {
      type: 'number',
      default: config.timeout,
      describe: 'Per-port connect timeout in ms',
    })
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVELS,
      default: config.logLevel,
    })
    .option('banner', {
      type: 'boolean',
      default: true,
      describe: 'Show the banner (use --no-banner to hide it)',
    })
    .option('json', {
      type: 'boolean',
      default: false,
      describe: 'Print the JSON report to stdout instead of the summary',
    })
    .version(VERSION)
    .help()
    .strict()
    .fail((msg, err) => {
      throw err ?? new InvalidConfigurationError(msg)
    })
    .parseSync()

  const logLevel = LOG_LEVELS.find(level => level === args.logLevel) ?? config.logLevel

  return {
    target: args.target,
    ports: args.ports,
    output: args.output,
    concurrency: args.threads,
    timeout: args.timeout,
    logLevel,
    banner: args.banner,
    json: args.json,
  }
}
