import { loadConfig } from '../config.js'
import { isScanError, getErrorMessage } from '../errors.js'
import { saveReport, toStructuredForm } from '../report/index.js'
import { resolvePorts } from '../scanner/ports.js'
import { scanHost, validateConcurrency, validateTimeout } from '../scanner/port-scan.js'
import type { PortProber } from '../scanner/tcp.js'
import { renderBanner, renderError, renderOpenPort, renderScanStart, renderSummary } from '../ui/summary.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { parseCliArgs } from './args.js'

export interface CliDeps {
  env?: NodeJS.ProcessEnv
  stdout?: (text: string) => void
  stderr?: (text: string) => void
  logger?: Logger
  probe?: PortProber
}

const writeStdout = (text: string) => {
  process.stdout.write(text + '\n')
}

const writeStderr = (text: string) => {
  process.stderr.write(text + '\n')
}

/**
 * Run one scan from command-line arguments and return the exit code.
 *
 * Bad input fails before any probe is sent. A failure to write the output
 * file is reported after the summary has been printed.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.stdout ?? writeStdout
  const err = deps.stderr ?? writeStderr
  let logger = deps.logger

  try {
    const config = loadConfig(deps.env ?? process.env)
    const options = parseCliArgs(argv, config)
    logger ??= createLogger(options.logLevel, config.logDir, { file: config.logToFile })

    const ports = resolvePorts(options.ports)
    validateConcurrency(options.concurrency)
    validateTimeout(options.timeout)

    if (!options.json) {
      if (options.banner) out(renderBanner())
      out(renderScanStart(options.target, ports.length))
    }

    const report = await scanHost(options.target, ports, {
      logger,
      concurrency: options.concurrency,
      timeout: options.timeout,
      probe: deps.probe,
      onOutcome: options.json
        ? undefined
        : outcome => {
            if (outcome.status === 'open') out(renderOpenPort(outcome))
          },
    })

    out(options.json ? toStructuredForm(report) : renderSummary(report))

    if (options.output) {
      await saveReport(report, options.output)
      logger.info(`Results saved to ${options.output}`)
      if (!options.json) out(`[+] Results saved to ${options.output}`)
    }

    return 0
  } catch (error) {
    if (isScanError(error)) {
      err(renderError(error.message))
    } else {
      err(renderError(`Unexpected error: ${getErrorMessage(error)}`))
      logger?.error(error instanceof Error ? (error.stack ?? error.message) : String(error))
    }
    return 1
  }
}
