import type { Logger } from '../utils/logger.js'
import type { ScanReport } from '../report/types.js'
import { InvalidConfigurationError, getErrorMessage } from '../errors.js'
import { closedOutcome, DEFAULT_PROBE_TIMEOUT, probePort, type PortProber, type ProbeOutcome } from './tcp.js'

export const DEFAULT_CONCURRENCY = 50

export interface ScanOptions {
  logger: Logger
  /** Max probes in flight at once */
  concurrency?: number
  /** Per-port connect timeout in ms */
  timeout?: number
  probe?: PortProber
  /** Called once per finished probe, in completion order */
  onOutcome?: (outcome: ProbeOutcome) => void
}

export function validateConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`)
  }
}

export function validateTimeout(timeout: number): void {
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new InvalidConfigurationError(`Timeout must be a positive number of milliseconds, got ${timeout}`)
  }
}

/**
 * Probe every port in `ports` on `host` with a bounded worker pool.
 *
 * Each port is probed exactly once. Open outcomes are kept in the order the
 * probes finished; closed ones are only counted. Resolves after every probe
 * has settled.
 */
export async function scanHost(
  host: string,
  ports: readonly number[],
  options: ScanOptions
): Promise<ScanReport> {
  const {
    logger,
    concurrency = DEFAULT_CONCURRENCY,
    timeout = DEFAULT_PROBE_TIMEOUT,
    probe = probePort,
    onOutcome,
  } = options

  validateConcurrency(concurrency)
  validateTimeout(timeout)

  const report: ScanReport = {
    host,
    scanTime: new Date().toISOString(),
    openPorts: [],
    closedCount: 0,
  }

  logger.info(`Scanning ${host} (${ports.length} ports, concurrency: ${concurrency}, timeout: ${timeout}ms)`)

  const queue = [...ports]

  const runProbe = async (port: number): Promise<ProbeOutcome> => {
    try {
      return await probe(host, port, timeout, logger)
    } catch (err) {
      logger.warn(`Probe ${host}:${port} failed unexpectedly, counting as closed: ${getErrorMessage(err)}`)
      return closedOutcome(port)
    }
  }

  const workers = Array(Math.min(concurrency, queue.length))
    .fill(null)
    .map(async () => {
      while (queue.length > 0) {
        const port = queue.shift()
        if (port === undefined) break
        const outcome = await runProbe(port)

        if (outcome.status === 'open') {
          report.openPorts.push(outcome)
          logger.debug(`Port ${outcome.port}/tcp open${outcome.service ? ` (${outcome.service})` : ''}`)
        } else {
          report.closedCount++
        }
        try {
          onOutcome?.(outcome)
        } catch (err) {
          // A failing callback must not stop this worker or abandon the others
          logger.warn(`onOutcome callback failed for ${host}:${outcome.port}: ${getErrorMessage(err)}`)
        }
      }
    })

  await Promise.all(workers)

  logger.info(`Scan of ${host} complete: ${report.openPorts.length} open, ${report.closedCount} closed`)

  return report
}
