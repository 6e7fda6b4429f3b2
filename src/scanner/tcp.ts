import * as net from 'net'
import type { Logger } from '../utils/logger.js'
import { getErrorCode, getErrorMessage } from '../errors.js'
import { lookupService } from './services.js'

export const DEFAULT_PROBE_TIMEOUT = 1000

export type PortStatus = 'open' | 'closed'

export interface ProbeOutcome {
  port: number
  status: PortStatus
  service?: string
}

/**
 * Signature shared by the real prober and test doubles.
 * Implementations must resolve, never reject.
 */
export type PortProber = (
  host: string,
  port: number,
  timeout: number,
  logger?: Logger
) => Promise<ProbeOutcome>

export function openOutcome(port: number): ProbeOutcome {
  const service = lookupService(port)
  return service === undefined ? { port, status: 'open' } : { port, status: 'open', service }
}

export function closedOutcome(port: number): ProbeOutcome {
  return { port, status: 'closed' }
}

/**
 * Attempt a single TCP connect to host:port.
 *
 * The socket is destroyed as soon as the attempt settles; nothing is written
 * or read. Refusal, timeout, DNS failure and invalid ports all resolve as
 * `closed`.
 *
 * @param timeout - Connect timeout in ms
 */
export function probePort(
  host: string,
  port: number,
  timeout: number = DEFAULT_PROBE_TIMEOUT,
  logger?: Logger
): Promise<ProbeOutcome> {
  return new Promise((resolve) => {
    const socket = new net.Socket()
    let settled = false

    const finish = (outcome: ProbeOutcome, reason?: string) => {
      if (settled) return
      settled = true
      socket.destroy()
      if (reason !== undefined) {
        logger?.debug(`Probe ${host}:${port} closed (${reason})`)
      }
      resolve(outcome)
    }

    socket.setTimeout(timeout)
    socket.on('connect', () => finish(openOutcome(port)))
    socket.on('timeout', () => finish(closedOutcome(port), 'timeout'))
    socket.on('error', (err) => finish(closedOutcome(port), getErrorCode(err) ?? err.message))

    try {
      socket.connect(port, host)
    } catch (err) {
      // Out-of-range ports make connect() throw synchronously
      finish(closedOutcome(port), getErrorCode(err) ?? getErrorMessage(err))
    }
  })
}
