import * as net from 'net'
import { createLogger, type Logger } from './utils/logger.js'
import { closedOutcome, openOutcome, type PortProber } from './scanner/tcp.js'

export function createTestLogger(): Logger {
  return createLogger('debug', './logs', { silent: true })
}

export interface TestListener {
  port: number
  close: () => Promise<void>
}

/**
 * Start a TCP listener on 127.0.0.1. Port 0 picks a free ephemeral port.
 */
export function listen(port = 0): Promise<TestListener> {
  return new Promise((resolve, reject) => {
    const sockets = new Set<net.Socket>()
    const server = net.createServer((socket) => {
      sockets.add(socket)
      socket.on('close', () => sockets.delete(socket))
      socket.on('error', () => socket.destroy())
    })
    server.once('error', reject)
    server.listen(port, '127.0.0.1', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new Error('Listener has no TCP address'))
        return
      }
      resolve({
        port: address.port,
        close: () =>
          new Promise<void>((done) => {
            for (const socket of sockets) socket.destroy()
            server.close(() => done())
          }),
      })
    })
  })
}

/**
 * A local port that was just released, so nothing is listening on it
 */
export async function closedPort(): Promise<number> {
  const listener = await listen()
  await listener.close()
  return listener.port
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Prober double that answers from a fixed set of open ports after a per-port
 * delay, and records the peak number of concurrent calls.
 */
export function createFakeProber(
  openPorts: Iterable<number>,
  delayFor: (port: number) => number = () => 5
): { probe: PortProber; calls: number[]; peakInFlight: () => number } {
  const open = new Set(openPorts)
  const calls: number[] = []
  let inFlight = 0
  let peak = 0

  const probe: PortProber = async (_host, port) => {
    calls.push(port)
    inFlight++
    peak = Math.max(peak, inFlight)
    await delay(delayFor(port))
    inFlight--
    return open.has(port) ? openOutcome(port) : closedOutcome(port)
  }

  return { probe, calls, peakInFlight: () => peak }
}
