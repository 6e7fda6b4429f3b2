import { InvalidPortSpecError } from '../errors.js'
import { DEFAULT_PORTS } from './services.js'

const INTEGER = /^[+-]?\d+$/

// Size of the port space, 0-65535
export const MAX_RANGE_SIZE = 65536

function parsePortToken(token: string, spec: string): number {
  const trimmed = token.trim()
  if (!INTEGER.test(trimmed)) {
    throw new InvalidPortSpecError(`Invalid port "${trimmed}" in port specification "${spec}"`)
  }
  return parseInt(trimmed, 10)
}

/**
 * Resolve a port specification into the ordered list of ports to probe.
 *
 * Accepts `start-end` (inclusive), `p1,p2,...` or a single port. An absent or
 * blank spec yields the service catalog ports. Numbers are not checked
 * against 1-65535; out-of-range ports simply never connect.
 */
export function resolvePorts(spec: string | null | undefined): number[] {
  if (spec === null || spec === undefined || spec.trim() === '') {
    return [...DEFAULT_PORTS]
  }

  if (spec.includes('-')) {
    const parts = spec.split('-')
    if (parts.length !== 2) {
      throw new InvalidPortSpecError(`Invalid port range "${spec}": expected start-end`)
    }
    const start = parsePortToken(parts[0], spec)
    const end = parsePortToken(parts[1], spec)
    if (start > end) {
      throw new InvalidPortSpecError(`Invalid port range "${spec}": start ${start} is greater than end ${end}`)
    }
    if (end - start + 1 > MAX_RANGE_SIZE) {
      throw new InvalidPortSpecError(`Invalid port range "${spec}": spans more than ${MAX_RANGE_SIZE} ports`)
    }

    const ports: number[] = []
    for (let p = start; p <= end; p++) ports.push(p)
    return ports
  }

  return spec.split(',').map(token => parsePortToken(token, spec))
}
