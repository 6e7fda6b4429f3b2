/**
 * Well-known port to service name mapping.
 *
 * Insertion order is the default scan order.
 */
const SERVICE_ENTRIES: ReadonlyArray<readonly [number, string]> = [
  [21, 'FTP'],
  [22, 'SSH'],
  [23, 'Telnet'],
  [25, 'SMTP'],
  [53, 'DNS'],
  [80, 'HTTP'],
  [110, 'POP3'],
  [143, 'IMAP'],
  [443, 'HTTPS'],
  [445, 'SMB'],
  [993, 'IMAPS'],
  [995, 'POP3S'],
  [3306, 'MySQL'],
  [3389, 'RDP'],
  [5432, 'PostgreSQL'],
  [8080, 'HTTP-Proxy'],
]

const SERVICE_BY_PORT = new Map(SERVICE_ENTRIES)

export const PORT_SERVICES: Readonly<Record<number, string>> = Object.freeze(Object.fromEntries(SERVICE_ENTRIES))

/**
 * Ports scanned when no port specification is given
 */
export const DEFAULT_PORTS: readonly number[] = Object.freeze(SERVICE_ENTRIES.map(([port]) => port))

export function lookupService(port: number): string | undefined {
  return SERVICE_BY_PORT.get(port)
}
