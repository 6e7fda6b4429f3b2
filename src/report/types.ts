import type { ProbeOutcome } from '../scanner/tcp.js'

export interface ScanReport {
  host: string
  scanTime: string // ISO-8601, taken once at scan start
  openPorts: ProbeOutcome[] // completion order, not sorted
  closedCount: number
}

/**
 * On-disk JSON shape
 */
export interface StructuredReport {
  host: string
  scan_time: string
  open_ports: Array<{
    port: number
    status: 'open'
    service: string | null
  }>
  closed_ports: number
}
