import { promises as fsPromises } from 'fs'
import { z } from 'zod'
import type { ProbeOutcome } from '../scanner/tcp.js'
import type { ScanReport, StructuredReport } from './types.js'
import { OutputWriteError, ReportFormatError, getErrorCode, getErrorMessage } from '../errors.js'

const StructuredReportSchema = z.object({
  host: z.string(),
  scan_time: z.string(),
  open_ports: z.array(
    z.object({
      port: z.number().int(),
      status: z.literal('open'),
      service: z.string().nullable(),
    })
  ),
  closed_ports: z.number().int().nonnegative(),
})

export function toStructured(report: ScanReport): StructuredReport {
  return {
    host: report.host,
    scan_time: report.scanTime,
    open_ports: report.openPorts.map(outcome => ({
      port: outcome.port,
      status: 'open' as const,
      service: outcome.service ?? null,
    })),
    closed_ports: report.closedCount,
  }
}

/**
 * Serialize a report to pretty-printed JSON. Open ports keep their
 * completion order.
 */
export function toStructuredForm(report: ScanReport): string {
  return JSON.stringify(toStructured(report), null, 2)
}

/**
 * Parse and validate a serialized report
 */
export function parseStructuredForm(text: string): ScanReport {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new ReportFormatError(`Report is not valid JSON: ${getErrorMessage(err)}`)
  }

  const parsed = StructuredReportSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ReportFormatError(`Report does not match the expected format: ${details}`)
  }

  const data = parsed.data
  return {
    host: data.host,
    scanTime: data.scan_time,
    openPorts: data.open_ports.map((entry): ProbeOutcome =>
      entry.service === null
        ? { port: entry.port, status: 'open' }
        : { port: entry.port, status: 'open', service: entry.service }
    ),
    closedCount: data.closed_ports,
  }
}

export async function saveReport(report: ScanReport, filePath: string): Promise<void> {
  try {
    await fsPromises.writeFile(filePath, toStructuredForm(report) + '\n', 'utf-8')
  } catch (err) {
    throw new OutputWriteError(
      filePath,
      `Failed to write report to ${filePath}: ${getErrorMessage(err)}`,
      getErrorCode(err)
    )
  }
}

export async function loadReport(filePath: string): Promise<ScanReport> {
  let text: string
  try {
    text = await fsPromises.readFile(filePath, 'utf-8')
  } catch (err) {
    throw new OutputWriteError(
      filePath,
      `Failed to read report from ${filePath}: ${getErrorMessage(err)}`,
      getErrorCode(err)
    )
  }
  return parseStructuredForm(text)
}
