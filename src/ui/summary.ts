import chalk, { type ChalkInstance } from 'chalk'
import type { ScanReport } from '../report/types.js'
import type { ProbeOutcome } from '../scanner/tcp.js'
import { PRODUCT_DESCRIPTION, PRODUCT_NAME, VERSION } from '../utils/version.js'

const RULE = '='.repeat(60)

export function renderBanner(colors: ChalkInstance = chalk): string {
  const title = `${PRODUCT_NAME} v${VERSION} - ${PRODUCT_DESCRIPTION}`
  const notice = 'Only scan hosts you are authorized to test'
  const width = Math.max(title.length, notice.length) + 4
  const line = (text: string) => `| ${text.padEnd(width - 4)} |`

  return colors.blue(
    [
      `+${'-'.repeat(width - 2)}+`,
      line(title),
      line(notice),
      `+${'-'.repeat(width - 2)}+`,
    ].join('\n')
  )
}

export function serviceLabel(outcome: ProbeOutcome): string {
  return outcome.service ?? 'Unknown'
}

/**
 * Line printed as soon as an open port is found
 */
export function renderOpenPort(outcome: ProbeOutcome, colors: ChalkInstance = chalk): string {
  return colors.green(`[+] Port ${outcome.port}/tcp OPEN - ${serviceLabel(outcome)}`)
}

export function renderScanStart(host: string, portCount: number, colors: ChalkInstance = chalk): string {
  return [
    colors.yellow(`[*] Scanning ${host}...`),
    colors.yellow(`[*] Ports to scan: ${portCount}`),
  ].join('\n')
}

/**
 * Human-readable summary. Open ports are listed in the order they were found.
 */
export function renderSummary(report: ScanReport, colors: ChalkInstance = chalk): string {
  const lines = [
    colors.magenta(RULE),
    colors.magenta('  SCAN SUMMARY'),
    colors.magenta(RULE),
    `  Host: ${report.host}`,
    `  Scan Time: ${report.scanTime}`,
    `  Open Ports: ${report.openPorts.length}`,
    `  Closed Ports: ${report.closedCount}`,
  ]

  if (report.openPorts.length > 0) {
    lines.push('', colors.green('  Open Ports:'))
    for (const outcome of report.openPorts) {
      lines.push(`    - ${outcome.port}/tcp (${serviceLabel(outcome)})`)
    }
  }

  lines.push(colors.magenta(RULE))
  return lines.join('\n')
}

export function renderError(message: string, colors: ChalkInstance = chalk): string {
  return colors.red(`[!] ${message}`)
}
