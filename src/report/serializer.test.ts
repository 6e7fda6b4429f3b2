import { describe, it, expect, afterEach } from 'vitest'
import { promises as fsPromises } from 'fs'
import os from 'os'
import path from 'path'
import { loadReport, parseStructuredForm, saveReport, toStructured, toStructuredForm } from './serializer.js'
import type { ScanReport } from './types.js'
import { OutputWriteError, ReportFormatError } from '../errors.js'

const report: ScanReport = {
  host: 'scanme.test',
  scanTime: '2026-10-19T08:30:00.000Z',
  openPorts: [
    { port: 443, status: 'open', service: 'HTTPS' },
    { port: 40001, status: 'open' },
    { port: 22, status: 'open', service: 'SSH' },
  ],
  closedCount: 13,
}

describe('toStructured', () => {
  it('maps to the persisted field names and writes absent services as null', () => {
    expect(toStructured(report)).toEqual({
      host: 'scanme.test',
      scan_time: '2026-10-19T08:30:00.000Z',
      open_ports: [
        { port: 443, status: 'open', service: 'HTTPS' },
        { port: 40001, status: 'open', service: null },
        { port: 22, status: 'open', service: 'SSH' },
      ],
      closed_ports: 13,
    })
  })
})

describe('toStructuredForm', () => {
  it('pretty-prints with two-space indentation', () => {
    const empty: ScanReport = { host: 'h', scanTime: 't', openPorts: [], closedCount: 2 }
    expect(toStructuredForm(empty)).toBe(
      '{\n  "host": "h",\n  "scan_time": "t",\n  "open_ports": [],\n  "closed_ports": 2\n}'
    )
  })
})

describe('parseStructuredForm', () => {
  it('round-trips without re-sorting open ports', () => {
    const parsed = parseStructuredForm(toStructuredForm(report))
    expect(parsed).toEqual(report)
    expect(parsed.openPorts.map(o => o.port)).toEqual([443, 40001, 22])
  })

  it('drops null services instead of keeping them', () => {
    const parsed = parseStructuredForm(toStructuredForm(report))
    expect('service' in parsed.openPorts[1]).toBe(false)
  })

  it('rejects invalid JSON', () => {
    expect(() => parseStructuredForm('{nope')).toThrow(ReportFormatError)
  })

  it('rejects documents of the wrong shape', () => {
    const text = JSON.stringify({ host: 'h', scan_time: 't', open_ports: [{ port: 1, status: 'closed', service: null }], closed_ports: 0 })
    expect(() => parseStructuredForm(text)).toThrow(ReportFormatError)
    expect(() => parseStructuredForm(text)).toThrow(/open_ports\.0\.status/)
  })

  it('rejects a negative closed count', () => {
    const text = JSON.stringify({ host: 'h', scan_time: 't', open_ports: [], closed_ports: -1 })
    expect(() => parseStructuredForm(text)).toThrow(/closed_ports/)
  })
})

describe('saveReport / loadReport', () => {
  let dir: string | undefined

  afterEach(async () => {
    if (dir) await fsPromises.rm(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('writes the structured form and reads it back', async () => {
    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'portprobe-'))
    const file = path.join(dir, 'scan.json')

    await saveReport(report, file)

    expect(await fsPromises.readFile(file, 'utf-8')).toBe(toStructuredForm(report) + '\n')
    expect(await loadReport(file)).toEqual(report)
  })

  it('raises OutputWriteError with the path and code when the directory is missing', async () => {
    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'portprobe-'))
    const file = path.join(dir, 'missing', 'scan.json')

    const error = await saveReport(report, file).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(OutputWriteError)
    if (error instanceof OutputWriteError) {
      expect(error.path).toBe(file)
      expect(error.code).toBe('ENOENT')
    }
  })

  it('raises OutputWriteError when loading a missing file', async () => {
    await expect(loadReport(path.join(os.tmpdir(), 'portprobe-does-not-exist.json'))).rejects.toThrow(OutputWriteError)
  })
})
