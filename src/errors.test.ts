import { describe, it, expect } from 'vitest'
import {
  InvalidConfigurationError,
  InvalidPortSpecError,
  OutputWriteError,
  ReportFormatError,
  ScanError,
  getErrorCode,
  getErrorMessage,
  isScanError,
} from './errors.js'

describe('ScanError subclasses', () => {
  it('keep their name and instanceof chain', () => {
    const error = new InvalidPortSpecError('bad spec')
    expect(error).toBeInstanceOf(InvalidPortSpecError)
    expect(error).toBeInstanceOf(ScanError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('InvalidPortSpecError')
  })

  it('serialize type and message', () => {
    expect(new InvalidConfigurationError('bad threads').toJSON()).toEqual({
      type: 'invalid-configuration',
      message: 'bad threads',
    })
    expect(new ReportFormatError('bad json').toJSON()).toEqual({ type: 'report-format', message: 'bad json' })
  })

  it('include the code when present', () => {
    const error = new OutputWriteError('/tmp/x.json', 'cannot write', 'EACCES')
    expect(error.path).toBe('/tmp/x.json')
    expect(error.toJSON()).toEqual({ type: 'output-write', message: 'cannot write', code: 'EACCES' })
  })
})

describe('helpers', () => {
  it('isScanError distinguishes expected failures', () => {
    expect(isScanError(new InvalidPortSpecError('x'))).toBe(true)
    expect(isScanError(new Error('x'))).toBe(false)
    expect(isScanError('x')).toBe(false)
  })

  it('getErrorCode reads errno codes', () => {
    const err = Object.assign(new Error('denied'), { code: 'EACCES' })
    expect(getErrorCode(err)).toBe('EACCES')
    expect(getErrorCode(new Error('plain'))).toBeUndefined()
    expect(getErrorCode({ code: 'EACCES' })).toBeUndefined()
  })

  it('getErrorMessage handles non-errors', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom')
    expect(getErrorMessage(42)).toBe('42')
  })
})
