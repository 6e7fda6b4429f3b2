import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import path from 'path'

export type Logger = winston.Logger

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export interface LoggerOptions {
  /** Also write rotating log files under logDir */
  file?: boolean
  /** Drop all output (tests) */
  silent?: boolean
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    const msg = stack || message
    return `${timestamp} [${level.toUpperCase()}] ${msg}`
  })
)

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} ${level}: ${message}`
  })
)

export function createLogger(
  level: LogLevel = 'info',
  logDir: string = './logs',
  options: LoggerOptions = {}
): Logger {
  const transports: winston.transport[] = [
    // Logs go to stderr so stdout carries only the report
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: [...LOG_LEVELS],
    }),
  ]

  if (options.file) {
    transports.push(
      new DailyRotateFile({
        dirname: logDir,
        filename: 'portprobe-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '7d',
        format: logFormat,
        zippedArchive: true,
      })
    )
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent: options.silent ?? false,
    exitOnError: false,
  })
}

/**
 * Get the default log directory path
 */
export function getLogDirectory(customDir?: string): string {
  if (customDir) {
    return path.resolve(customDir)
  }
  return path.resolve(process.cwd(), 'logs')
}
