import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import path from 'path'

export type Logger = winston.Logger

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

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

export function createLogger(level: LogLevel = 'info', logDir: string = './logs'): Logger {
  const transports: winston.transport[] = [
    // stdout carries the report, so every level goes to stderr
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: [...LOG_LEVELS],
    }),
    new DailyRotateFile({
      dirname: logDir,
      filename: 'cert-sentry-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '10m',
      maxFiles: '7d',
      format: logFormat,
      zippedArchive: true,
    }),
  ]

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  })
}

/**
 * Logger that drops everything, for tests and embedding
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  })
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

/**
 * Directory for the rotating cert-sentry-<date>.log files: LOG_DIR resolved
 * against the working directory, or ./logs when it is unset
 */
export function getLogDirectory(customDir?: string): string {
  if (customDir) {
    return path.resolve(customDir)
  }
  return path.resolve(process.cwd(), 'logs')
}
