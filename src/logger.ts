import winston from 'winston'

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: false }),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`
    }
    return msg
  })
)

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const logger = winston.createLogger({
  level: 'info',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn'],
    }),
  ],
})

/**
 * `silent` mutes every transport; the other levels map onto winston's.
 */
export function setLogLevel(level: LogLevel): void {
  logger.silent = level === 'silent'
  if (level !== 'silent') {
    logger.level = level
  }
}

setLogLevel(process.env.LOG_LEVEL === 'silent' ? 'silent' : 'info')
