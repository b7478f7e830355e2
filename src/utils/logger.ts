/**
 * Logger Utility
 */

import winston from 'winston'
import { config, type Config } from '../config'

function buildFormat(format: Config['logging']['format']): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    )
  }

  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
      return `${timestamp} ${level}: ${message}${metaStr}`
    })
  )
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: buildFormat(config.logging.format),
  defaultMeta: { service: 'activity-roster-api' },
  // Test runs assert on responses, not on log output
  silent: config.env === 'test',
  transports: [
    new winston.transports.Console()
  ]
})
