/**
 * Logger Utility
 */

import winston from 'winston'
import { config, type Config } from '../config'

function buildFormat(format: Config['logging']['format']) {
  if (format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    )
  }

  // Text output drops the constant service field to keep lines short
  return winston.format.combine(
    winston.format.timestamp(),
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
  defaultMeta: { service: 'activities-api', env: config.env },
  silent: config.env === 'test',
  transports: [
    new winston.transports.Console()
  ]
})
