/**
 * Request Logger Middleware
 */

import { Request, Response, NextFunction } from 'express'
import { logger } from '../utils/logger'
import { httpRequestDuration, httpRequestTotal } from '../observability/metrics'

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now()

  res.on('finish', () => {
    const duration = Date.now() - start
    const labels = {
      method: req.method,
      route: req.baseUrl + (req.route?.path ?? ''),
      status: String(res.statusCode)
    }

    httpRequestTotal.inc(labels)
    httpRequestDuration.observe(labels, duration / 1000)

    logger.info('HTTP Request', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      duration
    })
  })

  next()
}
