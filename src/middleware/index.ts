/**
 * Express Middleware Setup
 */

import express, { Express } from 'express'
import 'express-async-errors'
import cors from 'cors'
import helmet from 'helmet'
import rateLimit from 'express-rate-limit'
import type { Config } from '../config'
import { requestLogger } from './request-logger'
import { errorHandler } from './error-handler'

export { ApiError, errorHandler } from './error-handler'
export type { ApiErrorCode } from './error-handler'

export function setupMiddleware(app: Express, config: Config) {
  // Security headers
  app.use(helmet())

  // CORS
  app.use(cors({
    origin: config.cors.origin,
    credentials: config.cors.credentials
  }))

  // Body parsing
  app.use(express.json({ limit: '1mb' }))
  app.use(express.urlencoded({ extended: true, limit: '1mb' }))

  // Request logging
  app.use(requestLogger)

  // Rate limiting
  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: { detail: 'Too many requests, please try again later', code: 'RATE_LIMITED' }
  })
  app.use('/activities', limiter)
}

/**
 * Error handler goes after every route
 */
export function setupErrorHandling(app: Express) {
  app.use(errorHandler)
}
