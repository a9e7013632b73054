/**
 * Error Handler Middleware
 */

import { Request, Response, NextFunction } from 'express'
import { logger } from '../utils/logger'

export type ApiErrorCode =
  | 'ACTIVITY_NOT_FOUND'
  | 'ALREADY_REGISTERED'
  | 'PARTICIPANT_NOT_FOUND'
  | 'ACTIVITY_FULL'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR'

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code: ApiErrorCode
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
) => {
  if (error instanceof ApiError) {
    logger.warn('Request rejected', {
      error: error.message,
      code: error.code,
      path: req.path,
      method: req.method
    })
    return res.status(error.statusCode).json({
      detail: error.message,
      code: error.code
    })
  }

  logger.error('Error handling request', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  })

  // Default to 500 for unexpected errors
  res.status(500).json({
    detail: 'Internal server error',
    code: 'INTERNAL_ERROR'
  })
}
