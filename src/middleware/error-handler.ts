/**
 * Error Handler Middleware
 */

import type { Request, Response, NextFunction } from 'express'
import { RegistryError, type RegistryErrorKind } from '../registry/errors'
import { logger } from '../utils/logger'

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

// Errors raised by Express itself (e.g. a malformed percent-encoded path
// parameter) carry their HTTP status as `status`
function clientErrorStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status
  }
  return undefined
}

const registryErrorStatus: Record<RegistryErrorKind, number> = {
  NotFound: 404,
  AlreadyRegistered: 400,
  NotRegistered: 400
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction
) => {
  if (error instanceof RegistryError) {
    logger.warn('Roster request rejected', {
      kind: error.kind,
      activityName: error.activityName,
      email: error.email,
      path: req.path
    })
    return res.status(registryErrorStatus[error.kind]).json({
      detail: error.message,
      code: error.kind
    })
  }

  if (error instanceof ApiError) {
    logger.warn('Invalid request', {
      error: error.message,
      path: req.path,
      method: req.method
    })
    return res.status(error.statusCode).json({
      detail: error.message,
      code: error.code
    })
  }

  const status = clientErrorStatus(error)
  if (status !== undefined) {
    logger.warn('Malformed request', {
      error: error.message,
      status,
      path: req.path,
      method: req.method
    })
    return res.status(status).json({
      detail: 'Malformed request',
      code: 'BadRequest'
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
    detail: 'Internal server error'
  })
}
