/**
 * Express Middleware Setup
 */

import type { Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import rateLimit from 'express-rate-limit'
import type { Config } from '../config'
import { requestLogger } from './request-logger'

export { errorHandler } from './error-handler'

export function setupMiddleware(app: Express, config: Config) {
  // Security headers
  app.use(helmet())

  // CORS
  app.use(cors({
    origin: config.cors.origin,
    credentials: config.cors.credentials
  }))

  // Request logging
  app.use(requestLogger)

  // Rate limiting on roster endpoints
  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: { detail: 'Too many requests, please try again later' }
  })
  app.use('/activities', limiter)
}
