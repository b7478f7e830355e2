/**
 * Express application factory
 *
 * The registry is passed in rather than created here, so each caller
 * (the server process, each test) owns its own roster state.
 */

import http, { type Server } from 'http'
import express, { type Express } from 'express'
import type { Config } from './config'
import type { ActivityRegistry } from './registry/activity-registry'
import { setupMiddleware, errorHandler } from './middleware'
import { setupRoutes } from './routes'
import { logger } from './utils/logger'

export function createApp(registry: ActivityRegistry, config: Config): Express {
  const app = express()

  setupMiddleware(app, config)
  setupRoutes(app, registry, config)

  // Error handler (must be last)
  app.use(errorHandler)

  return app
}

/**
 * Wrap the app in an HTTP server whose listen errors (EADDRINUSE, EACCES)
 * are logged and handed to `onFatal` instead of crashing on an unhandled event.
 */
export function createHttpServer(
  app: Express,
  onFatal: (error: Error) => void = () => process.exit(1)
): Server {
  const server = http.createServer(app)

  server.on('error', (error: NodeJS.ErrnoException) => {
    logger.error('HTTP server error', {
      error: error.message,
      code: error.code
    })
    onFatal(error)
  })

  return server
}
