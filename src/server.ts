/**
 * Activity Roster API - Main Server
 */

import type { Server } from 'http'
import { config } from './config'
import { createApp, createHttpServer } from './app'
import { ActivityRegistry } from './registry/activity-registry'
import { loadSeedActivities } from './registry/seed'
import { startMetricsServer } from './observability/metrics'
import { logger } from './utils/logger'

function startServer() {
  const registry = new ActivityRegistry(loadSeedActivities(config.registry.seedFile))
  logger.info('Activity registry seeded', {
    activities: registry.size,
    seedFile: config.registry.seedFile ?? 'bundled'
  })

  const app = createApp(registry, config)
  const server = createHttpServer(app)

  let metricsServer: Server | undefined
  if (config.metrics.enabled) {
    metricsServer = startMetricsServer(config.metrics.port)
  }

  server.listen(config.port, config.host, () => {
    logger.info('🚀 Activity Roster API started', {
      port: config.port,
      host: config.host,
      env: config.env,
      metrics: config.metrics.enabled ? `http://localhost:${config.metrics.port}/metrics` : 'disabled',
      app: `http://localhost:${config.port}/`
    })
  })

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`)

    metricsServer?.close()
    server.close(() => {
      logger.info('HTTP server closed')
      process.exit(0)
    })

    // Force shutdown after timeout
    setTimeout(() => {
      logger.error('Forced shutdown after timeout')
      process.exit(1)
    }, 10000).unref()
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

try {
  startServer()
} catch (error) {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error)
  })
  process.exit(1)
}
