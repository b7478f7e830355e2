/**
 * Prometheus Metrics Setup
 */

import { createServer, type Server } from 'http'
import { register, collectDefaultMetrics, Counter } from 'prom-client'
import { logger } from '../utils/logger'

// Collect default metrics (CPU, memory, etc.)
collectDefaultMetrics({
  prefix: 'roster_api_'
})

export const httpRequestTotal = new Counter({
  name: 'roster_api_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status'] as const
})

export const rosterOperationsTotal = new Counter({
  name: 'roster_operations_total',
  help: 'Signup and unregister calls by outcome',
  labelNames: ['operation', 'outcome'] as const
})

/**
 * Start Prometheus metrics server
 */
export function startMetricsServer(port: number): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.statusCode = 404
      res.end('Not Found')
      return
    }

    register.metrics().then(
      (body) => {
        res.setHeader('Content-Type', register.contentType)
        res.end(body)
      },
      (error: unknown) => {
        logger.error('Failed to collect metrics', { error })
        res.statusCode = 500
        res.end('Metrics unavailable')
      }
    )
  })

  server.listen(port, () => {
    logger.info(`Metrics server listening on http://localhost:${port}/metrics`)
  })

  return server
}
