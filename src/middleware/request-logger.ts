/**
 * Request Logger Middleware
 */

import type { Request, Response, NextFunction } from 'express'
import { httpRequestTotal } from '../observability/metrics'
import { logger } from '../utils/logger'

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now()

  res.on('finish', () => {
    const duration = Date.now() - start
    // Matched route pattern keeps label cardinality bounded
    const route = req.route ? `${req.baseUrl}${String(req.route.path)}` : 'unmatched'

    httpRequestTotal.inc({ method: req.method, route, status: res.statusCode })
    logger.info('HTTP Request', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      duration
    })
  })

  next()
}
