/**
 * API Routes Setup
 */

import express, { type Express } from 'express'
import { fileURLToPath } from 'url'
import type { Config } from './config'
import type { ActivityRegistry } from './registry/activity-registry'
import { createActivityRouter } from './api/activities'

export const VERSION = '0.1.0'

const STATIC_DIR = fileURLToPath(new URL('../static', import.meta.url))

export function setupRoutes(app: Express, registry: ActivityRegistry, config: Config) {
  // Front end entry point
  app.get('/', (req, res) => {
    res.redirect(307, '/static/index.html')
  })

  app.use('/static', express.static(STATIC_DIR))

  // Health check
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      env: config.env,
      activities: registry.size
    })
  })

  // API Documentation
  app.get('/docs', (req, res) => {
    res.json({
      message: 'Activity Roster API Documentation',
      version: VERSION,
      endpoints: {
        activities: 'GET /activities',
        signup: 'POST /activities/{activityName}/signup?email={email}',
        unregister: 'POST /activities/{activityName}/unregister?email={email}',
        health: 'GET /health'
      }
    })
  })

  app.use('/activities', createActivityRouter(registry))

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      detail: 'Not found',
      path: req.path
    })
  })
}
