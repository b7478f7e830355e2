/**
 * Tests for environment configuration
 */

import { describe, test, expect } from 'vitest'
import { ZodError } from 'zod'
import { loadConfig } from '../../src/config'

describe('loadConfig', () => {
  test('applies defaults when nothing is set', () => {
    const config = loadConfig({})

    expect(config).toEqual({
      env: 'development',
      port: 8000,
      host: '0.0.0.0',
      rateLimit: { windowMs: 60000, maxRequests: 1000 },
      metrics: { enabled: true, port: 9090 },
      logging: { level: 'info', format: 'json' },
      cors: { origin: '*', credentials: true },
      registry: { seedFile: undefined }
    })
  })

  test('reads values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '3000',
      METRICS_ENABLED: 'false',
      LOG_FORMAT: 'text',
      SEED_FILE: './data/custom.json'
    })

    expect(config.env).toBe('production')
    expect(config.port).toBe(3000)
    expect(config.metrics.enabled).toBe(false)
    expect(config.logging.format).toBe('text')
    expect(config.registry.seedFile).toBe('./data/custom.json')
  })

  test('treats empty variables as unset', () => {
    expect(loadConfig({ PORT: '', CORS_CREDENTIALS: '' })).toMatchObject({
      port: 8000,
      cors: { credentials: true }
    })
  })

  test('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ZodError)
  })

  test('rejects a non-boolean flag', () => {
    expect(() => loadConfig({ METRICS_ENABLED: 'yes' })).toThrow(ZodError)
  })

  test('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ZodError)
  })
})
