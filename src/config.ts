/**
 * Configuration Management
 */

import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

// z.coerce.boolean() turns "false" into true, so flags are parsed by value
const envFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true'))

const ConfigSchema = z.object({
  env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  port: z.coerce.number().int().positive().default(8000),
  host: z.string().default('0.0.0.0'),

  rateLimit: z.object({
    windowMs: z.coerce.number().default(60000),
    maxRequests: z.coerce.number().default(1000)
  }),

  metrics: z.object({
    enabled: envFlag(true),
    port: z.coerce.number().int().positive().default(9090)
  }),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'text']).default('json')
  }),

  cors: z.object({
    origin: z.string().default('*'),
    credentials: envFlag(true)
  }),

  registry: z.object({
    seedFile: z.string().min(1).optional()
  })
})

export type Config = z.infer<typeof ConfigSchema>

type Env = Record<string, string | undefined>

/**
 * Load and validate configuration from environment variables.
 * Throws a ZodError when a variable holds an invalid value.
 */
export function loadConfig(env: Env = process.env): Config {
  return ConfigSchema.parse({
    env: env.NODE_ENV || undefined,
    port: env.PORT || undefined,
    host: env.HOST || undefined,

    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS || undefined,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS || undefined
    },

    metrics: {
      enabled: env.METRICS_ENABLED || undefined,
      port: env.METRICS_PORT || undefined
    },

    logging: {
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined
    },

    cors: {
      origin: env.CORS_ORIGIN || undefined,
      credentials: env.CORS_CREDENTIALS || undefined
    },

    registry: {
      seedFile: env.SEED_FILE || undefined
    }
  })
}

export const config: Config = loadConfig()
