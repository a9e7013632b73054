/**
 * Configuration Management
 */

import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

// z.coerce.boolean() treats "false" as true
const envBoolean = z.preprocess(
  value => (typeof value === 'string' ? !['false', '0', 'no', 'off', ''].includes(value.trim().toLowerCase()) : value),
  z.boolean()
)

const ConfigSchema = z.object({
  env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  port: z.coerce.number().default(8000),
  host: z.string().default('0.0.0.0'),

  seed: z.object({
    file: z.string().default('config/activities.yaml')
  }),

  capacity: z.object({
    enforce: envBoolean.default(true)
  }),

  staticDir: z.string().default('static'),

  rateLimit: z.object({
    windowMs: z.coerce.number().default(60000),
    maxRequests: z.coerce.number().default(1000)
  }),

  metrics: z.object({
    enabled: envBoolean.default(false),
    port: z.coerce.number().default(9090)
  }),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'text']).default('json')
  }),

  cors: z.object({
    origin: z.string().default('*'),
    credentials: envBoolean.default(true)
  })
})

export type Config = z.infer<typeof ConfigSchema>

export const config: Config = ConfigSchema.parse({
  env: process.env.NODE_ENV || 'development',
  port: process.env.PORT,
  host: process.env.HOST,

  seed: {
    file: process.env.SEED_FILE
  },

  capacity: {
    enforce: process.env.ENFORCE_CAPACITY
  },

  staticDir: process.env.STATIC_DIR,

  rateLimit: {
    windowMs: process.env.RATE_LIMIT_WINDOW_MS,
    maxRequests: process.env.RATE_LIMIT_MAX_REQUESTS
  },

  metrics: {
    enabled: process.env.METRICS_ENABLED,
    port: process.env.METRICS_PORT
  },

  logging: {
    level: process.env.LOG_LEVEL,
    format: process.env.LOG_FORMAT
  },

  cors: {
    origin: process.env.CORS_ORIGIN,
    credentials: process.env.CORS_CREDENTIALS
  }
})

/**
 * Copy of the validated configuration, safe to adjust per app instance
 */
export function loadConfig(): Config {
  return structuredClone(config)
}
