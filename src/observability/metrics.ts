/**
 * Prometheus Metrics Setup
 */

import { createServer, type Server } from 'http'
import { Registry, collectDefaultMetrics, Counter, Histogram } from 'prom-client'
import { logger } from '../utils/logger'

export const metricsRegistry = new Registry()

// Collect default metrics (CPU, memory, etc.)
collectDefaultMetrics({
  prefix: 'activities_api_',
  register: metricsRegistry
})

export const httpRequestDuration = new Histogram({
  name: 'activities_api_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status'],
  registers: [metricsRegistry]
})

export const httpRequestTotal = new Counter({
  name: 'activities_api_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status'],
  registers: [metricsRegistry]
})

export const rosterOperationsTotal = new Counter({
  name: 'activities_api_roster_operations_total',
  help: 'Total number of signup and unregister operations',
  labelNames: ['operation', 'outcome'],
  registers: [metricsRegistry]
})

/**
 * Start Prometheus metrics server
 */
export function startMetricsServer(port: number): Server {
  const server = createServer(async (req, res) => {
    if (req.url === '/metrics') {
      res.setHeader('Content-Type', metricsRegistry.contentType)
      res.end(await metricsRegistry.metrics())
    } else {
      res.statusCode = 404
      res.end('Not Found')
    }
  })

  server.listen(port, () => {
    logger.info(`Metrics server listening on http://localhost:${port}/metrics`)
  })

  return server
}
