/**
 * Activities API Service - Main Server
 */

import http from 'http'
import { config } from './config'
import { createApp } from './app'
import { ActivityService } from './services/activity-service'
import { logger } from './utils/logger'
import { startMetricsServer } from './observability/metrics'

async function startServer() {
  try {
    logger.info('Initializing activity service...')
    const activityService = new ActivityService(config)
    await activityService.initialize()

    const app = createApp(activityService, config)
    const server = http.createServer(app)

    // Start metrics server (Prometheus)
    const metricsServer = config.metrics.enabled
      ? startMetricsServer(config.metrics.port)
      : null

    server.listen(config.port, config.host, () => {
      logger.info('Activities API Service started', {
        port: config.port,
        host: config.host,
        env: config.env,
        metrics: metricsServer ? `http://localhost:${config.metrics.port}/metrics` : 'disabled',
        ui: `http://localhost:${config.port}/`,
        health: `http://localhost:${config.port}/health`
      })
    })

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`)

      metricsServer?.close()
      server.close(() => {
        logger.info('HTTP server closed')

        activityService.shutdown()
          .then(() => {
            logger.info('Activity service shutdown complete')
            process.exit(0)
          })
          .catch((error: unknown) => {
            logger.error('Activity service shutdown failed', { error })
            process.exit(1)
          })
      })

      // Force shutdown after timeout
      setTimeout(() => {
        logger.error('Forced shutdown after timeout')
        process.exit(1)
      }, 10000).unref()
    }

    process.on('SIGTERM', () => shutdown('SIGTERM'))
    process.on('SIGINT', () => shutdown('SIGINT'))

  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error)
    })
    process.exit(1)
  }
}

void startServer()
