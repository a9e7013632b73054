/**
 * Express application assembly
 */

import express, { Express } from 'express'
import type { Config } from './config'
import { setupMiddleware, setupErrorHandling } from './middleware'
import { setupRoutes } from './routes'
import type { ActivityService } from './services/activity-service'

export function createApp(activityService: ActivityService, config: Config): Express {
  const app = express()

  setupMiddleware(app, config)
  setupRoutes(app, activityService, config)
  setupErrorHandling(app)

  return app
}
