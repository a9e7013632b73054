/**
 * Routes Setup
 */

import express, { Express } from 'express'
import { resolve } from 'path'
import type { Config } from './config'
import type { ActivityService } from './services/activity-service'
import { createActivitiesRouter } from './api/activities'

export const VERSION = '0.1.0'

export function setupRoutes(app: Express, activityService: ActivityService, config: Config) {
  // Front end
  app.get('/', (req, res) => {
    res.redirect(307, '/static/index.html')
  })
  app.use('/static', express.static(resolve(config.staticDir)))

  // Health check
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      env: config.env,
      activities: activityService.directory.size
    })
  })

  app.use('/activities', createActivitiesRouter(activityService))

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      detail: 'Not found',
      code: 'NOT_FOUND',
      path: req.path
    })
  })
}
