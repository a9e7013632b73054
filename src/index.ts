// Core exports
export * from './directory'
export * from './storage'
export * from './seed'

// Service exports
export { ActivityService } from './services/activity-service'
export { createApp } from './app'
export { createActivitiesRouter, toActivityResponse, toApiError } from './api/activities'
export type { ActivityResponse } from './api/activities'
export { ApiError } from './middleware'
export type { ApiErrorCode } from './middleware'
export { loadConfig } from './config'
export type { Config } from './config'
