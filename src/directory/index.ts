export * from './types'
export * from './activity-directory'
