export * from './lock-manager'
export * from './in-memory-lock-manager'
