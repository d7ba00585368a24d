export * from './schemas'
export * from './errors'
export { withTimeout, sleep, exponentialBackoff } from './async'
export { loadConfig } from './config'
export type { AppConfig } from './config'
