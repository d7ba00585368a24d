export { InMemoryKeyValueStore, ManualClock } from './memory-kv-store'
export type { Clock } from './memory-kv-store'
