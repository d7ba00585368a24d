export { createRedisConnection, createSupabase } from './client'
export { RedisKeyValueStore } from './kv-store'
export type { KeyValueStore, MirrorWrite } from './kv-store'
