import 'dotenv/config'
import Fastify from 'fastify'
import OpenAI from 'openai'
import { createRedisConnection, createSupabase, RedisKeyValueStore } from '@realmchat/db'
import {
    BullConsolidationQueue,
    ConsolidationPipeline,
    ConsolidationProcessor,
    MemorySearchCache,
    OpenAIFactExtractor,
    SupabaseMemoryClient,
    createOpenAIEmbedder,
    startConsolidationWorker,
} from '@realmchat/memory'
import { ContextStore } from '@realmchat/conversation'
import { loadConfig } from '@realmchat/shared'
import { watchSessionExpiry } from './expiry'

const config = loadConfig()

const redis = createRedisConnection(config.REDIS_URL)
const kv = new RedisKeyValueStore(redis)
const supabase = createSupabase(config.SUPABASE_URL, config.SUPABASE_SERVICE_KEY)
const openai = new OpenAI({ apiKey: config.OPENAI_API_KEY, baseURL: config.OPENAI_BASE_URL })

const processor = new ConsolidationProcessor(
    new OpenAIFactExtractor(openai, config.EXTRACTION_MODEL),
    new SupabaseMemoryClient(supabase, createOpenAIEmbedder(openai)),
    new MemorySearchCache(kv, config.SEARCH_CACHE_TTL_SECONDS * 1000),
    { stepTimeoutMs: config.CONSOLIDATION_STEP_TIMEOUT_MS },
)

// BullMQ needs separate connections for blocking operations
const worker = startConsolidationWorker(redis.duplicate(), processor, { concurrency: config.CONSOLIDATION_CONCURRENCY })
const queue = new BullConsolidationQueue(redis.duplicate(), {
    attempts: config.CONSOLIDATION_ATTEMPTS,
    backoffMs: config.CONSOLIDATION_BACKOFF_MS,
})
const consolidation = new ConsolidationPipeline(queue)
const store = new ContextStore(kv, { ttlMs: config.SESSION_TTL_SECONDS * 1000, historyLimit: config.HISTORY_LIMIT })

const app = Fastify({ logger: false })
app.get('/health', async () => ({ status: 'ok', service: 'consolidation-worker', ts: new Date().toISOString() }))

const start = async () => {
    const unwatch = await watchSessionExpiry(store, consolidation)
    await app.listen({ port: config.PORT, host: '0.0.0.0' })
    console.log(`[consolidation] Worker watching session expiry and processing jobs (concurrency ${config.CONSOLIDATION_CONCURRENCY})`)

    const shutdown = async () => {
        console.log('[consolidation] Shutting down')
        await unwatch()
        await app.close()
        await worker.close()
        await consolidation.flush()
        await queue.close()
        redis.disconnect()
        process.exit(0)
    }
    process.on('SIGTERM', () => void shutdown())
    process.on('SIGINT', () => void shutdown())
}

start().catch(err => {
    console.error('[consolidation] Failed to start:', err)
    process.exit(1)
})
