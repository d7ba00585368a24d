import 'dotenv/config'
import OpenAI from 'openai'
import { createRedisConnection, createSupabase, RedisKeyValueStore } from '@realmchat/db'
import {
    BullConsolidationQueue,
    ConsolidationPipeline,
    HierarchicalMemorySearcher,
    MemorySearchCache,
    SupabaseMemoryClient,
    createOpenAIEmbedder,
} from '@realmchat/memory'
import { ContextStore, ConversationEngine, OpenAIResponseGenerator } from '@realmchat/conversation'
import { loadConfig } from '@realmchat/shared'
import { buildApp } from './app'

const config = loadConfig()

const redis = createRedisConnection(config.REDIS_URL)
const kv = new RedisKeyValueStore(redis)
const supabase = createSupabase(config.SUPABASE_URL, config.SUPABASE_SERVICE_KEY)
const openai = new OpenAI({ apiKey: config.OPENAI_API_KEY, baseURL: config.OPENAI_BASE_URL })

const searcher = new HierarchicalMemorySearcher(new SupabaseMemoryClient(supabase, createOpenAIEmbedder(openai)), {
    cache: new MemorySearchCache(kv, config.SEARCH_CACHE_TTL_SECONDS * 1000),
    realmTimeoutMs: config.REALM_TIMEOUT_MS,
})

// BullMQ needs its own connection for blocking operations
const queue = new BullConsolidationQueue(redis.duplicate(), {
    attempts: config.CONSOLIDATION_ATTEMPTS,
    backoffMs: config.CONSOLIDATION_BACKOFF_MS,
})
const consolidation = new ConsolidationPipeline(queue)

const engine = new ConversationEngine({
    store: new ContextStore(kv, { ttlMs: config.SESSION_TTL_SECONDS * 1000, historyLimit: config.HISTORY_LIMIT }),
    searcher,
    generator: new OpenAIResponseGenerator(openai, { model: config.CHAT_MODEL }),
    consolidation,
}, {
    generationStallMs: config.GENERATION_STALL_MS,
    consolidationWindow: config.CONSOLIDATION_WINDOW,
})

if (!config.API_KEY) console.warn('[api] API_KEY is not set; requests are not authenticated')

const app = buildApp({ engine, consolidation }, { apiKey: config.API_KEY, logger: true })

const shutdown = async () => {
    console.log('[api] Shutting down')
    await app.close()
    await consolidation.flush()
    await queue.close()
    redis.disconnect()
    process.exit(0)
}

process.on('SIGTERM', () => void shutdown())
process.on('SIGINT', () => void shutdown())

const start = async () => {
    try {
        await app.listen({ port: config.PORT, host: '0.0.0.0' })
        console.log(`[api] Conversation engine listening on http://localhost:${config.PORT}`)
    } catch (err) {
        app.log.error(err)
        process.exit(1)
    }
}

void start()
