import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import { Redis } from 'ioredis'

export function createRedisConnection(redisUrl: string): Redis {
    return new Redis(redisUrl, {
        // BullMQ requires null here; harmless for plain commands
        maxRetriesPerRequest: null,
        retryStrategy: (times) => {
            const delay = Math.min(times * 1000, 10000)
            console.warn(`[Redis] Connection lost. Retrying in ${delay}ms...`)
            return delay
        },
        ...(redisUrl.startsWith('rediss://') ? { tls: {} } : {}),
    })
}

export function createSupabase(url: string, serviceKey: string): SupabaseClient {
    const missing = []
    if (!url || url === 'undefined') missing.push('SUPABASE_URL')
    if (!serviceKey || serviceKey === 'undefined') missing.push('SUPABASE_SERVICE_KEY')

    if (missing.length > 0) {
        console.error(`[DB] Critical: ${missing.join(' and ')} missing from environment.`)
        throw new Error(`Supabase environment variables are missing: ${missing.join(', ')}`)
    }

    return createClient(url, serviceKey, { auth: { persistSession: false } })
}
