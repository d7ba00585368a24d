import type { Redis } from 'ioredis'

/**
 * Shared expiring key-value store. Every method is atomic on its own;
 * read-modify-write callers go through `compareAndSet`.
 */
/** A second key written with the same value in the same atomic step. */
export interface MirrorWrite {
    key: string
    ttlMs: number
}

export interface KeyValueStore {
    get(key: string): Promise<string | null>
    set(key: string, value: string, ttlMs: number): Promise<void>
    /**
     * Writes `value` only when the stored value still equals `expected`
     * (`null` = key must be absent). Returns false when another writer won.
     * A `mirror` is written only when the swap succeeds.
     */
    compareAndSet(key: string, expected: string | null, value: string, ttlMs: number, mirror?: MirrorWrite): Promise<boolean>
    delete(key: string): Promise<boolean>
    /** Subscribes to store-enforced expiry. Resolves to an unsubscribe function. */
    onExpired(listener: (key: string) => void): Promise<() => Promise<void>>
}

const CAS_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if ARGV[1] == 'absent' then
    if current then return 0 end
elseif current ~= ARGV[2] then
    return 0
end
redis.call('SET', KEYS[1], ARGV[3], 'PX', ARGV[4])
if KEYS[2] then
    redis.call('SET', KEYS[2], ARGV[3], 'PX', ARGV[5])
end
return 1
`

export class RedisKeyValueStore implements KeyValueStore {
    constructor(private readonly redis: Redis) { }

    async get(key: string): Promise<string | null> {
        return this.redis.get(key)
    }

    async set(key: string, value: string, ttlMs: number): Promise<void> {
        await this.redis.set(key, value, 'PX', ttlMs)
    }

    async compareAndSet(key: string, expected: string | null, value: string, ttlMs: number, mirror?: MirrorWrite): Promise<boolean> {
        const keys = mirror ? [key, mirror.key] : [key]
        const result = await this.redis.eval(
            CAS_SCRIPT, keys.length, ...keys,
            expected === null ? 'absent' : 'equals',
            expected ?? '',
            value,
            String(ttlMs),
            String(mirror?.ttlMs ?? 0),
        )
        return result === 1
    }

    async delete(key: string): Promise<boolean> {
        return (await this.redis.del(key)) > 0
    }

    async onExpired(listener: (key: string) => void): Promise<() => Promise<void>> {
        // Subscriber connections cannot issue normal commands, so use a dedicated one
        const subscriber = this.redis.duplicate()
        try {
            await subscriber.config('SET', 'notify-keyspace-events', 'Ex')
        } catch (err) {
            // Managed Redis often forbids CONFIG; the setting must then be applied out of band
            console.warn('[Redis] Could not enable keyspace notifications:', err instanceof Error ? err.message : err)
        }

        subscriber.on('pmessage', (_pattern: string, _channel: string, key: string) => listener(key))
        await subscriber.psubscribe('__keyevent@*__:expired')

        return async () => {
            await subscriber.punsubscribe()
            subscriber.disconnect()
        }
    }
}
