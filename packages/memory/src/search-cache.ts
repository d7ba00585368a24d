import { createHash, randomUUID } from 'node:crypto'
import type { KeyValueStore } from '@realmchat/db'
import type { ActingIdentity, Realm } from '@realmchat/shared'
import { CachedSearchSchema, type CachedSearch } from './schemas'

export interface SearchCacheKey {
    query: string
    identity: ActingIdentity
    realms: readonly Realm[]
    maxDepth: number
    maxResults: number
}

export function searchCacheHash(key: SearchCacheKey): string {
    const payload = JSON.stringify({
        q: key.query.trim().toLowerCase().replace(/\s+/g, ' '),
        c: key.identity.clientId,
        a: key.identity.actorId,
        ac: key.identity.actorClassId,
        s: [...new Set(key.identity.skillModuleIds)].sort(),
        r: [...new Set(key.realms)].sort(),
        d: key.maxDepth,
        n: key.maxResults,
    })
    return createHash('sha256').update(payload).digest('hex')
}

/**
 * Merged search results in the shared store. Each actor has a generation
 * token folded into its keys; replacing it orphans every cached result for
 * that actor at once, in every process, and the orphans age out by TTL.
 *
 * Callers resolve an entry key once per search and use it for both the
 * read and the write, so a search that overlaps an invalidation stores its
 * result under the generation it started from.
 */
export class MemorySearchCache {
    constructor(
        private readonly store: KeyValueStore,
        private readonly ttlMs: number,
        private readonly prefix = 'memsearch',
    ) { }

    async entryKey(actorId: string, hash: string): Promise<string> {
        const generation = (await this.store.get(this.generationKey(actorId))) ?? '0'
        return `${this.prefix}:${actorId}:${generation}:${hash}`
    }

    async get(entryKey: string): Promise<CachedSearch | null> {
        const raw = await this.store.get(entryKey)
        if (!raw) return null

        const parsed = CachedSearchSchema.safeParse(JSON.parse(raw))
        if (!parsed.success) {
            console.warn(`[memory-search] Discarding malformed cache entry ${entryKey}`)
            return null
        }
        return parsed.data
    }

    async set(entryKey: string, value: CachedSearch): Promise<void> {
        await this.store.set(entryKey, JSON.stringify(value), this.ttlMs)
    }

    /**
     * Tokens are never reused, and the token outlives every entry written
     * under the one it replaced, so the key can be left to expire.
     */
    async invalidateActor(actorId: string): Promise<void> {
        await this.store.set(this.generationKey(actorId), randomUUID(), this.ttlMs * 2)
    }

    private generationKey(actorId: string): string {
        return `${this.prefix}:gen:${actorId}`
    }
}
