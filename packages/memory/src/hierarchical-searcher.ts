import {
    MemoryUnavailableError,
    describeError,
    withTimeout,
    type ActingIdentity,
    type Realm,
} from '@realmchat/shared'
import { mergeByPrecedence } from './merge'
import { ALL_REALMS, byAuthority, emptyRealmCounts, realmScopes } from './realms'
import type { CachedSearch } from './schemas'
import { searchCacheHash, type MemorySearchCache } from './search-cache'
import { toResolvedEntry } from './semantic-key'
import type {
    MemoryClient,
    MemoryRecord,
    MemorySearchResult,
    ResolveOptions,
    ResolvedMemoryEntry,
} from './types'

export interface HierarchicalMemorySearcherOptions {
    cache?: MemorySearchCache | null
    realmTimeoutMs?: number
    defaultMaxResults?: number
}

const MIN_DEPTH = 1
const MAX_DEPTH = 3

export class HierarchicalMemorySearcher {
    private readonly cache: MemorySearchCache | null
    private readonly realmTimeoutMs: number
    private readonly defaultMaxResults: number

    constructor(private readonly client: MemoryClient, options: HierarchicalMemorySearcherOptions = {}) {
        this.cache = options.cache ?? null
        this.realmTimeoutMs = options.realmTimeoutMs ?? 2000
        this.defaultMaxResults = options.defaultMaxResults ?? 20
    }

    /**
     * Resolves memory for `query` across the requested realms.
     *
     * A realm that errors or exceeds the per-realm timeout contributes nothing
     * and is reported in `unavailableRealms`. Throws MemoryUnavailableError
     * only when every dispatched realm search failed.
     */
    async resolve(query: string, identity: ActingIdentity, options: ResolveOptions = {}): Promise<MemorySearchResult> {
        const started = Date.now()
        const realms = options.realms ?? ALL_REALMS
        const maxResults = options.maxResults ?? this.defaultMaxResults
        const maxDepth = Math.min(MAX_DEPTH, Math.max(MIN_DEPTH, options.maxDepth ?? 2))
        const hash = searchCacheHash({ query, identity, realms, maxDepth, maxResults })

        const entryKey = await this.cacheEntryKey(identity.actorId, hash)
        const cached = await this.readCache(entryKey)
        if (cached) {
            return {
                ...cached,
                unavailableRealms: [],
                degraded: false,
                queryTimeMs: Date.now() - started,
                cacheHit: true,
            }
        }

        const scopes = realmScopes(identity, realms)
        const settled = await Promise.allSettled(
            scopes.map(scope => this.searchScope(scope.realm, scope.entityId, query, maxResults, maxDepth)),
        )

        const unavailable = new Set<Realm>()
        const realmsAccessed = emptyRealmCounts()
        const collected: ResolvedMemoryEntry[] = []
        let firstFailure: unknown

        settled.forEach((outcome, i) => {
            const { realm, entityId } = scopes[i]
            if (outcome.status === 'rejected') {
                unavailable.add(realm)
                firstFailure ??= outcome.reason
                console.warn(`[memory-search] ${realm}/${entityId} unavailable: ${describeError(outcome.reason)}`)
                return
            }
            for (const record of outcome.value) {
                if ((record.depth ?? 0) > maxDepth) continue
                realmsAccessed[realm] += 1
                collected.push(toResolvedEntry(record, realm))
            }
        })

        const unavailableRealms = [...unavailable].sort(byAuthority)
        if (scopes.length > 0 && settled.every(outcome => outcome.status === 'rejected')) {
            throw new MemoryUnavailableError(unavailableRealms, firstFailure)
        }

        const entries = mergeByPrecedence(collected, maxResults)
        const relationshipsTraversed = entries.reduce((sum, entry) => sum + (entry.depth ?? 0), 0)

        // Degraded results are not cached: the missing realm may be back on the next turn
        if (unavailableRealms.length === 0) {
            await this.writeCache(entryKey, { entries, realmsAccessed, relationshipsTraversed })
        }

        const queryTimeMs = Date.now() - started
        console.log(
            `[memory-search] ${entries.length} entries from ${collected.length} hits in ${queryTimeMs}ms` +
            (unavailableRealms.length > 0 ? ` (unavailable: ${unavailableRealms.join(', ')})` : ''),
        )

        return {
            entries,
            realmsAccessed,
            unavailableRealms,
            degraded: unavailableRealms.length > 0,
            relationshipsTraversed,
            queryTimeMs,
            cacheHit: false,
        }
    }

    async invalidateActor(actorId: string): Promise<void> {
        await this.cache?.invalidateActor(actorId)
    }

    private async searchScope(
        realm: Realm,
        entityId: string,
        query: string,
        maxResults: number,
        maxDepth: number,
    ): Promise<MemoryRecord[]> {
        const controller = new AbortController()
        try {
            return await withTimeout(
                this.client.search({ realm, entityId, query, maxResults, maxDepth, signal: controller.signal }),
                this.realmTimeoutMs,
                `${realm} search`,
            )
        } catch (err) {
            controller.abort()
            throw err
        }
    }

    // null when there is no cache or its generation could not be read
    private async cacheEntryKey(actorId: string, hash: string): Promise<string | null> {
        if (!this.cache) return null
        try {
            return await this.cache.entryKey(actorId, hash)
        } catch (err) {
            console.warn(`[memory-search] Cache generation read failed, bypassing cache: ${describeError(err)}`)
            return null
        }
    }

    private async readCache(entryKey: string | null): Promise<CachedSearch | null> {
        if (!this.cache || entryKey === null) return null
        try {
            return await this.cache.get(entryKey)
        } catch (err) {
            console.warn(`[memory-search] Cache read failed, searching realms: ${describeError(err)}`)
            return null
        }
    }

    private async writeCache(entryKey: string | null, value: CachedSearch) {
        if (!this.cache || entryKey === null) return
        try {
            await this.cache.set(entryKey, value)
        } catch (err) {
            console.warn(`[memory-search] Cache write failed: ${describeError(err)}`)
        }
    }
}
