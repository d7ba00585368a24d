import { MemoryUnavailableError, type ActingIdentity, type Realm } from '@realmchat/shared'
import type { HierarchicalMemorySearcher, MemorySearchResult, ResolvedMemoryEntry } from '@realmchat/memory'

export const BIAS_WEIGHT = 1.25

export interface MemoryLookup {
    result: MemorySearchResult | null
    /** Every realm failed; the turn runs on history alone. */
    unavailable: boolean
}

export async function lookupMemory(
    searcher: HierarchicalMemorySearcher,
    query: string,
    identity: ActingIdentity,
    options: { realms?: readonly Realm[]; maxDepth: number },
): Promise<MemoryLookup> {
    try {
        const result = await searcher.resolve(query, identity, { realms: options.realms, maxDepth: options.maxDepth })
        return { result, unavailable: false }
    } catch (err) {
        if (!(err instanceof MemoryUnavailableError)) throw err
        console.warn(`[engine] No memory realm answered (${err.realms.join(', ')}); answering from history`)
        return { result: null, unavailable: true }
    }
}

/**
 * Mode bias as a re-rank over the merged entries. Precedence has already
 * been settled by the searcher; this only changes which entries a mode looks
 * at first.
 */
export function biasTowards(entries: readonly ResolvedMemoryEntry[], favoured: readonly Realm[]): ResolvedMemoryEntry[] {
    const weight = (entry: ResolvedMemoryEntry) => entry.score * (favoured.includes(entry.realm) ? BIAS_WEIGHT : 1)
    return entries
        .map((entry, index) => ({ entry, index, weighted: weight(entry) }))
        .sort((a, b) => (b.weighted - a.weighted) || (a.index - b.index))
        .map(({ entry }) => entry)
}

export function hasType(entry: ResolvedMemoryEntry, markers: readonly string[]): boolean {
    const type = `${entry.entityType} ${entry.factType ?? ''}`.toLowerCase()
    return markers.some(marker => type.includes(marker))
}
