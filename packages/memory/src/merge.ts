import { isBindingPolicy } from './policy'
import { byAuthority, outranks } from './realms'
import type { ResolvedMemoryEntry } from './types'

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0
}

// Should `candidate` replace `current` for the same semantic key?
function supersedes(candidate: ResolvedMemoryEntry, current: ResolvedMemoryEntry): boolean {
    if (candidate.realm !== current.realm) return outranks(candidate.realm, current.realm)
    if (candidate.score !== current.score) return candidate.score > current.score
    return compareText(candidate.id, current.id) < 0
}

/**
 * One entry per semantic key, taken from the highest-authority realm that
 * returned it; survivors ordered by relevance and cut to `maxResults`.
 * Binding CLIENT policies claim their places in the cut first, so a weak
 * score never drops one. Ties fall back to authority then key so the order
 * is deterministic.
 */
export function mergeByPrecedence(entries: readonly ResolvedMemoryEntry[], maxResults: number): ResolvedMemoryEntry[] {
    const kept = new Map<string, ResolvedMemoryEntry>()
    for (const entry of entries) {
        const current = kept.get(entry.semanticKey)
        if (!current || supersedes(entry, current)) kept.set(entry.semanticKey, entry)
    }

    const ranked = [...kept.values()].sort((a, b) =>
        (b.score - a.score)
        || byAuthority(a.realm, b.realm)
        || compareText(a.semanticKey, b.semanticKey))

    const limit = Math.max(0, maxResults)
    const reserved = new Set(ranked.filter(isBindingPolicy).slice(0, limit))
    let room = limit - reserved.size

    const selected: ResolvedMemoryEntry[] = []
    for (const entry of ranked) {
        if (reserved.has(entry)) {
            selected.push(entry)
        } else if (room > 0) {
            selected.push(entry)
            room -= 1
        }
    }
    return selected
}
