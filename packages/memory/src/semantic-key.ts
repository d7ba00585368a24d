import type { Realm } from '@realmchat/shared'
import type { MemoryRecord, ResolvedMemoryEntry } from './types'

export function normalizeKeyPart(value: string): string {
    return value
        .normalize('NFKC')
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, '-')
        .replace(/^-+|-+$/g, '')
}

/**
 * Identity of the fact an entry describes: normalized entity name plus its
 * fact type (falling back to the entity type). "Vacation Policy"/policy from
 * CLIENT and "vacation policy"/Policy from a skill module collide on
 * `vacation-policy::policy`, so only the CLIENT version survives a merge.
 */
export function semanticKey(record: Pick<MemoryRecord, 'entityName' | 'entityType' | 'factType'>): string {
    const name = normalizeKeyPart(record.entityName)
    const type = normalizeKeyPart(record.factType ?? record.entityType) || 'fact'
    return `${name}::${type}`
}

/**
 * Canonical entry shape: fixed key order, absent optionals omitted. Cached
 * results are rebuilt in the same shape, so a cache hit serializes exactly
 * like the miss that produced it.
 */
export function toResolvedEntry(record: MemoryRecord, realm: Realm): ResolvedMemoryEntry {
    return {
        id: record.id,
        entityName: record.entityName,
        entityType: record.entityType,
        ...(record.factType !== undefined ? { factType: record.factType } : {}),
        content: record.content,
        score: record.score,
        ...(record.depth !== undefined ? { depth: record.depth } : {}),
        ...(record.relatedTopics !== undefined ? { relatedTopics: [...record.relatedTopics] } : {}),
        realm,
        semanticKey: semanticKey(record),
    }
}
