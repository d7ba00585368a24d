import type { ActingIdentity, Mode, Realm } from '@realmchat/shared'

// A record exactly as the long-term memory store returns it
export interface MemoryRecord {
    id: string
    entityName: string
    entityType: string             // 'policy' | 'procedure' | 'concept' | …
    factType?: string
    content: string
    score: number                  // relevance from the store's search
    depth?: number                 // hops from the anchor entity
    relatedTopics?: string[]
}

export interface ResolvedMemoryEntry extends MemoryRecord {
    realm: Realm
    semanticKey: string
}

export interface MemorySearchRequest {
    realm: Realm
    entityId: string
    query: string
    maxResults: number
    maxDepth: number
    signal?: AbortSignal
}

export interface DurableFact {
    key: string                    // semantic key, unique per actor
    entityName: string
    factType: string
    content: string
    sourceTurnIds: string[]
}

export interface MemoryClient {
    search(request: MemorySearchRequest): Promise<MemoryRecord[]>
    upsert(realm: 'ACTOR', entityId: string, facts: DurableFact[]): Promise<void>
}

export interface ResolveOptions {
    realms?: readonly Realm[]
    maxResults?: number
    maxDepth?: number
}

export interface MemorySearchResult {
    entries: ResolvedMemoryEntry[]
    realmsAccessed: Record<Realm, number>
    unavailableRealms: Realm[]
    degraded: boolean
    relationshipsTraversed: number
    queryTimeMs: number
    cacheHit: boolean
}

// ── Conversation material handed to consolidation ────────────────────────────

export interface SessionMessage {
    turnId: string
    role: 'user' | 'assistant'
    content: string
    ts: number
}

export interface TaskOutcome {
    id: string
    turnId: string
    taskType: string
    action: string | null
    request: string
    summary: string
    proceduresUsed: string[]
    policiesApplied: string[]
    ts: number
}

export type ConsolidationTrigger = 'window' | 'session-deleted' | 'session-expired' | 'mode-switch'

export type ConsolidationStatus = 'pending' | 'succeeded' | 'failed-permanent'

export interface ConsolidationJob {
    id: string
    sessionId: string
    identity: ActingIdentity
    mode: Mode
    trigger: ConsolidationTrigger
    messages: SessionMessage[]
    outcomes: TaskOutcome[]
    learning: { topic: string | null; level: number } | null
    submittedAt: string
}

export interface ConsolidationRecord {
    job: ConsolidationJob
    status: ConsolidationStatus
    attempts: number
    lastError?: string
    factsUpserted?: number
}
