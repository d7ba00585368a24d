import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import type { Embedder } from './embeddings'
import type { DurableFact, MemoryClient, MemoryRecord, MemorySearchRequest } from './types'

export class MemoryClientError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'MemoryClientError'
    }
}

const MemoryRowSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    entity_name: z.string(),
    entity_type: z.string(),
    fact_type: z.string().nullish(),
    content: z.string(),
    similarity: z.number(),
    depth: z.number().int().nullish(),
    related_topics: z.array(z.string()).nullish(),
})

type MemoryRow = z.infer<typeof MemoryRowSchema>

function toRecord(row: MemoryRow): MemoryRecord {
    return {
        id: row.id,
        entityName: row.entity_name,
        entityType: row.entity_type,
        ...(row.fact_type ? { factType: row.fact_type } : {}),
        content: row.content,
        score: row.similarity,
        ...(row.depth != null ? { depth: row.depth } : {}),
        ...(row.related_topics ? { relatedTopics: row.related_topics } : {}),
    }
}

/**
 * Long-term memory backed by the `realm_memories` table. Search goes through
 * the `search_realm_memories` RPC (pgvector similarity plus graph expansion up
 * to `max_depth` hops); upserts are keyed on (realm, entity_id, fact_key).
 */
export class SupabaseMemoryClient implements MemoryClient {
    constructor(
        private readonly supabase: SupabaseClient,
        private readonly embed: Embedder,
    ) { }

    async search(request: MemorySearchRequest): Promise<MemoryRecord[]> {
        const queryEmbedding = await this.embed(request.query)

        let call = this.supabase.rpc('search_realm_memories', {
            query_embedding: queryEmbedding,
            p_realm: request.realm,
            p_entity_id: request.entityId,
            match_count: request.maxResults,
            max_depth: request.maxDepth,
        })
        if (request.signal) call = call.abortSignal(request.signal)

        const { data, error } = await call
        if (error) {
            throw new MemoryClientError(`search ${request.realm}/${request.entityId} failed: ${error.message}`)
        }

        const rows = z.array(MemoryRowSchema).safeParse(data ?? [])
        if (!rows.success) {
            throw new MemoryClientError(`search ${request.realm}/${request.entityId} returned unexpected rows`, { cause: rows.error })
        }
        return rows.data.map(toRecord)
    }

    async upsert(realm: 'ACTOR', entityId: string, facts: DurableFact[]): Promise<void> {
        if (facts.length === 0) return

        const now = new Date().toISOString()
        const rows = await Promise.all(facts.map(async fact => ({
            realm,
            entity_id: entityId,
            fact_key: fact.key,
            entity_name: fact.entityName,
            entity_type: 'learned_fact',
            fact_type: fact.factType,
            content: fact.content,
            source_turn_ids: fact.sourceTurnIds,
            embedding: await this.embed(fact.content),
            updated_at: now,
        })))

        const { error } = await this.supabase
            .from('realm_memories')
            .upsert(rows, { onConflict: 'realm,entity_id,fact_key' })

        if (error) {
            throw new MemoryClientError(`upsert ${realm}/${entityId} failed: ${error.message}`)
        }
    }
}
