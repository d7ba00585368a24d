import { withTimeout } from '@realmchat/shared'
import type { FactExtractor } from './fact-extractor'
import type { ConsolidationJob, MemoryClient } from './types'

export interface ActorCacheInvalidator {
    invalidateActor(actorId: string): Promise<void>
}

export interface ConsolidationProcessorOptions {
    /** Bound on each extraction and each memory write; a timeout fails the attempt. */
    stepTimeoutMs?: number
}

/**
 * One consolidation attempt: extract durable facts from the job's slice,
 * upsert them into the actor's realm, then drop the actor's cached searches.
 * Facts are keyed, so re-running the same job rewrites the same rows.
 */
export class ConsolidationProcessor {
    private readonly stepTimeoutMs: number

    constructor(
        private readonly extractor: FactExtractor,
        private readonly memory: MemoryClient,
        private readonly invalidator: ActorCacheInvalidator | null = null,
        options: ConsolidationProcessorOptions = {},
    ) {
        this.stepTimeoutMs = options.stepTimeoutMs ?? 30_000
    }

    async process(job: ConsolidationJob): Promise<{ factsUpserted: number }> {
        const facts = await withTimeout(this.extractor.extract(job), this.stepTimeoutMs, 'fact extraction')
        if (facts.length === 0) {
            console.log(`[consolidation] Job ${job.id}: nothing durable in ${job.messages.length} messages`)
            return { factsUpserted: 0 }
        }

        await withTimeout(this.memory.upsert('ACTOR', job.identity.actorId, facts), this.stepTimeoutMs, 'memory upsert')
        await this.invalidator?.invalidateActor(job.identity.actorId)

        console.log(`[consolidation] Job ${job.id}: ${facts.length} facts upserted for actor ${job.identity.actorId} (${job.trigger})`)
        return { factsUpserted: facts.length }
    }
}
