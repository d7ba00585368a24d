import { createHash } from 'node:crypto'
import { describeError } from '@realmchat/shared'
import type { ConsolidationQueue } from './consolidation-queue'
import type { ConsolidationJob, ConsolidationRecord } from './types'

export type ConsolidationRequest = Omit<ConsolidationJob, 'id' | 'submittedAt'>

/**
 * Job ids derive from the slice, not the moment of submission, so handing the
 * same slice over twice (a retried switch, an expiry racing a delete) lands on
 * the same job.
 */
export function consolidationJobId(request: ConsolidationRequest): string {
    const payload = JSON.stringify({
        s: request.sessionId,
        a: request.identity.actorId,
        t: request.messages.map(m => `${m.turnId}:${m.role}`),
        o: request.outcomes.map(o => o.id),
        l: request.learning,
    })
    return `consolidate-${createHash('sha256').update(payload).digest('hex').slice(0, 32)}`
}

export class ConsolidationPipeline {
    private readonly inFlight = new Set<Promise<void>>()

    constructor(
        private readonly queue: ConsolidationQueue,
        private readonly now: () => Date = () => new Date(),
    ) { }

    /**
     * Hands a slice to the queue without waiting for it. Returns the job id, or
     * null when the slice holds nothing worth consolidating. Enqueue failures are
     * logged with the full slice and never reach the caller.
     */
    submit(request: ConsolidationRequest): string | null {
        if (request.messages.length === 0 && request.outcomes.length === 0 && !request.learning?.topic) {
            return null
        }

        const job: ConsolidationJob = {
            ...request,
            id: consolidationJobId(request),
            submittedAt: this.now().toISOString(),
        }

        const pending = this.queue.enqueue(job)
            .then(() => {
                console.log(`[consolidation] Queued ${job.id} for session ${job.sessionId} (${job.trigger}, ${job.messages.length} messages)`)
            })
            .catch(err => {
                console.error(`[consolidation] Failed to enqueue ${job.id}: ${describeError(err)}`, JSON.stringify(job))
            })
            .finally(() => this.inFlight.delete(pending))
        this.inFlight.add(pending)

        return job.id
    }

    getStatus(jobId: string): Promise<ConsolidationRecord | null> {
        return this.queue.getStatus(jobId)
    }

    /** Waits for every submission made so far to reach the queue. */
    async flush(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight])
        }
    }
}
