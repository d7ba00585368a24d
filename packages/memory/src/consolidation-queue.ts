import { Queue, Worker, type Job } from 'bullmq'
import type { Redis } from 'ioredis'
import {
    ConsolidationFailedPermanentError,
    describeError,
    exponentialBackoff,
    sleep,
} from '@realmchat/shared'
import type { ConsolidationProcessor } from './consolidation-processor'
import type { ConsolidationJob, ConsolidationRecord } from './types'

export const CONSOLIDATION_QUEUE = 'memory-consolidation'

export interface ConsolidationQueue {
    /** Idempotent per job id: a job already known to the queue is not added twice. */
    enqueue(job: ConsolidationJob): Promise<void>
    getStatus(jobId: string): Promise<ConsolidationRecord | null>
    close(): Promise<void>
}

export type PermanentFailureHandler = (job: ConsolidationJob, error: ConsolidationFailedPermanentError) => void

export interface RetryPolicy {
    attempts: number
    backoffMs: number
}

interface ConsolidationResult {
    factsUpserted: number
}

function reportPermanentFailure(job: ConsolidationJob, attempts: number, cause: unknown, handler?: PermanentFailureHandler): void {
    const error = new ConsolidationFailedPermanentError(job.id, attempts, cause)
    // Full context so the slice can be replayed by hand
    console.error(`[consolidation] ${error.message}`, JSON.stringify({
        jobId: job.id,
        sessionId: job.sessionId,
        actorId: job.identity.actorId,
        trigger: job.trigger,
        attempts,
        error: describeError(cause),
        job,
    }))
    handler?.(job, error)
}

// ── BullMQ ───────────────────────────────────────────────────────────────────

export class BullConsolidationQueue implements ConsolidationQueue {
    private readonly queue: Queue<ConsolidationJob, ConsolidationResult>

    constructor(connection: Redis, private readonly retry: RetryPolicy, name = CONSOLIDATION_QUEUE) {
        this.queue = new Queue<ConsolidationJob, ConsolidationResult>(name, { connection, skipStalledCheck: true })
    }

    async enqueue(job: ConsolidationJob): Promise<void> {
        await this.queue.add('consolidate', job, {
            jobId: job.id,
            attempts: this.retry.attempts,
            backoff: { type: 'exponential', delay: this.retry.backoffMs },
            removeOnComplete: { age: 24 * 3600 },
            removeOnFail: { age: 7 * 24 * 3600 },
        })
    }

    async getStatus(jobId: string): Promise<ConsolidationRecord | null> {
        const job = await this.queue.getJob(jobId)
        if (!job) return null

        // Retries sit in 'delayed'; 'failed' is only reached once attempts run out
        const state = await job.getState()
        return {
            job: job.data,
            status: state === 'completed' ? 'succeeded' : state === 'failed' ? 'failed-permanent' : 'pending',
            attempts: job.attemptsMade,
            ...(job.failedReason ? { lastError: job.failedReason } : {}),
            ...(state === 'completed' && job.returnvalue ? { factsUpserted: job.returnvalue.factsUpserted } : {}),
        }
    }

    async close(): Promise<void> {
        await this.queue.close()
    }
}

export function startConsolidationWorker(
    connection: Redis,
    processor: ConsolidationProcessor,
    options: { concurrency: number; onPermanentFailure?: PermanentFailureHandler; name?: string },
): Worker<ConsolidationJob, ConsolidationResult> {
    const worker = new Worker<ConsolidationJob, ConsolidationResult>(
        options.name ?? CONSOLIDATION_QUEUE,
        async (job: Job<ConsolidationJob, ConsolidationResult>) => processor.process(job.data),
        { connection, concurrency: options.concurrency },
    )

    worker.on('failed', (job, err) => {
        if (!job) return
        const attempts = job.opts.attempts ?? 1
        if (job.attemptsMade >= attempts) {
            reportPermanentFailure(job.data, job.attemptsMade, err, options.onPermanentFailure)
        } else {
            console.warn(`[consolidation] Job ${job.data.id} attempt ${job.attemptsMade}/${attempts} failed, retrying: ${err.message}`)
        }
    })

    worker.on('error', err => {
        console.error('[consolidation] Worker error:', err.message)
    })

    return worker
}

// ── In-process ───────────────────────────────────────────────────────────────

/**
 * Same retry contract as the BullMQ queue, run on the local event loop.
 * Used by single-process deployments and tests.
 */
export class InProcessConsolidationQueue implements ConsolidationQueue {
    private readonly records = new Map<string, ConsolidationRecord>()
    private readonly running = new Set<Promise<void>>()
    private closed = false

    constructor(
        private readonly processor: ConsolidationProcessor,
        private readonly retry: RetryPolicy,
        private readonly options: { onPermanentFailure?: PermanentFailureHandler; delay?: (ms: number) => Promise<void> } = {},
    ) { }

    async enqueue(job: ConsolidationJob): Promise<void> {
        if (this.closed) throw new Error('Consolidation queue is closed')
        if (this.records.has(job.id)) return

        this.records.set(job.id, { job, status: 'pending', attempts: 0 })
        const run = this.run(job).finally(() => this.running.delete(run))
        this.running.add(run)
    }

    async getStatus(jobId: string): Promise<ConsolidationRecord | null> {
        const record = this.records.get(jobId)
        return record ? { ...record } : null
    }

    /** Resolves once every accepted job has succeeded or failed permanently. */
    async drain(): Promise<void> {
        while (this.running.size > 0) {
            await Promise.all([...this.running])
        }
    }

    async close(): Promise<void> {
        this.closed = true
        await this.drain()
    }

    private async run(job: ConsolidationJob): Promise<void> {
        const delay = this.options.delay ?? sleep
        for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
            try {
                const { factsUpserted } = await this.processor.process(job)
                this.records.set(job.id, { job, status: 'succeeded', attempts: attempt, factsUpserted })
                return
            } catch (err) {
                const lastError = describeError(err)
                if (attempt >= this.retry.attempts) {
                    this.records.set(job.id, { job, status: 'failed-permanent', attempts: attempt, lastError })
                    reportPermanentFailure(job, attempt, err, this.options.onPermanentFailure)
                    return
                }
                this.records.set(job.id, { job, status: 'pending', attempts: attempt, lastError })
                console.warn(`[consolidation] Job ${job.id} attempt ${attempt}/${this.retry.attempts} failed, retrying: ${lastError}`)
                await delay(exponentialBackoff(attempt, this.retry.backoffMs))
            }
        }
    }
}
