import { beforeEach, describe, expect, it, vi } from 'vitest'
import { InMemoryKeyValueStore } from '@realmchat/db/fixtures'
import { ConsolidationFailedPermanentError, type ActingIdentity } from '@realmchat/shared'
import { FakeMemoryClient } from '../__fixtures__'
import { ConsolidationPipeline, consolidationJobId, type ConsolidationRequest } from '../consolidation-pipeline'
import { ConsolidationProcessor } from '../consolidation-processor'
import { InProcessConsolidationQueue } from '../consolidation-queue'
import { HeuristicFactExtractor, parseExtraction } from '../fact-extractor'
import { HierarchicalMemorySearcher } from '../hierarchical-searcher'
import { MemorySearchCache } from '../search-cache'

const identity: ActingIdentity = {
    clientId: 'client-1',
    actorId: 'actor-1',
    actorType: 'assistant',
    actorClassId: 'class-support',
    skillModuleIds: [],
}

function request(overrides: Partial<ConsolidationRequest> = {}): ConsolidationRequest {
    return {
        sessionId: 'session-1',
        identity,
        mode: 'tutor',
        trigger: 'window',
        messages: [
            { turnId: 't1', role: 'user', content: 'Hi, my name is Dana. I prefer short bullet answers.', ts: 1 },
            { turnId: 't1', role: 'assistant', content: 'Nice to meet you, Dana.', ts: 2 },
            { turnId: 't2', role: 'user', content: 'I am working on the billing migration.', ts: 3 },
            { turnId: 't2', role: 'assistant', content: 'Good luck with it.', ts: 4 },
        ],
        outcomes: [],
        learning: { topic: 'Photosynthesis', level: 3 },
        ...overrides,
    }
}

function job(overrides: Partial<ConsolidationRequest> = {}) {
    const req = request(overrides)
    return { ...req, id: consolidationJobId(req), submittedAt: '2026-01-01T00:00:00.000Z' }
}

describe('HeuristicFactExtractor', () => {
    it('extracts explicit statements and learning progress under stable keys', async () => {
        const facts = await new HeuristicFactExtractor().extract(job())

        expect(facts.map(f => f.key)).toEqual([
            'learning-photosynthesis::learning-progress',
            'user-name::identity',
            'user-preference-short-bullet-answers::preference',
            'user-work-context::context',
        ])
        expect(facts[1]).toEqual({
            key: 'user-name::identity',
            entityName: 'user name',
            factType: 'identity',
            content: "The user's name is Dana.",
            sourceTurnIds: ['t1'],
        })
        expect(facts[0].sourceTurnIds).toEqual(['t1', 't2'])
    })

    it('turns task outcomes into facts', async () => {
        const facts = await new HeuristicFactExtractor().extract(job({
            mode: 'agent',
            messages: [],
            learning: null,
            outcomes: [{
                id: 'o1',
                turnId: 't9',
                taskType: 'procedure',
                action: 'reset',
                request: 'How do I reset my VPN token?',
                summary: 'Walked the user through the VPN token reset procedure.',
                proceduresUsed: ['VPN token reset'],
                policiesApplied: [],
                ts: 9,
            }],
        }))

        expect(facts).toEqual([{
            key: 'procedure-task-how-do-i-reset-my-vpn-token::task-outcome',
            entityName: 'procedure task How do I reset my VPN token?',
            factType: 'task-outcome',
            content: 'Walked the user through the VPN token reset procedure.',
            sourceTurnIds: ['t9'],
        }])
    })
})

describe('parseExtraction', () => {
    it('accepts the wrapped and the bare array forms', () => {
        const wrapped = parseExtraction('{"facts":[{"entity":"Preferred format","type":"Preference","content":"Tables"}]}', ['t2', 't1'])
        const bare = parseExtraction('[{"entity":"Preferred format","type":"Preference","content":"Tables"}]', ['t2', 't1'])

        expect(wrapped).toEqual([{
            key: 'preferred-format::preference',
            entityName: 'Preferred format',
            factType: 'preference',
            content: 'Tables',
            sourceTurnIds: ['t1', 't2'],
        }])
        expect(bare).toEqual(wrapped)
    })

    it('rejects output that is not JSON', () => {
        expect(() => parseExtraction('Sure! Here are the facts', [])).toThrow('Extraction output is not JSON')
    })
})

describe('consolidation pipeline', () => {
    let memory: FakeMemoryClient
    let delays: number[]

    beforeEach(() => {
        memory = new FakeMemoryClient()
        delays = []
    })

    function build(attempts: number, onPermanentFailure = vi.fn()) {
        const searcher = new HierarchicalMemorySearcher(memory, { cache: new MemorySearchCache(new InMemoryKeyValueStore(), 60_000) })
        const processor = new ConsolidationProcessor(new HeuristicFactExtractor(), memory, searcher, { stepTimeoutMs: 30 })
        const queue = new InProcessConsolidationQueue(processor, { attempts, backoffMs: 100 }, {
            onPermanentFailure,
            delay: async ms => { delays.push(ms) },
        })
        const pipeline = new ConsolidationPipeline(queue, () => new Date('2026-01-01T00:00:00Z'))
        return { searcher, queue, pipeline, onPermanentFailure }
    }

    async function settle(pipeline: ConsolidationPipeline, queue: InProcessConsolidationQueue) {
        await pipeline.flush()
        await queue.drain()
    }

    it('writes facts to the actor realm and drops the actor\'s cached searches', async () => {
        const { searcher, queue, pipeline } = build(3)
        const before = await searcher.resolve('who am I talking to', identity)
        expect(before.entries).toEqual([])

        const jobId = pipeline.submit(request())
        await settle(pipeline, queue)

        expect(jobId).not.toBeNull()
        expect(await pipeline.getStatus(jobId ?? '')).toMatchObject({ status: 'succeeded', attempts: 1, factsUpserted: 4 })
        expect(memory.factsFor('actor-1')).toHaveLength(4)

        const after = await searcher.resolve('who am I talking to', identity)
        expect(after.cacheHit).toBe(false)
        expect(after.entries.map(e => e.semanticKey)).toContain('user-name::identity')
    })

    it('is idempotent for the same slice', async () => {
        const { queue, pipeline } = build(3)

        const first = pipeline.submit(request())
        const second = pipeline.submit(request({ trigger: 'session-deleted' }))
        await settle(pipeline, queue)

        expect(second).toBe(first)
        expect(memory.upsertCalls).toBe(1)

        // Even a second run of the same slice rewrites the same keys
        await new ConsolidationProcessor(new HeuristicFactExtractor(), memory).process(job())
        expect(memory.factsFor('actor-1')).toHaveLength(4)
    })

    it('skips slices with nothing to consolidate', () => {
        const { pipeline } = build(3)
        expect(pipeline.submit(request({ messages: [], learning: null }))).toBeNull()
    })

    it('retries with exponential backoff until the write succeeds', async () => {
        memory.failNextUpserts(2)
        const { queue, pipeline, onPermanentFailure } = build(3)

        const jobId = pipeline.submit(request()) ?? ''
        await settle(pipeline, queue)

        expect(delays).toEqual([100, 200])
        expect(await queue.getStatus(jobId)).toMatchObject({ status: 'succeeded', attempts: 3 })
        expect(onPermanentFailure).not.toHaveBeenCalled()
    })

    it('fails an attempt whose write never answers and retries it', async () => {
        memory.hangNextUpserts(1)
        const { queue, pipeline, onPermanentFailure } = build(3)

        const jobId = pipeline.submit(request()) ?? ''
        await settle(pipeline, queue)

        expect(delays).toEqual([100])
        expect(await queue.getStatus(jobId)).toMatchObject({ status: 'succeeded', attempts: 2, factsUpserted: 4 })
        expect(memory.upsertCalls).toBe(2)
        expect(onPermanentFailure).not.toHaveBeenCalled()
    })

    it('reports failed-permanent once the attempts are exhausted', async () => {
        memory.failNextUpserts(10)
        const { queue, pipeline, onPermanentFailure } = build(3)

        const jobId = pipeline.submit(request()) ?? ''
        await settle(pipeline, queue)

        expect(await queue.getStatus(jobId)).toMatchObject({
            status: 'failed-permanent',
            attempts: 3,
            lastError: 'memory store write failed',
        })
        expect(onPermanentFailure).toHaveBeenCalledTimes(1)
        const [failedJob, error] = onPermanentFailure.mock.calls[0]
        expect(failedJob).toMatchObject({ id: jobId, sessionId: 'session-1' })
        expect(error).toBeInstanceOf(ConsolidationFailedPermanentError)
        expect(memory.factsFor('actor-1')).toEqual([])
    })

    it('logs and swallows enqueue failures', async () => {
        const { queue, pipeline } = build(1)
        await queue.close()
        const errors = vi.spyOn(console, 'error').mockImplementation(() => { })

        const jobId = pipeline.submit(request())
        await pipeline.flush()

        expect(jobId).toMatch(/^consolidate-[0-9a-f]{32}$/)
        expect(errors).toHaveBeenCalledWith(expect.stringContaining(`Failed to enqueue ${jobId}`), expect.stringContaining('"sessionId":"session-1"'))
        errors.mockRestore()
    })
})
