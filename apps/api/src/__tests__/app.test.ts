import { describe, expect, it } from 'vitest'
import { TEST_IDENTITY, createTestEngine } from '@realmchat/conversation/fixtures'
import { buildApp } from '../app'

const API_KEY = 'test-secret'
const headers = { 'x-api-key': API_KEY }

function setup(options: Parameters<typeof createTestEngine>[0] = {}) {
    const harness = createTestEngine(options)
    const app = buildApp({ engine: harness.engine, consolidation: harness.consolidation }, { apiKey: API_KEY })
    return { app, ...harness }
}

describe('api', () => {
    it('serves /health without a key', async () => {
        const { app } = setup()
        const res = await app.inject({ method: 'GET', url: '/health' })
        expect(res.statusCode).toBe(200)
        expect(res.json()).toMatchObject({ status: 'ok', service: 'api' })
    })

    it('rejects requests without the api key', async () => {
        const { app } = setup()
        const res = await app.inject({ method: 'GET', url: '/chat/sessions/S1' })
        expect(res.statusCode).toBe(401)
        expect(res.json()).toEqual({ error: 'Unauthorized' })
    })

    it('answers a turn as JSON', async () => {
        const { app } = setup()
        const res = await app.inject({
            method: 'POST',
            url: '/chat/turns',
            headers,
            payload: { sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' },
        })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toMatchObject({
            sessionId: 'S1',
            mode: 'agent',
            response: 'Sure. Here is the answer.',
            partial: false,
            degraded: false,
        })
    })

    it('validates the request body', async () => {
        const { app } = setup()
        const res = await app.inject({
            method: 'POST',
            url: '/chat/turns',
            headers,
            payload: { identity: TEST_IDENTITY, message: '', contextDepth: 7 },
        })

        expect(res.statusCode).toBe(400)
        expect(Object.keys(res.json().error.fieldErrors).sort()).toEqual(['contextDepth', 'message'])
    })

    it('streams a turn as server-sent events', async () => {
        const { app, engine } = setup()
        const res = await app.inject({
            method: 'POST',
            url: '/chat/turns',
            headers,
            payload: { sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello', stream: true },
        })

        expect(res.statusCode).toBe(200)
        expect(res.headers['content-type']).toBe('text/event-stream')
        expect(res.headers['x-session-id']).toBe('S1')
        const blocks = res.payload.split('\n\n').filter(block => block.length > 0)
        expect(blocks.map(block => block.split('\n')[0])).toEqual([
            'event: status', 'event: status', 'event: chunk', 'event: chunk', 'event: chunk', 'event: complete',
        ])
        expect(blocks[2]).toBe('event: chunk\ndata: {"type":"chunk","index":0,"text":"Sure. "}')
        expect((await engine.getSession('S1')).turnCount).toBe(1)
    })

    it('maps engine errors to status codes', async () => {
        const { app, generator } = setup({ generationStallMs: 30 })

        const missing = await app.inject({ method: 'GET', url: '/chat/sessions/nope', headers })
        expect(missing.statusCode).toBe(404)
        expect(missing.json()).toEqual({ error: 'Session nope not found', kind: 'SessionNotFound', retryable: false })

        generator.stallAfter(0)
        const stalled = await app.inject({
            method: 'POST',
            url: '/chat/turns',
            headers,
            payload: { sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' },
        })
        expect(stalled.statusCode).toBe(504)
        expect(stalled.json()).toMatchObject({ kind: 'GenerationTimeout', retryable: true })
    })

    it('switches mode, reads, deletes, and reports the consolidation job', async () => {
        const { app, settle } = setup()
        await app.inject({
            method: 'POST',
            url: '/chat/turns',
            headers,
            payload: { sessionId: 'S1', identity: TEST_IDENTITY, message: 'My name is Sam.' },
        })

        const switched = await app.inject({ method: 'POST', url: '/chat/sessions/S1/mode', headers, payload: { mode: 'tutor' } })
        expect(switched.json()).toMatchObject({ previousMode: 'agent', newMode: 'tutor', consolidationJobId: null })

        const session = await app.inject({ method: 'GET', url: '/chat/sessions/S1', headers })
        expect(session.json()).toMatchObject({ sessionId: 'S1', mode: 'tutor', turnCount: 1 })

        const deleted = await app.inject({ method: 'DELETE', url: '/chat/sessions/S1', headers })
        const { consolidationJobId } = deleted.json()
        expect(consolidationJobId).toMatch(/^consolidate-/)
        await settle()

        const job = await app.inject({ method: 'GET', url: `/consolidation/jobs/${consolidationJobId}`, headers })
        expect(job.json()).toMatchObject({ status: 'succeeded', attempts: 1, factsUpserted: 1 })
        expect((await app.inject({ method: 'GET', url: '/chat/sessions/S1', headers })).statusCode).toBe(404)
    })
})
