import { describe, expect, it, vi } from 'vitest'
import { GenerationFailedError, GenerationTimeoutError } from '@realmchat/shared'
import { TEST_IDENTITY, createTestEngine } from '../__fixtures__'
import type { StreamEvent } from '../types'

async function collect(stream: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
    const events: StreamEvent[] = []
    for await (const event of stream) events.push(event)
    return events
}

function chunkTexts(events: StreamEvent[]): string[] {
    return events.flatMap(event => (event.type === 'chunk' ? [event.text] : []))
}

describe('TurnStream', () => {
    it('streams the same text submitTurn returns, in order', async () => {
        const streaming = createTestEngine()
        const blocking = createTestEngine()

        const { stream } = await streaming.engine.submitTurnStream({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })
        const events = await collect(stream)
        const whole = await blocking.engine.submitTurn({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })

        expect(events.map(event => event.type)).toEqual(['status', 'status', 'chunk', 'chunk', 'chunk', 'complete'])
        expect(events.slice(0, 2)).toEqual([
            { type: 'status', phase: 'resolving-memory' },
            { type: 'status', phase: 'generating' },
        ])
        expect(events.flatMap(event => (event.type === 'chunk' ? [event.index] : []))).toEqual([0, 1, 2])
        expect(chunkTexts(events).join('')).toBe(whole.response)

        const complete = events[events.length - 1]
        expect(complete).toMatchObject({ type: 'complete', text: 'Sure. Here is the answer.', partial: false })
        expect(complete.type === 'complete' && complete.result?.partial).toBe(false)
    })

    it('stops generating when the consumer walks away and keeps the partial turn', async () => {
        const { engine, generator } = createTestEngine({ generationStallMs: 10_000 })
        generator.stallAfter(1)

        const { sessionId, stream } = await engine.submitTurnStream({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })
        for await (const event of stream) {
            if (event.type === 'chunk') break
        }
        const outcome = await stream.settled

        expect(stream.isCancelled).toBe(true)
        expect(outcome).toMatchObject({ text: 'Sure. ', partial: true, error: null })
        expect(generator.aborts).toBe(1)
        const summary = await engine.getSession(sessionId)
        expect(summary.history).toHaveLength(1)
        expect(summary.history[0]).toMatchObject({ response: 'Sure. ', partial: true })
    })

    it('closes the generator once its pending chunk arrives after a cancel', async () => {
        const { engine, generator } = createTestEngine({ generationStallMs: 10_000 })
        generator.delayChunk(1, 30)

        const { stream } = await engine.submitTurnStream({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })
        for await (const event of stream) {
            if (event.type === 'chunk') break
        }
        const outcome = await stream.settled

        expect(outcome).toMatchObject({ text: 'Sure. ', partial: true, error: null })
        await vi.waitFor(() => expect(generator.streamsClosed).toBe(1))
    })

    it('reports a stall as GenerationTimeout and completes with what it had', async () => {
        const { engine, generator } = createTestEngine({ generationStallMs: 30 })
        generator.stallAfter(1)

        const { stream } = await engine.submitTurnStream({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })
        const events = await collect(stream)
        const outcome = await stream.settled

        expect(events.slice(-2)).toEqual([
            { type: 'error', kind: 'GenerationTimeout', message: 'Response generator stalled for more than 30ms' },
            expect.objectContaining({ type: 'complete', text: 'Sure. ', partial: true }),
        ])
        expect(outcome.error).toBeInstanceOf(GenerationTimeoutError)
        expect(outcome.result?.partial).toBe(true)
    })

    it('reports a mid-stream failure as GenerationFailed', async () => {
        const { engine, generator } = createTestEngine()
        generator.failStreamAfter(2)

        const { stream } = await engine.submitTurnStream({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })
        const events = await collect(stream)
        const outcome = await stream.settled

        expect(chunkTexts(events)).toEqual(['Sure. ', 'Here is '])
        expect(events.slice(-2)).toEqual([
            { type: 'error', kind: 'GenerationFailed', message: 'Response generation failed: upstream connection reset' },
            expect.objectContaining({ type: 'complete', text: 'Sure. Here is ', partial: true }),
        ])
        expect(outcome.error).toBeInstanceOf(GenerationFailedError)
    })

    it('falls back to one whole response when streaming fails before the first chunk', async () => {
        const { engine, generator } = createTestEngine()
        generator.failStreamAfter(0)

        const { sessionId, stream } = await engine.submitTurnStream({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })
        const events = await collect(stream)

        expect(events.filter(event => event.type === 'chunk')).toEqual([
            { type: 'chunk', index: 0, text: 'Sure. Here is the answer.' },
        ])
        expect(events.some(event => event.type === 'error')).toBe(false)
        expect(await stream.settled).toMatchObject({ text: 'Sure. Here is the answer.', partial: false, error: null })
        expect((await engine.getSession(sessionId)).history[0]).toMatchObject({ partial: false })
    })

    it('allows a single consumer', async () => {
        const { engine } = createTestEngine()

        const { stream } = await engine.submitTurnStream({ sessionId: 'S1', identity: TEST_IDENTITY, message: 'hello' })
        const events = await collect(stream)

        expect(() => stream[Symbol.asyncIterator]()).toThrow('A turn stream has a single consumer')
        expect(events.at(-1)?.type).toBe('complete')
    })
})
