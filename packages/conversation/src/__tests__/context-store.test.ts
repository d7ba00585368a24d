import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { MirrorWrite } from '@realmchat/db'
import { InMemoryKeyValueStore, ManualClock } from '@realmchat/db/fixtures'
import { SessionConflictError, SessionNotFoundError, sleep } from '@realmchat/shared'
import { ContextStore } from '../context-store'
import { TEST_IDENTITY } from '../__fixtures__'
import type { Session } from '../schemas'

const TTL = 60_000

class ContestedStore extends InMemoryKeyValueStore {
    loseEveryRace = false
    /** The next successful write reports back this much later. */
    slowAckMs = 0

    async compareAndSet(key: string, expected: string | null, value: string, ttlMs: number, mirror?: MirrorWrite): Promise<boolean> {
        if (this.loseEveryRace) return false
        const written = await super.compareAndSet(key, expected, value, ttlMs, mirror)
        if (written && this.slowAckMs > 0) {
            const delay = this.slowAckMs
            this.slowAckMs = 0
            await sleep(delay)
        }
        return written
    }
}

function withTurn(session: Session, text: string): Session {
    const seq = session.turnSeq + 1
    return {
        ...session,
        turnSeq: seq,
        history: [...session.history, {
            id: `turn-${seq}`,
            seq,
            mode: 'agent',
            userMessage: text,
            response: 'ok',
            partial: false,
            degraded: false,
            memoryEntryIds: [],
            ts: 0,
        }],
    }
}

describe('ContextStore', () => {
    let clock: ManualClock
    let kv: ContestedStore
    let store: ContextStore

    beforeEach(() => {
        clock = new ManualClock()
        kv = new ContestedStore(clock)
        store = new ContextStore(kv, { ttlMs: TTL, historyLimit: 50, maxAttempts: 100, retryDelayMs: 2, clock })
    })

    it('creates a session once and loads it back', async () => {
        const [a, b] = await Promise.all([
            store.create('S1', TEST_IDENTITY, 'tutor'),
            store.create('S1', { ...TEST_IDENTITY, actorId: 'other' }, 'agent'),
        ])

        expect(b).toEqual(a)
        expect(await store.load('S1')).toEqual(a)
        expect(a.state).toEqual({
            mode: 'tutor',
            learning: { topic: null, level: 3, priorTopics: [], suggestedTopics: [] },
        })
    })

    it('returns null for an unknown session', async () => {
        expect(await store.load('missing')).toBeNull()
    })

    it('applies every one of N concurrent mutations exactly once', async () => {
        await store.create('S1', TEST_IDENTITY, 'agent')

        await Promise.all(Array.from({ length: 20 }, (_, i) =>
            store.mutate('S1', session => withTurn(session, `message ${i}`))))

        const session = await store.load('S1')
        expect(session?.history).toHaveLength(20)
        expect(session?.history.map(turn => turn.seq)).toEqual(Array.from({ length: 20 }, (_, i) => i + 1))
        expect(new Set(session?.history.map(turn => turn.userMessage)).size).toBe(20)
        expect(kv.casFailures).toBeGreaterThan(0)
    })

    it('keeps outcomes only for turns still in history', async () => {
        store = new ContextStore(kv, { ttlMs: TTL, historyLimit: 3, clock })
        await store.create('S1', TEST_IDENTITY, 'agent')

        for (const text of ['one', 'two', 'three', 'four', 'five']) {
            await store.mutate('S1', session => {
                const next = withTurn(session, text)
                if (next.state.mode !== 'agent') return next
                const turnId = `turn-${next.turnSeq}`
                return {
                    ...next,
                    state: {
                        mode: 'agent',
                        outcomes: [...next.state.outcomes, {
                            id: `${turnId}:outcome`,
                            turnId,
                            taskType: 'procedure',
                            action: null,
                            request: text,
                            summary: `Handled ${text}.`,
                            proceduresUsed: [],
                            policiesApplied: [],
                            ts: 0,
                        }],
                    },
                }
            })
        }

        const session = await store.load('S1')
        expect(session?.state.mode === 'agent' && session.state.outcomes.map(o => o.turnId)).toEqual(['turn-3', 'turn-4', 'turn-5'])
    })

    it('keeps only the most recent turns', async () => {
        store = new ContextStore(kv, { ttlMs: TTL, historyLimit: 3, clock })
        await store.create('S1', TEST_IDENTITY, 'agent')

        for (const text of ['one', 'two', 'three', 'four', 'five']) {
            await store.mutate('S1', session => withTurn(session, text))
        }

        const session = await store.load('S1')
        expect(session?.history.map(turn => turn.userMessage)).toEqual(['three', 'four', 'five'])
        expect(session?.turnSeq).toBe(5)
    })

    it('expires an idle session', async () => {
        await store.create('S1', TEST_IDENTITY, 'agent')
        clock.advance(TTL)

        expect(await store.load('S1')).toBeNull()
        await expect(store.mutate('S1', s => s)).rejects.toBeInstanceOf(SessionNotFoundError)
    })

    it('refreshes the TTL and activity time on every mutation', async () => {
        await store.create('S1', TEST_IDENTITY, 'agent')
        clock.advance(TTL - 1)
        await store.mutate('S1', session => withTurn(session, 'still here'))
        clock.advance(TTL - 1)

        const session = await store.load('S1')
        expect(session?.lastActivityAt).toBe(Date.UTC(2026, 0, 1) + TTL - 1)
    })

    it('gives up with SessionConflict when every write loses', async () => {
        store = new ContextStore(kv, { ttlMs: TTL, historyLimit: 50, maxAttempts: 3, retryDelayMs: 1, clock })
        await store.create('S1', TEST_IDENTITY, 'agent')
        kv.loseEveryRace = true

        const error = await store.mutate('S1', s => s).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(SessionConflictError)
        expect(error).toMatchObject({ kind: 'SessionConflict', retryable: true })
    })

    it('deletes a session and hands back what was removed', async () => {
        await store.create('S1', TEST_IDENTITY, 'agent')
        await store.mutate('S1', session => withTurn(session, 'bye'))

        const removed = await store.delete('S1')

        expect(removed?.history.map(turn => turn.userMessage)).toEqual(['bye'])
        expect(await store.load('S1')).toBeNull()
        expect(await store.delete('S1')).toBeNull()
        expect(kv.keys()).toEqual([])
    })

    it('reports expired sessions once with their last state', async () => {
        const expired: Session[] = []
        await store.onExpired(async session => {
            expired.push(session)
        })
        await store.create('S1', TEST_IDENTITY, 'agent')
        await store.mutate('S1', session => withTurn(session, 'last words'))

        clock.advance(TTL)
        kv.sweep()
        kv.sweep()

        await vi.waitFor(() => expect(expired).toHaveLength(1))
        expect(expired[0].history.map(turn => turn.userMessage)).toEqual(['last words'])
    })

    it('leaves the newest copy for expiry when writers finish out of order', async () => {
        const expired: Session[] = []
        await store.onExpired(async session => {
            expired.push(session)
        })
        await store.create('S1', TEST_IDENTITY, 'agent')

        kv.slowAckMs = 30
        const first = store.mutate('S1', session => withTurn(session, 'first'))
        await vi.waitFor(() => expect(kv.casCalls).toBe(2))
        await store.mutate('S1', session => withTurn(session, 'second'))
        await first

        clock.advance(TTL)
        kv.sweep()

        await vi.waitFor(() => expect(expired).toHaveLength(1))
        expect(expired[0].history.map(turn => turn.userMessage)).toEqual(['first', 'second'])
    })
})
