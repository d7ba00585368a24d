import type { KeyValueStore, MirrorWrite } from '@realmchat/db'
import {
    SessionConflictError,
    SessionNotFoundError,
    describeError,
    sleep,
    type ActingIdentity,
    type Mode,
} from '@realmchat/shared'
import { initialModeState } from './mode-machine'
import { SessionSchema, type Session } from './schemas'

export interface ContextStoreOptions {
    ttlMs: number
    historyLimit: number
    /** CAS attempts per mutate before SessionConflict. */
    maxAttempts?: number
    retryDelayMs?: number
    /** Extra lifetime of the copy kept for expiry consolidation. */
    shadowGraceMs?: number
    clock?: { now(): number }
    prefix?: string
}

export type SessionMutator = (session: Session) => Session

/**
 * Sessions in the shared key-value store, one JSON document per key. Every
 * write is a compare-and-set against the exact document that was read, so
 * concurrent writers in any process serialize without a lock.
 *
 * A shadow copy outlives each session by a grace period; when the store
 * expires the session, the shadow is what expiry consolidation reads.
 */
export class ContextStore {
    private readonly maxAttempts: number
    private readonly retryDelayMs: number
    private readonly shadowGraceMs: number
    private readonly clock: { now(): number }
    private readonly prefix: string

    constructor(private readonly store: KeyValueStore, private readonly options: ContextStoreOptions) {
        this.maxAttempts = options.maxAttempts ?? 10
        this.retryDelayMs = options.retryDelayMs ?? 10
        this.shadowGraceMs = options.shadowGraceMs ?? 15 * 60 * 1000
        this.clock = options.clock ?? { now: () => Date.now() }
        this.prefix = options.prefix ?? 'chat'
    }

    async load(sessionId: string): Promise<Session | null> {
        return (await this.read(sessionId))?.session ?? null
    }

    /** Creates the session, or returns the one a concurrent caller created first. */
    async create(
        sessionId: string,
        identity: ActingIdentity,
        mode: Mode,
        metadata: Record<string, unknown> = {},
    ): Promise<Session> {
        const now = this.clock.now()
        const session: Session = {
            id: sessionId,
            identity,
            state: initialModeState(mode),
            history: [],
            memory: null,
            createdAt: now,
            lastActivityAt: now,
            metadata,
            turnSeq: 0,
            consolidatedThroughSeq: 0,
        }

        if (await this.store.compareAndSet(this.sessionKey(sessionId), null, JSON.stringify(session), this.options.ttlMs, this.shadowOf(sessionId))) {
            console.log(`[context-store] Created session ${sessionId} (${mode}) for actor ${identity.actorId}`)
            return session
        }

        const existing = await this.load(sessionId)
        if (!existing) throw new SessionConflictError(sessionId, 1)
        return existing
    }

    /**
     * Atomic read-modify-write. `fn` receives a private copy and may be called
     * more than once when another writer gets in first, so it must not have
     * side effects beyond its return value.
     */
    async mutate(sessionId: string, fn: SessionMutator): Promise<Session> {
        const key = this.sessionKey(sessionId)

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            const current = await this.read(sessionId)
            if (!current) throw new SessionNotFoundError(sessionId)

            const next = this.normalize(fn(structuredClone(current.session)))
            if (await this.store.compareAndSet(key, current.raw, JSON.stringify(next), this.options.ttlMs, this.shadowOf(sessionId))) {
                return next
            }

            await sleep(Math.round(Math.random() * this.retryDelayMs * attempt))
        }

        console.warn(`[context-store] Gave up on session ${sessionId} after ${this.maxAttempts} conflicting writes`)
        throw new SessionConflictError(sessionId, this.maxAttempts)
    }

    /** Removes the session; returns the removed copy, or null if there was none. */
    async delete(sessionId: string): Promise<Session | null> {
        const current = await this.read(sessionId)
        const removed = await this.store.delete(this.sessionKey(sessionId))
        await this.store.delete(this.shadowKey(sessionId))
        return removed && current ? current.session : null
    }

    /**
     * Calls `handler` with the last known state of each session the store
     * expires. With several subscribers only the one that claims the shadow
     * copy sees the session.
     */
    async onExpired(handler: (session: Session) => Promise<void>): Promise<() => Promise<void>> {
        const sessionPrefix = `${this.prefix}:session:`
        return this.store.onExpired(key => {
            if (!key.startsWith(sessionPrefix)) return
            const sessionId = key.slice(sessionPrefix.length)
            this.claimExpired(sessionId)
                .then(session => (session ? handler(session) : undefined))
                .catch(err => {
                    console.error(`[context-store] Expiry handling failed for session ${sessionId}: ${describeError(err)}`)
                })
        })
    }

    private async claimExpired(sessionId: string): Promise<Session | null> {
        const raw = await this.store.get(this.shadowKey(sessionId))
        if (!raw) return null
        if (!(await this.store.delete(this.shadowKey(sessionId)))) return null
        return this.parse(sessionId, raw)
    }

    private async read(sessionId: string): Promise<{ raw: string; session: Session } | null> {
        const raw = await this.store.get(this.sessionKey(sessionId))
        if (raw === null) return null
        const session = this.parse(sessionId, raw)
        return session ? { raw, session } : null
    }

    private parse(sessionId: string, raw: string): Session | null {
        let json: unknown
        try {
            json = JSON.parse(raw)
        } catch (err) {
            console.warn(`[context-store] Session ${sessionId} is not valid JSON: ${describeError(err)}`)
            return null
        }
        const parsed = SessionSchema.safeParse(json)
        if (!parsed.success) {
            console.warn(`[context-store] Session ${sessionId} failed validation: ${parsed.error.message}`)
            return null
        }
        return parsed.data
    }

    // Outcomes are kept only while the turn that produced them is in history
    private normalize(session: Session): Session {
        const overflow = session.history.length - this.options.historyLimit
        const history = overflow > 0 ? session.history.slice(overflow) : session.history
        const turnIds = new Set(history.map(turn => turn.id))
        return {
            ...session,
            state: session.state.mode === 'agent'
                ? { mode: 'agent', outcomes: session.state.outcomes.filter(o => turnIds.has(o.turnId)) }
                : session.state,
            history,
            lastActivityAt: this.clock.now(),
        }
    }

    // The shadow lands in the same atomic write as the session it copies
    private shadowOf(sessionId: string): MirrorWrite {
        return { key: this.shadowKey(sessionId), ttlMs: this.options.ttlMs + this.shadowGraceMs }
    }

    private sessionKey(sessionId: string): string {
        return `${this.prefix}:session:${sessionId}`
    }

    private shadowKey(sessionId: string): string {
        return `${this.prefix}:session-shadow:${sessionId}`
    }
}
