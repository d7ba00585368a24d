import type { Realm } from '@realmchat/shared'
import type { DurableFact, MemoryClient, MemoryRecord, MemorySearchRequest } from '../types'

type RealmBehaviour =
    | { kind: 'ok' }
    | { kind: 'fail'; error: Error }
    | { kind: 'hang' }

/**
 * In-process long-term memory. Realms can be made to fail or hang so the
 * searcher's degradation paths can be driven from tests.
 */
export class FakeMemoryClient implements MemoryClient {
    readonly searches: Array<Omit<MemorySearchRequest, 'signal'>> = []
    readonly facts = new Map<string, DurableFact>()
    upsertCalls = 0

    private readonly records = new Map<string, MemoryRecord[]>()
    private readonly behaviour = new Map<Realm, RealmBehaviour>()
    private pendingUpsertFailures = 0
    private pendingUpsertHangs = 0

    seed(realm: Realm, entityId: string, records: MemoryRecord[]): this {
        const key = `${realm}:${entityId}`
        this.records.set(key, [...(this.records.get(key) ?? []), ...records])
        return this
    }

    fail(realm: Realm, error = new Error(`${realm} store unreachable`)): this {
        this.behaviour.set(realm, { kind: 'fail', error })
        return this
    }

    /** Searches against `realm` never answer; they only end when aborted. */
    hang(realm: Realm): this {
        this.behaviour.set(realm, { kind: 'hang' })
        return this
    }

    heal(realm: Realm): this {
        this.behaviour.delete(realm)
        return this
    }

    failNextUpserts(count: number): this {
        this.pendingUpsertFailures = count
        return this
    }

    /** The next `count` upserts never settle. */
    hangNextUpserts(count: number): this {
        this.pendingUpsertHangs = count
        return this
    }

    async search(request: MemorySearchRequest): Promise<MemoryRecord[]> {
        const { signal, ...logged } = request
        this.searches.push(logged)

        const behaviour = this.behaviour.get(request.realm) ?? { kind: 'ok' }
        if (behaviour.kind === 'fail') throw behaviour.error
        if (behaviour.kind === 'hang') {
            return new Promise<MemoryRecord[]>((_, reject) => {
                signal?.addEventListener('abort', () => {
                    const aborted = new Error(`${request.realm} search aborted`)
                    aborted.name = 'AbortError'
                    reject(aborted)
                }, { once: true })
            })
        }

        const seeded = this.records.get(`${request.realm}:${request.entityId}`) ?? []
        const learned = request.realm === 'ACTOR' ? this.learnedRecords(request.entityId) : []
        return [...seeded, ...learned]
            .sort((a, b) => b.score - a.score)
            .slice(0, request.maxResults)
    }

    async upsert(realm: 'ACTOR', entityId: string, facts: DurableFact[]): Promise<void> {
        this.upsertCalls++
        if (this.pendingUpsertHangs > 0) {
            this.pendingUpsertHangs--
            return new Promise<void>(() => { })
        }
        if (this.pendingUpsertFailures > 0) {
            this.pendingUpsertFailures--
            throw new Error('memory store write failed')
        }
        for (const fact of facts) {
            this.facts.set(`${realm}:${entityId}:${fact.key}`, fact)
        }
    }

    factsFor(actorId: string): DurableFact[] {
        return [...this.facts.entries()]
            .filter(([key]) => key.startsWith(`ACTOR:${actorId}:`))
            .map(([, fact]) => fact)
    }

    private learnedRecords(actorId: string): MemoryRecord[] {
        return this.factsFor(actorId).map(fact => ({
            id: `fact:${fact.key}`,
            entityName: fact.entityName,
            entityType: 'learned_fact',
            factType: fact.factType,
            content: fact.content,
            score: 0.5,
        }))
    }
}
