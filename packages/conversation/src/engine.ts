import { randomUUID } from 'node:crypto'
import {
    GenerationFailedError,
    GenerationTimeoutError,
    SessionNotFoundError,
    TimeoutError,
    isEngineError,
    withTimeout,
    type Mode,
} from '@realmchat/shared'
import type { ConsolidationPipeline, ConsolidationRequest, HierarchicalMemorySearcher } from '@realmchat/memory'
import type { ContextStore } from './context-store'
import { applyEvents, transition, type ModeEffect } from './mode-machine'
import { AgentProcessor } from './processors/agent-processor'
import type { ModeProcessor, TurnPlan } from './processors/processor'
import { TutorProcessor } from './processors/tutor-processor'
import type { ConversationTurn, Session } from './schemas'
import { TurnStream } from './turn-stream'
import {
    toMemoryMetadata,
    type ResponseGenerator,
    type SessionSummary,
    type SwitchModeResult,
    type TurnInput,
    type TurnResult,
} from './types'

export interface ConversationEngineDeps {
    store: ContextStore
    searcher: HierarchicalMemorySearcher
    generator: ResponseGenerator
    consolidation: ConsolidationPipeline
}

export interface ConversationEngineOptions {
    /** Longest the generator may go without producing output. */
    generationStallMs: number
    /** Turns between window-triggered consolidations. */
    consolidationWindow: number
    defaultMode?: Mode
    defaultContextDepth?: number
    clock?: { now(): number }
}

interface PlannedTurn {
    mode: Mode
    plan: TurnPlan
}

export class ConversationEngine {
    private readonly processors: Record<Mode, ModeProcessor>
    private readonly clock: { now(): number }

    constructor(private readonly deps: ConversationEngineDeps, private readonly options: ConversationEngineOptions) {
        this.processors = {
            tutor: new TutorProcessor(deps.searcher, deps.generator, options.generationStallMs),
            agent: new AgentProcessor(deps.searcher),
        }
        this.clock = options.clock ?? { now: () => Date.now() }
    }

    /**
     * Runs one turn to completion. A total memory outage still produces an
     * answer (flagged degraded); generation failures surface as
     * GenerationTimeout or GenerationFailed and record nothing.
     */
    async submitTurn(input: TurnInput): Promise<TurnResult> {
        const session = await this.openSession(input)
        const turnId = randomUUID()
        const planned = await this.plan(session, input, turnId)

        const controller = new AbortController()
        let response: string
        try {
            response = await withTimeout(
                this.deps.generator.generate(planned.plan.prompt, { signal: controller.signal }),
                this.options.generationStallMs,
                'generation',
            )
        } catch (err) {
            controller.abort()
            if (err instanceof TimeoutError) throw new GenerationTimeoutError(this.options.generationStallMs)
            throw isEngineError(err) ? err : new GenerationFailedError(err)
        }

        return this.record(session.id, input.message, turnId, planned, response, false)
    }

    /**
     * Opens the session, then hands back a stream whose producer resolves
     * memory and generates. Session errors are thrown here; everything after
     * arrives as stream events.
     */
    async submitTurnStream(input: TurnInput): Promise<{ sessionId: string; turnId: string; stream: TurnStream }> {
        const session = await this.openSession(input)
        const turnId = randomUUID()

        const stream = new TurnStream(async () => {
            const planned = await this.plan(session, input, turnId)
            return {
                stream: signal => this.deps.generator.generateStream(planned.plan.prompt, { signal }),
                generate: signal => this.deps.generator.generate(planned.plan.prompt, { signal }),
                record: (text, partial) => this.record(session.id, input.message, turnId, planned, text, partial),
            }
        }, this.options.generationStallMs)

        return { sessionId: session.id, turnId, stream }
    }

    async switchMode(sessionId: string, mode: Mode): Promise<SwitchModeResult> {
        const outcome: { previousMode: Mode; effects: ModeEffect[] } = { previousMode: mode, effects: [] }

        const session = await this.deps.store.mutate(sessionId, current => {
            const next = transition(current.state, { type: 'switch', mode })
            outcome.previousMode = current.state.mode
            outcome.effects = next.effects
            return { ...current, state: next.state }
        })

        let consolidationJobId: string | null = null
        for (const effect of outcome.effects) {
            if (effect.type === 'outcomes-cleared' && effect.outcomes.length > 0) {
                consolidationJobId = this.deps.consolidation.submit({
                    sessionId,
                    identity: session.identity,
                    mode: 'agent',
                    trigger: 'mode-switch',
                    messages: [],
                    outcomes: effect.outcomes,
                    learning: null,
                })
            }
            if (effect.type === 'learning-cleared' && effect.learning.topic) {
                consolidationJobId = this.deps.consolidation.submit({
                    sessionId,
                    identity: session.identity,
                    mode: 'tutor',
                    trigger: 'mode-switch',
                    messages: [],
                    outcomes: [],
                    learning: { topic: effect.learning.topic, level: effect.learning.level },
                })
            }
        }

        if (outcome.previousMode !== mode) {
            console.log(`[engine] Session ${sessionId} switched ${outcome.previousMode} → ${mode}`)
        }
        return { sessionId, previousMode: outcome.previousMode, newMode: mode, consolidationJobId }
    }

    async getSession(sessionId: string): Promise<SessionSummary> {
        const session = await this.deps.store.load(sessionId)
        if (!session) throw new SessionNotFoundError(sessionId)
        return summarize(session)
    }

    /** Deletes the session and hands its unconsolidated turns to consolidation. */
    async deleteSession(sessionId: string): Promise<{ sessionId: string; deleted: true; consolidationJobId: string | null }> {
        const removed = await this.deps.store.delete(sessionId)
        if (!removed) throw new SessionNotFoundError(sessionId)

        const consolidationJobId = this.deps.consolidation.submit(sliceForConsolidation(removed, 'session-deleted'))
        console.log(`[engine] Session ${sessionId} deleted`)
        return { sessionId, deleted: true, consolidationJobId }
    }

    private async openSession(input: TurnInput): Promise<Session> {
        const sessionId = input.sessionId ?? randomUUID()
        const existing = await this.deps.store.load(sessionId)

        if (!existing) {
            return this.deps.store.create(sessionId, input.identity, input.mode ?? this.options.defaultMode ?? 'agent', input.metadata ?? {})
        }

        // Another identity's session is indistinguishable from a missing one
        if (existing.identity.clientId !== input.identity.clientId || existing.identity.actorId !== input.identity.actorId) {
            throw new SessionNotFoundError(sessionId)
        }

        if (input.mode && input.mode !== existing.state.mode) {
            await this.switchMode(sessionId, input.mode)
            const switched = await this.deps.store.load(sessionId)
            if (!switched) throw new SessionNotFoundError(sessionId)
            return switched
        }
        return existing
    }

    private async plan(session: Session, input: TurnInput, turnId: string): Promise<PlannedTurn> {
        const processor = this.processors[session.state.mode]
        const plan = await processor.plan({
            session,
            message: input.message,
            turnId,
            realms: input.includeRealms,
            contextDepth: input.contextDepth ?? this.options.defaultContextDepth ?? 2,
            now: this.clock.now(),
        })
        return { mode: processor.mode, plan }
    }

    private async record(
        sessionId: string,
        message: string,
        turnId: string,
        { mode, plan }: PlannedTurn,
        response: string,
        partial: boolean,
    ): Promise<TurnResult> {
        const memoryResult = plan.memory.result
        const degraded = plan.memory.unavailable || (memoryResult?.degraded ?? false)
        const pending: { slice: ConsolidationRequest | null } = { slice: null }

        await this.deps.store.mutate(sessionId, current => {
            pending.slice = null
            const seq = current.turnSeq + 1
            const { state } = applyEvents(current.state, [...plan.events, ...plan.complete(response, partial)])
            const turn: ConversationTurn = {
                id: turnId,
                seq,
                mode,
                userMessage: message,
                response,
                partial,
                degraded,
                memoryEntryIds: memoryResult?.entries.map(e => e.id) ?? [],
                ts: this.clock.now(),
            }

            let next: Session = {
                ...current,
                state,
                history: [...current.history, turn],
                turnSeq: seq,
                memory: {
                    entries: memoryResult?.entries.map(e => ({ id: e.id, realm: e.realm })) ?? [],
                    unavailableRealms: memoryResult?.unavailableRealms ?? [],
                    degraded,
                    memoryUnavailable: plan.memory.unavailable,
                },
            }

            if (seq - current.consolidatedThroughSeq >= this.options.consolidationWindow) {
                const slice = sliceForConsolidation(next, 'window')
                pending.slice = slice
                next = {
                    ...next,
                    state: transition(next.state, { type: 'outcomes-consolidated', outcomeIds: slice.outcomes.map(o => o.id) }).state,
                    consolidatedThroughSeq: seq,
                }
            }
            return next
        })

        const consolidationJobId = pending.slice ? this.deps.consolidation.submit(pending.slice) : null

        console.log(
            `[engine] Turn ${turnId} recorded on session ${sessionId} (${mode}` +
            `${partial ? ', partial' : ''}${degraded ? ', degraded' : ''})`,
        )

        return {
            sessionId,
            turnId,
            mode,
            response,
            partial,
            degraded,
            memoryUnavailable: plan.memory.unavailable,
            memory: memoryResult ? toMemoryMetadata(memoryResult) : null,
            insights: plan.insights,
            consolidationJobId,
        }
    }
}

/** Turns not yet consolidated, with the outcomes and learning they produced. */
export function sliceForConsolidation(session: Session, trigger: ConsolidationRequest['trigger']): ConsolidationRequest {
    const turns = session.history.filter(turn => turn.seq > session.consolidatedThroughSeq)
    const turnIds = new Set(turns.map(turn => turn.id))

    return {
        sessionId: session.id,
        identity: session.identity,
        mode: session.state.mode,
        trigger,
        messages: turns.flatMap(turn => [
            { turnId: turn.id, role: 'user' as const, content: turn.userMessage, ts: turn.ts },
            ...(turn.response ? [{ turnId: turn.id, role: 'assistant' as const, content: turn.response, ts: turn.ts }] : []),
        ]),
        outcomes: session.state.mode === 'agent' ? session.state.outcomes.filter(o => turnIds.has(o.turnId)) : [],
        learning: session.state.mode === 'tutor' && session.state.learning.topic
            ? { topic: session.state.learning.topic, level: session.state.learning.level }
            : null,
    }
}

function summarize(session: Session): SessionSummary {
    return {
        sessionId: session.id,
        clientId: session.identity.clientId,
        actorId: session.identity.actorId,
        actorType: session.identity.actorType,
        mode: session.state.mode,
        turnCount: session.history.length,
        totalTurns: session.turnSeq,
        learning: session.state.mode === 'tutor' ? session.state.learning : null,
        pendingOutcomes: session.state.mode === 'agent' ? session.state.outcomes.length : 0,
        memory: session.memory,
        createdAt: new Date(session.createdAt).toISOString(),
        lastActivityAt: new Date(session.lastActivityAt).toISOString(),
        metadata: session.metadata,
        history: session.history.map(turn => ({
            turnId: turn.id,
            mode: turn.mode,
            userMessage: turn.userMessage,
            response: turn.response,
            partial: turn.partial,
            ts: new Date(turn.ts).toISOString(),
        })),
    }
}
