import type { ActingIdentity, EngineErrorKind, Mode, Realm } from '@realmchat/shared'
import type { MemorySearchResult } from '@realmchat/memory'
import type { LearningProgress, MemorySnapshot } from './schemas'

export interface ChatMessage {
    role: 'user' | 'assistant'
    content: string
}

export interface Prompt {
    system: string
    messages: ChatMessage[]
}

export type ComprehensionSignal = 'comprehension' | 'confusion' | 'neutral'

export interface GenerateOptions {
    signal?: AbortSignal
}

export interface ResponseGenerator {
    generate(prompt: Prompt, options?: GenerateOptions): Promise<string>
    generateStream(prompt: Prompt, options?: GenerateOptions): AsyncIterable<string>
    /** Best effort: implementations answer 'neutral' rather than fail. */
    assessComprehension(message: string, previousResponse: string | null, options?: GenerateOptions): Promise<ComprehensionSignal>
}

export type TaskType = 'procedure' | 'troubleshooting' | 'information' | 'creation' | 'search' | 'general'

export interface Intent {
    taskType: TaskType
    action: string | null
    entities: string[]
}

export type TurnInsights =
    | {
        mode: 'tutor'
        awaitingTopic: boolean
        topic: string | null
        level: number
        objective: string | null
        suggestedTopics: string[]
        followUpQuestions: string[]
    }
    | {
        mode: 'agent'
        intent: Intent
        proceduresUsed: string[]
        policiesApplied: string[]
    }

export interface MemoryMetadata {
    entriesUsed: number
    realmsAccessed: Record<Realm, number>
    unavailableRealms: Realm[]
    relationshipsTraversed: number
    queryTimeMs: number
    cacheHit: boolean
}

export interface TurnInput {
    sessionId?: string
    identity: ActingIdentity
    message: string
    mode?: Mode
    includeRealms?: Realm[]
    contextDepth?: number
    metadata?: Record<string, unknown>
}

export interface TurnResult {
    sessionId: string
    turnId: string
    mode: Mode
    response: string
    partial: boolean
    degraded: boolean
    memoryUnavailable: boolean
    memory: MemoryMetadata | null
    insights: TurnInsights
    consolidationJobId: string | null
}

export type StreamEvent =
    | { type: 'status'; phase: 'resolving-memory' | 'generating' }
    | { type: 'chunk'; index: number; text: string }
    | { type: 'error'; kind: EngineErrorKind; message: string }
    | { type: 'complete'; text: string; partial: boolean; result: TurnResult | null }

export interface SwitchModeResult {
    sessionId: string
    previousMode: Mode
    newMode: Mode
    consolidationJobId: string | null
}

export interface SessionSummary {
    sessionId: string
    clientId: string
    actorId: string
    actorType: string
    mode: Mode
    turnCount: number
    totalTurns: number
    learning: LearningProgress | null
    pendingOutcomes: number
    memory: MemorySnapshot | null
    createdAt: string
    lastActivityAt: string
    metadata: Record<string, unknown>
    history: Array<{ turnId: string; mode: Mode; userMessage: string; response: string; partial: boolean; ts: string }>
}

export function toMemoryMetadata(result: MemorySearchResult): MemoryMetadata {
    return {
        entriesUsed: result.entries.length,
        realmsAccessed: result.realmsAccessed,
        unavailableRealms: result.unavailableRealms,
        relationshipsTraversed: result.relationshipsTraversed,
        queryTimeMs: result.queryTimeMs,
        cacheHit: result.cacheHit,
    }
}
