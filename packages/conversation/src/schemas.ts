import { z } from 'zod'
import { IdentitySchema, ModeSchema, RealmSchema } from '@realmchat/shared'

export const MIN_LEVEL = 1
export const MAX_LEVEL = 5
export const INITIAL_LEVEL = 3
export const LEARNING_PATH_LIMIT = 10

export const TaskOutcomeSchema = z.object({
    id: z.string(),
    turnId: z.string(),
    taskType: z.string(),
    action: z.string().nullable(),
    request: z.string(),
    summary: z.string(),
    proceduresUsed: z.array(z.string()),
    policiesApplied: z.array(z.string()),
    ts: z.number(),
})

export const LearningProgressSchema = z.object({
    topic: z.string().nullable(),
    level: z.number().int().min(MIN_LEVEL).max(MAX_LEVEL),
    priorTopics: z.array(z.string()).max(LEARNING_PATH_LIMIT),
    suggestedTopics: z.array(z.string()),
})

export const ModeStateSchema = z.discriminatedUnion('mode', [
    z.object({ mode: z.literal('tutor'), learning: LearningProgressSchema }),
    z.object({ mode: z.literal('agent'), outcomes: z.array(TaskOutcomeSchema) }),
])

export const ConversationTurnSchema = z.object({
    id: z.string(),
    seq: z.number().int().positive(),
    mode: ModeSchema,
    userMessage: z.string(),
    response: z.string(),
    partial: z.boolean(),
    degraded: z.boolean(),
    memoryEntryIds: z.array(z.string()),
    ts: z.number(),
})

export const MemorySnapshotSchema = z.object({
    entries: z.array(z.object({ id: z.string(), realm: RealmSchema })),
    unavailableRealms: z.array(RealmSchema),
    degraded: z.boolean(),
    memoryUnavailable: z.boolean(),
})

export const SessionSchema = z.object({
    id: z.string(),
    identity: IdentitySchema,
    state: ModeStateSchema,
    history: z.array(ConversationTurnSchema),
    memory: MemorySnapshotSchema.nullable(),
    createdAt: z.number(),
    lastActivityAt: z.number(),
    metadata: z.record(z.unknown()),
    turnSeq: z.number().int().min(0),
    consolidatedThroughSeq: z.number().int().min(0),
})

export type LearningProgress = z.infer<typeof LearningProgressSchema>
export type ModeState = z.infer<typeof ModeStateSchema>
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>
export type MemorySnapshot = z.infer<typeof MemorySnapshotSchema>
export type Session = z.infer<typeof SessionSchema>
