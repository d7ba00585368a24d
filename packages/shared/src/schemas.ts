import { z } from 'zod'

export const REALMS = ['CLIENT', 'ACTOR', 'ACTOR_CLASS', 'SKILL_MODULE'] as const
export const MODES = ['tutor', 'agent'] as const

export const RealmSchema = z.enum(REALMS)
export const ModeSchema = z.enum(MODES)

export const IdentitySchema = z.object({
    clientId: z.string().min(1),
    actorId: z.string().min(1),
    actorType: z.string().min(1).default('assistant'),
    actorClassId: z.string().min(1),
    skillModuleIds: z.array(z.string().min(1)).max(20).default([]),
})

export const SubmitTurnSchema = z.object({
    sessionId: z.string().min(1).max(128).optional(),
    identity: IdentitySchema,
    message: z.string().min(1).max(8000),
    mode: ModeSchema.optional(),
    includeRealms: z.array(RealmSchema).min(1).optional(),
    contextDepth: z.number().int().min(1).max(3).default(2),
    stream: z.boolean().default(false),
    metadata: z.record(z.unknown()).optional(),
})

export const SwitchModeSchema = z.object({
    mode: ModeSchema,
})

export type Realm = z.infer<typeof RealmSchema>
export type Mode = z.infer<typeof ModeSchema>
export type ActingIdentity = z.infer<typeof IdentitySchema>
export type SubmitTurnRequest = z.input<typeof SubmitTurnSchema>
export type SubmitTurn = z.infer<typeof SubmitTurnSchema>
