import { z } from 'zod'
import { RealmSchema } from '@realmchat/shared'

export const MemoryRecordSchema = z.object({
    id: z.string(),
    entityName: z.string(),
    entityType: z.string(),
    factType: z.string().optional(),
    content: z.string(),
    score: z.number(),
    depth: z.number().int().min(0).optional(),
    relatedTopics: z.array(z.string()).optional(),
})

export const ResolvedEntrySchema = MemoryRecordSchema.extend({
    realm: RealmSchema,
    semanticKey: z.string(),
})

export const CachedSearchSchema = z.object({
    entries: z.array(ResolvedEntrySchema),
    realmsAccessed: z.object({
        CLIENT: z.number(),
        ACTOR: z.number(),
        ACTOR_CLASS: z.number(),
        SKILL_MODULE: z.number(),
    }),
    relationshipsTraversed: z.number(),
})

export type CachedSearch = z.infer<typeof CachedSearchSchema>
