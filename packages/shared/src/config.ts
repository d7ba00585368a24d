import { z } from 'zod'

const ConfigSchema = z.object({
    REDIS_URL: z.string().url(),
    SUPABASE_URL: z.string().url(),
    SUPABASE_SERVICE_KEY: z.string().min(1),
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_BASE_URL: z.string().url().optional(),
    CHAT_MODEL: z.string().default('gpt-4o-mini'),
    EXTRACTION_MODEL: z.string().default('gpt-4o-mini'),
    API_KEY: z.string().min(1).optional(),
    PORT: z.coerce.number().int().positive().default(3000),

    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24),
    HISTORY_LIMIT: z.coerce.number().int().min(2).default(50),
    REALM_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    SEARCH_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
    GENERATION_STALL_MS: z.coerce.number().int().positive().default(15_000),
    CONSOLIDATION_WINDOW: z.coerce.number().int().positive().default(10),
    CONSOLIDATION_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    CONSOLIDATION_BACKOFF_MS: z.coerce.number().int().positive().default(2000),
    CONSOLIDATION_CONCURRENCY: z.coerce.number().int().positive().default(5),
    CONSOLIDATION_STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
}).refine(config => config.HISTORY_LIMIT >= config.CONSOLIDATION_WINDOW, {
    // Every turn has to reach a consolidation window before history trims it
    message: 'must be at least CONSOLIDATION_WINDOW',
    path: ['HISTORY_LIMIT'],
})

export type AppConfig = z.infer<typeof ConfigSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = ConfigSchema.safeParse(env)
    if (!parsed.success) {
        const problems = Object.entries(parsed.error.flatten().fieldErrors)
            .map(([key, errors]) => `${key}: ${(errors ?? []).join(', ')}`)
        console.error(`[config] Invalid environment:\n${problems.join('\n')}`)
        throw new Error(`Invalid configuration: ${Object.keys(parsed.error.flatten().fieldErrors).join(', ')}`)
    }
    return parsed.data
}
