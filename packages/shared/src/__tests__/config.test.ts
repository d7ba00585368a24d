import { describe, expect, it, vi } from 'vitest'
import { exponentialBackoff, loadConfig } from '..'

const REQUIRED = {
    REDIS_URL: 'redis://localhost:6379',
    SUPABASE_URL: 'https://example.supabase.co',
    SUPABASE_SERVICE_KEY: 'test-secret',
    OPENAI_API_KEY: 'test-secret',
}

describe('loadConfig', () => {
    it('applies defaults and coerces numbers', () => {
        const config = loadConfig({ ...REQUIRED, HISTORY_LIMIT: '20' })

        expect(config).toMatchObject({
            CHAT_MODEL: 'gpt-4o-mini',
            PORT: 3000,
            SESSION_TTL_SECONDS: 86_400,
            HISTORY_LIMIT: 20,
            REALM_TIMEOUT_MS: 2000,
            CONSOLIDATION_WINDOW: 10,
            CONSOLIDATION_ATTEMPTS: 5,
        })
        expect(config.API_KEY).toBeUndefined()
    })

    it('names every invalid key', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => { })

        expect(() => loadConfig({ ...REQUIRED, REDIS_URL: 'not a url', CONSOLIDATION_ATTEMPTS: '0' }))
            .toThrow('Invalid configuration: REDIS_URL, CONSOLIDATION_ATTEMPTS')
        error.mockRestore()
    })

    it('rejects a history limit below the consolidation window', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => { })

        expect(() => loadConfig({ ...REQUIRED, HISTORY_LIMIT: '5', CONSOLIDATION_WINDOW: '10' }))
            .toThrow('Invalid configuration: HISTORY_LIMIT')
        expect(error).toHaveBeenCalledWith('[config] Invalid environment:\nHISTORY_LIMIT: must be at least CONSOLIDATION_WINDOW')
        error.mockRestore()
    })

    it('accepts a history limit equal to the consolidation window', () => {
        expect(loadConfig({ ...REQUIRED, HISTORY_LIMIT: '10' })).toMatchObject({ HISTORY_LIMIT: 10, CONSOLIDATION_WINDOW: 10 })
    })
})

describe('exponentialBackoff', () => {
    it('doubles per attempt up to the ceiling', () => {
        expect([1, 2, 3, 4].map(attempt => exponentialBackoff(attempt, 100))).toEqual([100, 200, 400, 800])
        expect(exponentialBackoff(10, 1000, 5000)).toBe(5000)
    })
})
