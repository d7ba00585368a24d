import Fastify, { type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { ZodError } from 'zod'
import { isEngineError, type EngineErrorKind } from '@realmchat/shared'
import { chatRoutes, consolidationRoutes, type ChatRoutesOptions } from './routes/chat'

export interface AppOptions {
    /** Required in the x-api-key header when set. */
    apiKey?: string
    logger?: boolean
}

const STATUS_BY_KIND: Record<EngineErrorKind, number> = {
    SessionNotFound: 404,
    SessionConflict: 409,
    MemoryUnavailable: 503,
    GenerationFailed: 503,
    GenerationTimeout: 504,
    ConsolidationFailedPermanent: 500,
}

export function buildApp(deps: ChatRoutesOptions, options: AppOptions = {}): FastifyInstance {
    const app = Fastify({ logger: options.logger ?? false })

    app.register(cors, {
        origin: true,
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'x-api-key'],
        exposedHeaders: ['x-session-id', 'x-turn-id'],
    })

    app.addHook('onRequest', async (req, reply) => {
        if (!options.apiKey || req.url === '/health' || req.method === 'OPTIONS') return
        if (req.headers['x-api-key'] !== options.apiKey) {
            return reply.status(401).send({ error: 'Unauthorized' })
        }
    })

    app.setErrorHandler((err, req, reply) => {
        if (isEngineError(err)) {
            const status = STATUS_BY_KIND[err.kind]
            if (status >= 500) console.warn(`[api] ${req.method} ${req.url} failed: ${err.message}`)
            return reply.status(status).send({ error: err.message, kind: err.kind, retryable: err.retryable })
        }
        if (err instanceof ZodError) {
            return reply.status(400).send({ error: err.flatten() })
        }
        if (err.statusCode && err.statusCode < 500) {
            return reply.status(err.statusCode).send({ error: err.message })
        }
        console.error(`[api] ${req.method} ${req.url} failed:`, err)
        return reply.status(500).send({ error: 'Internal error' })
    })

    app.get('/health', async () => ({ status: 'ok', service: 'api', ts: new Date().toISOString() }))

    app.register(chatRoutes, { ...deps, prefix: '/chat' })
    app.register(consolidationRoutes, { ...deps, prefix: '/consolidation' })

    return app
}
