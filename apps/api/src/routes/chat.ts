import type { FastifyInstance, FastifyReply } from 'fastify'
import type { ConsolidationPipeline } from '@realmchat/memory'
import type { ConversationEngine, TurnStream } from '@realmchat/conversation'
import { SubmitTurnSchema, SwitchModeSchema } from '@realmchat/shared'

export type ChatRoutesOptions = {
    engine: ConversationEngine
    consolidation: ConsolidationPipeline
}

type SessionParams = { Params: { id: string } }

export async function chatRoutes(app: FastifyInstance, { engine }: ChatRoutesOptions) {
    app.post('/turns', async (req, reply) => {
        const body = SubmitTurnSchema.safeParse(req.body)
        if (!body.success) return reply.status(400).send({ error: body.error.flatten() })

        const { stream, ...input } = body.data
        if (!stream) return engine.submitTurn(input)

        // Errors before the stream opens (unknown session, store conflict) answer as plain JSON
        const opened = await engine.submitTurnStream(input)
        await sendEventStream(reply, opened.sessionId, opened.turnId, opened.stream)
        return reply
    })

    app.post<SessionParams>('/sessions/:id/mode', async (req, reply) => {
        const body = SwitchModeSchema.safeParse(req.body)
        if (!body.success) return reply.status(400).send({ error: body.error.flatten() })
        return engine.switchMode(req.params.id, body.data.mode)
    })

    app.get<SessionParams>('/sessions/:id', async req => engine.getSession(req.params.id))

    app.delete<SessionParams>('/sessions/:id', async req => engine.deleteSession(req.params.id))
}

export async function consolidationRoutes(app: FastifyInstance, { consolidation }: ChatRoutesOptions) {
    app.get<SessionParams>('/jobs/:id', async (req, reply) => {
        const record = await consolidation.getStatus(req.params.id)
        if (!record) return reply.status(404).send({ error: `Consolidation job ${req.params.id} not found` })
        return record
    })
}

async function sendEventStream(reply: FastifyReply, sessionId: string, turnId: string, stream: TurnStream) {
    reply.hijack()
    reply.raw.writeHead(200, {
        ...reply.getHeaders(),
        'content-type': 'text/event-stream',
        'cache-control': 'no-cache',
        connection: 'keep-alive',
        'x-session-id': sessionId,
        'x-turn-id': turnId,
    })

    // Client went away: stop generating, the partial turn is still recorded
    reply.raw.on('close', () => {
        if (!reply.raw.writableFinished) stream.cancel()
    })

    for await (const event of stream) {
        reply.raw.write(`event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`)
    }
    reply.raw.end()
}
