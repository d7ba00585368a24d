import type OpenAI from 'openai'
import { z } from 'zod'
import { describeError } from '@realmchat/shared'
import { normalizeKeyPart, semanticKey } from './semantic-key'
import type { ConsolidationJob, DurableFact } from './types'

export interface FactExtractor {
    extract(job: ConsolidationJob): Promise<DurableFact[]>
}

function fact(entityName: string, factType: string, content: string, turnIds: string[]): DurableFact {
    return {
        key: semanticKey({ entityName, entityType: factType, factType }),
        entityName,
        factType,
        content,
        sourceTurnIds: [...new Set(turnIds)].sort(),
    }
}

// Same key twice in one slice: keep the later statement, remember every source turn
function collapse(facts: DurableFact[]): DurableFact[] {
    const byKey = new Map<string, DurableFact>()
    for (const next of facts) {
        const previous = byKey.get(next.key)
        byKey.set(next.key, previous
            ? { ...next, sourceTurnIds: [...new Set([...previous.sourceTurnIds, ...next.sourceTurnIds])].sort() }
            : next)
    }
    return [...byKey.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
}

function clip(text: string, max = 80): string {
    const trimmed = text.trim().replace(/\s+/g, ' ')
    return trimmed.length > max ? trimmed.slice(0, max).trimEnd() : trimmed
}

const STATEMENT_PATTERNS: Array<{ pattern: RegExp; entity: (match: string) => string; factType: string; content: (match: string) => string }> = [
    {
        pattern: /\bmy name is ([\p{L}' -]{2,40}?)(?:[.,!?]|$)/iu,
        entity: () => 'user name',
        factType: 'identity',
        content: name => `The user's name is ${name}.`,
    },
    {
        pattern: /\bi (?:prefer|would rather) ([^.!?\n]{3,120})/i,
        entity: what => `user preference ${clip(what, 40)}`,
        factType: 'preference',
        content: what => `The user prefers ${what}.`,
    },
    {
        pattern: /\bi(?:'m| am)? (?:work(?:ing)?) (?:on|at|in) ([^.!?\n]{3,120})/i,
        entity: () => 'user work context',
        factType: 'context',
        content: where => `The user works on/at ${where}.`,
    },
]

/**
 * Deterministic extraction: explicit user statements, tutor progress and
 * agent task outcomes. The same slice always yields the same keys.
 */
export class HeuristicFactExtractor implements FactExtractor {
    async extract(job: ConsolidationJob): Promise<DurableFact[]> {
        const facts: DurableFact[] = []

        for (const message of job.messages) {
            if (message.role !== 'user') continue
            for (const rule of STATEMENT_PATTERNS) {
                const match = rule.pattern.exec(message.content)
                const captured = match?.[1]?.trim()
                if (!captured) continue
                facts.push(fact(rule.entity(captured), rule.factType, rule.content(captured), [message.turnId]))
            }
        }

        if (job.learning?.topic) {
            const { topic, level } = job.learning
            facts.push(fact(
                `learning ${topic}`,
                'learning-progress',
                `Studied "${topic}" in tutor mode; understanding level ${level}.`,
                job.messages.map(m => m.turnId),
            ))
        }

        for (const outcome of job.outcomes) {
            facts.push(fact(
                `${outcome.taskType} task ${clip(outcome.request, 60)}`,
                'task-outcome',
                outcome.summary,
                [outcome.turnId],
            ))
        }

        return collapse(facts)
    }
}

const ExtractionSchema = z.object({
    facts: z.array(z.object({
        entity: z.string().min(1).max(120),
        type: z.string().min(1).max(40).default('fact'),
        content: z.string().min(1).max(1000),
    })).max(10).default([]),
})

export function parseExtraction(raw: string, turnIds: string[]): DurableFact[] {
    let json: unknown
    try {
        json = JSON.parse(raw)
    } catch {
        throw new Error(`Extraction output is not JSON: ${raw.slice(0, 200)}`)
    }
    // Some models answer with a bare array instead of { facts: [...] }
    const parsed = ExtractionSchema.safeParse(Array.isArray(json) ? { facts: json } : json)
    if (!parsed.success) throw new Error(`Extraction output has the wrong shape: ${parsed.error.message}`)

    return collapse(parsed.data.facts.map(item =>
        fact(clip(item.entity, 120), normalizeKeyPart(item.type) || 'fact', item.content.trim(), turnIds)))
}

/**
 * Model-backed extraction. Any model or parsing failure falls back to the
 * heuristic extractor so a flaky model never blocks consolidation.
 */
export class OpenAIFactExtractor implements FactExtractor {
    constructor(
        private readonly openai: OpenAI,
        private readonly model: string,
        private readonly fallback: FactExtractor = new HeuristicFactExtractor(),
    ) { }

    async extract(job: ConsolidationJob): Promise<DurableFact[]> {
        if (job.messages.length < 2 && job.outcomes.length === 0) return this.fallback.extract(job)

        const conversationText = job.messages
            .map(m => `${m.role}: ${m.content}`)
            .join('\n')
            .slice(0, 6000)

        const outcomeText = job.outcomes.length > 0
            ? `\n\nCompleted tasks:\n${job.outcomes.map(o => `- ${o.summary}`).join('\n')}`
            : ''

        const prompt = `You are reviewing a conversation between a user and an assistant.
Extract up to 5 durable facts, user preferences, decisions or lessons the assistant
should remember in future conversations. Skip trivia and anything already implied
by the assistant's role. Name each fact's entity consistently (e.g. "user name",
"preferred report format") so repeated extraction yields the same entity.

Respond ONLY with JSON: { "facts": [ { "entity": "...", "type": "preference|identity|decision|lesson|fact", "content": "..." } ] }

Conversation:
${conversationText}${outcomeText}`

        try {
            const completion = await this.openai.chat.completions.create({
                model: this.model,
                messages: [{ role: 'user', content: prompt }],
                response_format: { type: 'json_object' },
                temperature: 0,
                max_tokens: 512,
            })
            const raw = completion.choices[0]?.message?.content ?? '{"facts":[]}'
            const extracted = parseExtraction(raw, job.messages.map(m => m.turnId))
            const heuristic = await this.fallback.extract(job)
            return collapse([...heuristic, ...extracted])
        } catch (err) {
            console.warn(`[consolidation] Model extraction failed for job ${job.id}, using heuristics: ${describeError(err)}`)
            return this.fallback.extract(job)
        }
    }
}
