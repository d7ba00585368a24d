import type OpenAI from 'openai'
import { z } from 'zod'
import { describeError } from '@realmchat/shared'
import type { ComprehensionSignal, GenerateOptions, Prompt, ResponseGenerator } from '../types'
import { detectComprehension } from './comprehension'

export interface OpenAIGeneratorOptions {
    model: string
    maxTokens?: number
    /** Model for the comprehension check; defaults to `model`. */
    assessmentModel?: string
}

const AssessmentSchema = z.object({
    signal: z.enum(['comprehension', 'confusion', 'neutral']),
})

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam

function toMessages(prompt: Prompt): ChatCompletionMessageParam[] {
    return [
        { role: 'system', content: prompt.system },
        ...prompt.messages.map((m): ChatCompletionMessageParam => (m.role === 'user'
            ? { role: 'user', content: m.content }
            : { role: 'assistant', content: m.content })),
    ]
}

export class OpenAIResponseGenerator implements ResponseGenerator {
    constructor(private readonly openai: OpenAI, private readonly options: OpenAIGeneratorOptions) { }

    async generate(prompt: Prompt, options: GenerateOptions = {}): Promise<string> {
        const response = await this.openai.chat.completions.create({
            model: this.options.model,
            max_tokens: this.options.maxTokens ?? 1024,
            messages: toMessages(prompt),
        }, { signal: options.signal })

        return response.choices[0]?.message?.content ?? ''
    }

    async *generateStream(prompt: Prompt, options: GenerateOptions = {}): AsyncIterable<string> {
        const stream = await this.openai.chat.completions.create({
            model: this.options.model,
            max_tokens: this.options.maxTokens ?? 1024,
            messages: toMessages(prompt),
            stream: true,
        }, { signal: options.signal })

        for await (const chunk of stream) {
            const text = chunk.choices[0]?.delta?.content
            if (text) yield text
        }
    }

    async assessComprehension(message: string, previousResponse: string | null, options: GenerateOptions = {}): Promise<ComprehensionSignal> {
        const keyword = detectComprehension(message)
        if (keyword) return keyword
        if (!previousResponse) return 'neutral'

        try {
            const response = await this.openai.chat.completions.create({
                model: this.options.assessmentModel ?? this.options.model,
                max_tokens: 20,
                temperature: 0,
                response_format: { type: 'json_object' },
                messages: [
                    {
                        role: 'system',
                        content: 'Classify whether the learner\'s reply shows comprehension of the tutor\'s explanation, confusion, or neither. Respond ONLY with JSON: { "signal": "comprehension" | "confusion" | "neutral" }',
                    },
                    { role: 'user', content: `Tutor: ${previousResponse.slice(0, 2000)}\n\nLearner: ${message.slice(0, 1000)}` },
                ],
            }, { signal: options.signal })
            const parsed = AssessmentSchema.safeParse(JSON.parse(response.choices[0]?.message?.content ?? '{}'))
            return parsed.success ? parsed.data.signal : 'neutral'
        } catch (err) {
            console.warn(`[engine] Comprehension assessment failed: ${describeError(err)}`)
            return 'neutral'
        }
    }
}
