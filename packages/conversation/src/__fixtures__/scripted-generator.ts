import { sleep } from '@realmchat/shared'
import type { ComprehensionSignal, GenerateOptions, Prompt, ResponseGenerator } from '../types'

type Script =
    | { kind: 'ok' }
    | { kind: 'stall-after'; chunks: number }
    | { kind: 'fail-after'; chunks: number; error: Error }

function abortable(signal: AbortSignal | undefined): Promise<never> {
    return new Promise<never>((_, reject) => {
        const abort = () => {
            const error = new Error('generation aborted')
            error.name = 'AbortError'
            reject(error)
        }
        if (signal?.aborted) abort()
        signal?.addEventListener('abort', abort, { once: true })
    })
}

/**
 * Deterministic generator: replays fixed chunks, and can be told to stall or
 * fail part-way. A stalled call only ends when its signal aborts.
 */
export class ScriptedGenerator implements ResponseGenerator {
    readonly prompts: Prompt[] = []
    readonly assessments: Array<{ message: string; previousResponse: string | null }> = []
    chunks: string[] = ['Sure. ', 'Here is ', 'the answer.']
    comprehension: ComprehensionSignal = 'neutral'
    aborts = 0
    /** Streams whose generator body has finished, however it ended. */
    streamsClosed = 0

    private script: Script = { kind: 'ok' }
    private generateError: Error | null = null
    private assessmentHangs = false
    private chunkDelay: { index: number; ms: number } | null = null

    respondWith(...chunks: string[]): this {
        this.chunks = chunks
        return this
    }

    stallAfter(chunks: number): this {
        this.script = { kind: 'stall-after', chunks }
        return this
    }

    failStreamAfter(chunks: number, error = new Error('upstream connection reset')): this {
        this.script = { kind: 'fail-after', chunks, error }
        return this
    }

    /** Comprehension checks only end when their signal aborts. */
    hangAssessments(): this {
        this.assessmentHangs = true
        return this
    }

    /** Holds chunk `index` back for `ms`, ignoring any abort. */
    delayChunk(index: number, ms: number): this {
        this.chunkDelay = { index, ms }
        return this
    }

    failGenerate(error = new Error('model unavailable')): this {
        this.generateError = error
        return this
    }

    async generate(prompt: Prompt, options: GenerateOptions = {}): Promise<string> {
        this.prompts.push(prompt)
        if (this.generateError) throw this.generateError
        if (this.script.kind === 'stall-after') return this.hang(options.signal)
        return this.chunks.join('')
    }

    async *generateStream(prompt: Prompt, options: GenerateOptions = {}): AsyncIterable<string> {
        this.prompts.push(prompt)
        try {
            for (let i = 0; i < this.chunks.length; i++) {
                if (this.script.kind === 'stall-after' && i === this.script.chunks) await this.hang(options.signal)
                if (this.script.kind === 'fail-after' && i === this.script.chunks) throw this.script.error
                if (this.chunkDelay?.index === i) await sleep(this.chunkDelay.ms)
                yield this.chunks[i]
            }
        } finally {
            this.streamsClosed++
        }
    }

    async assessComprehension(message: string, previousResponse: string | null, options: GenerateOptions = {}): Promise<ComprehensionSignal> {
        this.assessments.push({ message, previousResponse })
        if (this.assessmentHangs) return this.hang(options.signal)
        return this.comprehension
    }

    private async hang(signal: AbortSignal | undefined): Promise<never> {
        try {
            return await abortable(signal)
        } finally {
            this.aborts++
        }
    }
}
