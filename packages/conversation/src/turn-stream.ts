import {
    EngineError,
    GenerationFailedError,
    GenerationTimeoutError,
    describeError,
    isEngineError,
} from '@realmchat/shared'
import type { StreamEvent, TurnResult } from './types'

export interface PreparedTurn {
    stream(signal: AbortSignal): AsyncIterable<string>
    generate(signal: AbortSignal): Promise<string>
    record(text: string, partial: boolean): Promise<TurnResult>
}

export interface StreamOutcome {
    text: string
    partial: boolean
    result: TurnResult | null
    error: EngineError | null
}

const CANCELLED = Symbol('cancelled')

function toEngineError(err: unknown): EngineError {
    return isEngineError(err) ? err : new GenerationFailedError(err)
}

/**
 * One turn's output as an ordered event sequence: status, chunks, then
 * exactly one `complete`. The producer starts immediately and buffers for a
 * single consumer. Breaking out of the loop or calling `cancel()` stops
 * generation; the turn is still recorded as partial. `settled` resolves once
 * the turn has been recorded (or recording failed) and never rejects.
 */
export class TurnStream implements AsyncIterable<StreamEvent> {
    readonly settled: Promise<StreamOutcome>

    private readonly buffer: StreamEvent[] = []
    private readonly controller = new AbortController()
    private readonly cancelled: Promise<typeof CANCELLED>
    private signalCancelled: () => void = () => { }
    private waiter: ((result: IteratorResult<StreamEvent>) => void) | null = null
    private closed = false
    private consumed = false

    constructor(prepare: () => Promise<PreparedTurn>, private readonly stallMs: number) {
        this.cancelled = new Promise(resolve => {
            this.signalCancelled = () => resolve(CANCELLED)
        })
        this.settled = this.produce(prepare).finally(() => this.close())
    }

    get isCancelled(): boolean {
        return this.controller.signal.aborted
    }

    cancel(): void {
        if (this.closed || this.controller.signal.aborted) return
        this.controller.abort()
        this.signalCancelled()
    }

    [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
        if (this.consumed) throw new Error('A turn stream has a single consumer')
        this.consumed = true

        return {
            next: async (): Promise<IteratorResult<StreamEvent>> => {
                const event = this.buffer.shift()
                if (event) return { done: false, value: event }
                if (this.closed) return { done: true, value: undefined }
                return new Promise<IteratorResult<StreamEvent>>(resolve => {
                    this.waiter = resolve
                })
            },
            return: async (): Promise<IteratorResult<StreamEvent>> => {
                this.cancel()
                this.buffer.length = 0
                return { done: true, value: undefined }
            },
        }
    }

    private emit(event: StreamEvent): void {
        if (this.waiter) {
            const resolve = this.waiter
            this.waiter = null
            resolve({ done: false, value: event })
            return
        }
        this.buffer.push(event)
    }

    private close(): void {
        this.closed = true
        if (this.waiter) {
            const resolve = this.waiter
            this.waiter = null
            resolve({ done: true, value: undefined })
        }
    }

    private async produce(prepare: () => Promise<PreparedTurn>): Promise<StreamOutcome> {
        this.emit({ type: 'status', phase: 'resolving-memory' })

        let turn: PreparedTurn
        try {
            turn = await prepare()
        } catch (err) {
            return this.finish('', true, null, toEngineError(err))
        }

        this.emit({ type: 'status', phase: 'generating' })

        const chunks: string[] = []
        let error: EngineError | null = null
        let iterator: AsyncIterator<string> | null = null
        try {
            iterator = turn.stream(this.controller.signal)[Symbol.asyncIterator]()
            for (;;) {
                const next = await this.nextWithinStall(iterator)
                if (next === CANCELLED) {
                    this.release(iterator)
                    break
                }
                if (next.done) break
                chunks.push(next.value)
                this.emit({ type: 'chunk', index: chunks.length - 1, text: next.value })
            }
        } catch (err) {
            error = toEngineError(err)
            if (iterator && error instanceof GenerationTimeoutError) this.release(iterator)
        }

        // Nothing streamed and the stream itself broke: one whole response instead
        if (error && chunks.length === 0 && !(error instanceof GenerationTimeoutError) && !this.isCancelled) {
            console.warn(`[engine] Stream failed before the first chunk, falling back to a single response: ${error.message}`)
            try {
                const text = await this.withinStall(turn.generate(this.controller.signal))
                if (text !== CANCELLED) {
                    chunks.push(text)
                    this.emit({ type: 'chunk', index: 0, text })
                    error = null
                }
            } catch (err) {
                error = toEngineError(err)
            }
        }

        if (error) {
            this.controller.abort()
            console.warn(`[engine] Stream ended early: ${error.message}`)
        }

        const text = chunks.join('')
        const partial = error !== null || this.isCancelled
        try {
            const result = await turn.record(text, partial)
            return this.finish(text, partial, result, error)
        } catch (err) {
            console.error(`[engine] Failed to record streamed turn: ${describeError(err)}`)
            return this.finish(text, true, null, error ?? toEngineError(err))
        }
    }

    private finish(text: string, partial: boolean, result: TurnResult | null, error: EngineError | null): StreamOutcome {
        if (error) this.emit({ type: 'error', kind: error.kind, message: error.message })
        this.emit({ type: 'complete', text, partial, result })
        return { text, partial, result, error }
    }

    // Queued behind the step in flight; the generator's cleanup runs once that settles
    private release(iterator: AsyncIterator<string>): void {
        void iterator.return?.().catch(err => {
            console.warn(`[engine] Closing the generator stream failed: ${describeError(err)}`)
        })
    }

    private nextWithinStall(iterator: AsyncIterator<string>): Promise<IteratorResult<string> | typeof CANCELLED> {
        return this.withinStall(iterator.next())
    }

    private async withinStall<T>(pending: Promise<T>): Promise<T | typeof CANCELLED> {
        let timer: NodeJS.Timeout | undefined
        const stalled = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new GenerationTimeoutError(this.stallMs)), this.stallMs)
        })
        try {
            return await Promise.race([pending, stalled, this.cancelled])
        } finally {
            clearTimeout(timer)
        }
    }
}
