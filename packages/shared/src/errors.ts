import type { Realm } from './schemas'

export type EngineErrorKind =
    | 'MemoryUnavailable'
    | 'SessionConflict'
    | 'SessionNotFound'
    | 'GenerationTimeout'
    | 'GenerationFailed'
    | 'ConsolidationFailedPermanent'

export class EngineError extends Error {
    readonly kind: EngineErrorKind
    readonly retryable: boolean

    constructor(kind: EngineErrorKind, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
        super(message, { cause: options.cause })
        this.name = `${kind}Error`
        this.kind = kind
        this.retryable = options.retryable ?? false
    }
}

export class MemoryUnavailableError extends EngineError {
    constructor(readonly realms: Realm[], cause?: unknown) {
        super('MemoryUnavailable', `All memory realms failed: ${realms.join(', ')}`, { retryable: true, cause })
    }
}

export class SessionConflictError extends EngineError {
    constructor(readonly sessionId: string, attempts: number) {
        super('SessionConflict', `Session ${sessionId} is busy; gave up after ${attempts} attempts`, { retryable: true })
    }
}

export class SessionNotFoundError extends EngineError {
    constructor(readonly sessionId: string) {
        super('SessionNotFound', `Session ${sessionId} not found`)
    }
}

export class GenerationTimeoutError extends EngineError {
    constructor(readonly timeoutMs: number) {
        super('GenerationTimeout', `Response generator stalled for more than ${timeoutMs}ms`, { retryable: true })
    }
}

export class GenerationFailedError extends EngineError {
    constructor(cause: unknown) {
        super('GenerationFailed', `Response generation failed: ${describeError(cause)}`, { retryable: true, cause })
    }
}

export class ConsolidationFailedPermanentError extends EngineError {
    constructor(readonly jobId: string, readonly attempts: number, cause?: unknown) {
        super('ConsolidationFailedPermanent', `Consolidation job ${jobId} failed after ${attempts} attempts`, { cause })
    }
}

export class TimeoutError extends Error {
    constructor(readonly label: string, readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`)
        this.name = 'TimeoutError'
    }
}

export function isEngineError(err: unknown): err is EngineError {
    return err instanceof EngineError
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
