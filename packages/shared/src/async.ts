import { TimeoutError } from './errors'

// Rejects with TimeoutError when `promise` has not settled within `ms`.
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms)
    })
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

// attempt is 1-based: 1 → base, 2 → 2×base, 3 → 4×base …
export function exponentialBackoff(attempt: number, baseMs: number, maxMs = 60_000): number {
    return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), maxMs)
}
