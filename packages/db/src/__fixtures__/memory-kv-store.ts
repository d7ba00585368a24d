import type { KeyValueStore, MirrorWrite } from '../kv-store'

export interface Clock {
    now(): number
}

export class ManualClock implements Clock {
    constructor(private current = Date.UTC(2026, 0, 1)) { }

    now(): number {
        return this.current
    }

    advance(ms: number): void {
        this.current += ms
    }
}

interface Slot {
    value: string
    expiresAt: number
}

/**
 * In-process stand-in for the Redis-backed store. Expiry is enforced on
 * access (and by `sweep()`), and emits the same expired-key notification.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
    private readonly slots = new Map<string, Slot>()
    private readonly listeners = new Set<(key: string) => void>()
    casCalls = 0
    casFailures = 0

    constructor(private readonly clock: Clock = { now: () => Date.now() }) { }

    async get(key: string): Promise<string | null> {
        return this.live(key)?.value ?? null
    }

    async set(key: string, value: string, ttlMs: number): Promise<void> {
        this.slots.set(key, { value, expiresAt: this.clock.now() + ttlMs })
    }

    async compareAndSet(key: string, expected: string | null, value: string, ttlMs: number, mirror?: MirrorWrite): Promise<boolean> {
        this.casCalls++
        const current = this.live(key)?.value ?? null
        if (current !== expected) {
            this.casFailures++
            return false
        }
        this.slots.set(key, { value, expiresAt: this.clock.now() + ttlMs })
        if (mirror) this.slots.set(mirror.key, { value, expiresAt: this.clock.now() + mirror.ttlMs })
        return true
    }

    async delete(key: string): Promise<boolean> {
        return this.live(key) !== undefined && this.slots.delete(key)
    }

    async onExpired(listener: (key: string) => void): Promise<() => Promise<void>> {
        this.listeners.add(listener)
        return async () => {
            this.listeners.delete(listener)
        }
    }

    /** Expires every slot whose TTL has elapsed, like Redis' active expiry cycle. */
    sweep(): void {
        for (const key of [...this.slots.keys()]) this.live(key)
    }

    keys(): string[] {
        this.sweep()
        return [...this.slots.keys()].sort()
    }

    private live(key: string): Slot | undefined {
        const slot = this.slots.get(key)
        if (!slot) return undefined
        if (slot.expiresAt <= this.clock.now()) {
            this.slots.delete(key)
            for (const listener of this.listeners) listener(key)
            return undefined
        }
        return slot
    }
}
