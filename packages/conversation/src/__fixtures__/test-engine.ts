import { InMemoryKeyValueStore, ManualClock } from '@realmchat/db/fixtures'
import {
    ConsolidationPipeline,
    ConsolidationProcessor,
    HeuristicFactExtractor,
    HierarchicalMemorySearcher,
    InProcessConsolidationQueue,
    MemorySearchCache,
} from '@realmchat/memory'
import { FakeMemoryClient } from '@realmchat/memory/fixtures'
import type { ActingIdentity } from '@realmchat/shared'
import { ContextStore } from '../context-store'
import { ConversationEngine, type ConversationEngineOptions } from '../engine'
import { ScriptedGenerator } from './scripted-generator'

export const TEST_IDENTITY: ActingIdentity = {
    clientId: 'C1',
    actorId: 'A1',
    actorType: 'assistant',
    actorClassId: 'CL1',
    skillModuleIds: ['SK1'],
}

export interface TestEngineOptions extends Partial<ConversationEngineOptions> {
    ttlMs?: number
    historyLimit?: number
    realmTimeoutMs?: number
    maxAttempts?: number
}

/** A complete engine over in-process stand-ins, with every part exposed. */
export function createTestEngine(options: TestEngineOptions = {}) {
    const clock = new ManualClock()
    const kv = new InMemoryKeyValueStore(clock)
    const memory = new FakeMemoryClient()
    const generator = new ScriptedGenerator()
    const searcher = new HierarchicalMemorySearcher(memory, {
        cache: new MemorySearchCache(kv, 5 * 60 * 1000),
        realmTimeoutMs: options.realmTimeoutMs ?? 50,
    })
    const queue = new InProcessConsolidationQueue(
        new ConsolidationProcessor(new HeuristicFactExtractor(), memory, searcher),
        { attempts: 3, backoffMs: 1 },
        { delay: async () => { } },
    )
    const consolidation = new ConsolidationPipeline(queue)
    const store = new ContextStore(kv, {
        ttlMs: options.ttlMs ?? 60 * 60 * 1000,
        historyLimit: options.historyLimit ?? 50,
        maxAttempts: options.maxAttempts ?? 100,
        retryDelayMs: 2,
        clock,
    })
    const engine = new ConversationEngine({ store, searcher, generator, consolidation }, {
        generationStallMs: options.generationStallMs ?? 500,
        consolidationWindow: options.consolidationWindow ?? 10,
        defaultMode: options.defaultMode,
        clock,
    })

    async function settle(): Promise<void> {
        await consolidation.flush()
        await queue.drain()
    }

    return { engine, store, kv, clock, memory, generator, searcher, queue, consolidation, settle }
}
