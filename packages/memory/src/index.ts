export { HierarchicalMemorySearcher } from './hierarchical-searcher'
export type { HierarchicalMemorySearcherOptions } from './hierarchical-searcher'
export { MemorySearchCache, searchCacheHash } from './search-cache'
export { mergeByPrecedence } from './merge'
export { isBindingPolicy, POLICY_MARKERS } from './policy'
export { REALM_AUTHORITY, ALL_REALMS, outranks, byAuthority, realmScopes } from './realms'
export { semanticKey, normalizeKeyPart, toResolvedEntry } from './semantic-key'
export { SupabaseMemoryClient, MemoryClientError } from './memory-client'
export { createOpenAIEmbedder } from './embeddings'
export type { Embedder } from './embeddings'
export { buildMemoryContext, describeEntry } from './context-builder'
export { HeuristicFactExtractor, OpenAIFactExtractor, parseExtraction } from './fact-extractor'
export type { FactExtractor } from './fact-extractor'
export { ConsolidationProcessor } from './consolidation-processor'
export type { ActorCacheInvalidator, ConsolidationProcessorOptions } from './consolidation-processor'
export {
    BullConsolidationQueue,
    InProcessConsolidationQueue,
    startConsolidationWorker,
    CONSOLIDATION_QUEUE,
} from './consolidation-queue'
export type { ConsolidationQueue, PermanentFailureHandler, RetryPolicy } from './consolidation-queue'
export { ConsolidationPipeline, consolidationJobId } from './consolidation-pipeline'
export type { ConsolidationRequest } from './consolidation-pipeline'
export type * from './types'
