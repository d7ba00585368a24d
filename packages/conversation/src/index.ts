export { ConversationEngine, sliceForConsolidation } from './engine'
export type { ConversationEngineDeps, ConversationEngineOptions } from './engine'
export { ContextStore } from './context-store'
export type { ContextStoreOptions, SessionMutator } from './context-store'
export { transition, applyEvents, initialModeState, clampLevel } from './mode-machine'
export type { ModeEvent, ModeEffect, Transition } from './mode-machine'
export { TurnStream } from './turn-stream'
export type { PreparedTurn, StreamOutcome } from './turn-stream'
export { OpenAIResponseGenerator } from './generator/openai-generator'
export type { OpenAIGeneratorOptions } from './generator/openai-generator'
export { detectComprehension } from './generator/comprehension'
export { analyzeIntent } from './processors/intent'
export { extractTopic } from './processors/learning'
export * from './schemas'
export { toMemoryMetadata } from './types'
export type {
    ChatMessage,
    ComprehensionSignal,
    GenerateOptions,
    Intent,
    MemoryMetadata,
    Prompt,
    ResponseGenerator,
    SessionSummary,
    StreamEvent,
    SwitchModeResult,
    TaskType,
    TurnInput,
    TurnInsights,
    TurnResult,
} from './types'
