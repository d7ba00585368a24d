export { ScriptedGenerator } from './scripted-generator'
export { createTestEngine, TEST_IDENTITY } from './test-engine'
export type { TestEngineOptions } from './test-engine'
