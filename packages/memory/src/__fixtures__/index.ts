export { FakeMemoryClient } from './fake-memory-client'
