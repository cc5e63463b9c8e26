export { InMemoryStorageAdapter } from './InMemoryStorageAdapter';
export { MockCardSource } from './MockCardSource';
