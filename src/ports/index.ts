// Port interfaces - abstractions for external dependencies
export type { ICardSource } from './ICardSource';
export type { IStorageAdapter } from './IStorageAdapter';
