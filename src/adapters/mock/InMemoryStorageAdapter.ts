import type { IStorageAdapter } from '@/ports/IStorageAdapter';

type StorageOperation = 'read' | 'write' | 'delete';

/**
 * In-memory implementation of IStorageAdapter
 *
 * Values are cloned on the way in and out, like a real store would serialize
 * them. Used by tests and by hosts that don't need persistence.
 */
export class InMemoryStorageAdapter implements IStorageAdapter {
  private storage: Map<string, unknown> = new Map();
  private failures = new Set<StorageOperation>();

  async read<T>(key: string): Promise<T | null> {
    this.throwIfFailing('read', key);
    const value = this.storage.get(key);
    if (value === undefined) {
      return null;
    }
    return structuredClone(value) as T;
  }

  async write<T>(key: string, data: T): Promise<void> {
    this.throwIfFailing('write', key);
    this.storage.set(key, structuredClone(data));
  }

  async exists(key: string): Promise<boolean> {
    return this.storage.has(key);
  }

  async delete(key: string): Promise<void> {
    this.throwIfFailing('delete', key);
    this.storage.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.storage.keys());
  }

  async clear(): Promise<void> {
    this.storage.clear();
  }

  /**
   * Make an operation reject until `_restore` is called (for testing)
   */
  _failOn(operation: StorageOperation): void {
    this.failures.add(operation);
  }

  _restore(): void {
    this.failures.clear();
  }

  /**
   * Get the raw storage map (for testing)
   */
  _getStorage(): Map<string, unknown> {
    return this.storage;
  }

  /**
   * Set the storage directly (for testing)
   */
  _setStorage(data: Record<string, unknown>): void {
    this.storage = new Map(Object.entries(data));
  }

  private throwIfFailing(operation: StorageOperation, key: string): void {
    if (this.failures.has(operation)) {
      throw new Error(`Simulated ${operation} failure for ${key}`);
    }
  }
}
