/**
 * Port interface for persistent key-value storage
 * Backs quiz history and settings; abstracts the storage mechanism for testability
 */
export interface IStorageAdapter {
  /**
   * Read data from storage
   * @param key - Storage key (e.g. "history/quiz/1a2b3c4d")
   * @returns Promise resolving to stored data, or null if not found
   */
  read<T>(key: string): Promise<T | null>;

  /**
   * Write data to storage, replacing any previous value
   */
  write<T>(key: string, data: T): Promise<void>;

  /**
   * Check if a key exists in storage
   */
  exists(key: string): Promise<boolean>;

  /**
   * Delete data from storage. Deleting a missing key is a no-op.
   */
  delete(key: string): Promise<void>;

  /**
   * Get all keys in storage
   */
  keys(): Promise<string[]>;

  /**
   * Clear all data from storage
   */
  clear(): Promise<void>;
}
