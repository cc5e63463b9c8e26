/**
 * File-based storage adapter
 *
 * Stores data as JSON files in a specified directory.
 * Keys are converted to file paths (e.g., "history/quiz/1a2b3c4d" -> "history/quiz/1a2b3c4d.json")
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';

/**
 * File-based implementation of IStorageAdapter
 */
export class FileStorageAdapter implements IStorageAdapter {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
    if (!existsSync(baseDir)) {
      mkdirSync(baseDir, { recursive: true });
    }
  }

  private getFilePath(key: string): string {
    if (key.split('/').some((segment) => segment === '' || segment === '.' || segment === '..')) {
      throw new Error(`Invalid storage key: ${key}`);
    }
    return join(this.baseDir, `${key}.json`);
  }

  /**
   * Unparseable files read as missing
   */
  async read<T>(key: string): Promise<T | null> {
    const filePath = this.getFilePath(key);
    if (!existsSync(filePath)) {
      return null;
    }
    try {
      const content = readFileSync(filePath, 'utf-8');
      return JSON.parse(content) as T;
    } catch (error) {
      console.warn(`Ignoring unreadable storage file ${filePath}:`, error);
      return null;
    }
  }

  /**
   * Writes go to a temporary file first and are renamed into place,
   * so a crash mid-write never leaves a truncated file
   */
  async write<T>(key: string, data: T): Promise<void> {
    const filePath = this.getFilePath(key);
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tempPath = `${filePath}.tmp`;
    writeFileSync(tempPath, JSON.stringify(data), 'utf-8');
    renameSync(tempPath, filePath);
  }

  async exists(key: string): Promise<boolean> {
    return existsSync(this.getFilePath(key));
  }

  async delete(key: string): Promise<void> {
    const filePath = this.getFilePath(key);
    if (existsSync(filePath)) {
      unlinkSync(filePath);
    }
  }

  async keys(): Promise<string[]> {
    return this.collectKeys(this.baseDir, '');
  }

  private collectKeys(dir: string, prefix: string): string[] {
    if (!existsSync(dir)) {
      return [];
    }

    const keys: string[] = [];
    const entries = readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        keys.push(...this.collectKeys(join(dir, entry.name), relativePath));
      } else if (entry.isFile() && entry.name.endsWith('.json')) {
        // Remove .json extension to get the key
        keys.push(relativePath.slice(0, -5));
      }
    }

    return keys.sort();
  }

  async clear(): Promise<void> {
    if (existsSync(this.baseDir)) {
      rmSync(this.baseDir, { recursive: true, force: true });
      mkdirSync(this.baseDir, { recursive: true });
    }
  }
}
