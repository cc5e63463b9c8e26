/**
 * Quiz History Store Module
 *
 * Persists which cards have already been asked, per deck, so later quizzes
 * can skip them. Updates for one deck are serialized in-process across every
 * store sharing the same storage adapter.
 */

import type { IStorageAdapter } from '@/ports/IStorageAdapter';
import { hashString } from './random';
import type { QuizHistoryRecord } from './types';
import { QUIZ_HISTORY_VERSION } from './types';

const HISTORY_KEY_PREFIX = 'history/quiz';

/** Pending read-modify-write chains, per storage adapter and history key */
const deckLocks = new WeakMap<IStorageAdapter, Map<string, Promise<void>>>();

function normalizeDeckId(deckId: string): string {
  return deckId.trim().replace(/\\/g, '/');
}

/**
 * Get storage key for a deck's quiz history (deck ids are case-sensitive)
 */
export function getQuizHistoryKey(deckId: string): string {
  return `${HISTORY_KEY_PREFIX}/${hashString(normalizeDeckId(deckId)).slice(0, 8)}`;
}

function isHistoryRecord(value: unknown): value is QuizHistoryRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    value.version === QUIZ_HISTORY_VERSION &&
    'deckId' in value &&
    typeof value.deckId === 'string' &&
    'cardIds' in value &&
    Array.isArray(value.cardIds) &&
    value.cardIds.every((id: unknown) => typeof id === 'string')
  );
}

/**
 * Tracks asked cards per deck
 */
export class QuizHistoryStore {
  constructor(private storage: IStorageAdapter) {}

  /**
   * Get the stored record for a deck
   * Returns null when nothing was recorded, the record is unreadable, or the
   * key is held by another deck's record (hash collision)
   */
  async getRecord(deckId: string): Promise<QuizHistoryRecord | null> {
    const data = await this.storage.read<unknown>(getQuizHistoryKey(deckId));
    if (!isHistoryRecord(data) || normalizeDeckId(data.deckId) !== normalizeDeckId(deckId)) {
      return null;
    }
    return data;
  }

  /**
   * Snapshot of the card ids asked for a deck
   */
  async getAskedCardIds(deckId: string): Promise<ReadonlySet<string>> {
    const record = await this.getRecord(deckId);
    return new Set(record?.cardIds ?? []);
  }

  async hasBeenAsked(deckId: string, cardId: string): Promise<boolean> {
    const asked = await this.getAskedCardIds(deckId);
    return asked.has(cardId);
  }

  /**
   * Add card ids to a deck's history. Ids already present are ignored.
   *
   * @returns Number of ids newly recorded
   */
  async recordAsked(deckId: string, cardIds: Iterable<string>): Promise<number> {
    const incoming = [...cardIds];

    return this.withDeckLock(deckId, async () => {
      const existing = (await this.getRecord(deckId)) ?? this.createEmptyRecord(deckId);
      const known = new Set(existing.cardIds);
      const added = incoming.filter((id) => {
        if (known.has(id)) return false;
        known.add(id);
        return true;
      });

      if (added.length > 0) {
        const record: QuizHistoryRecord = {
          ...existing,
          cardIds: [...existing.cardIds, ...added],
          lastUpdated: Date.now(),
        };
        await this.storage.write(getQuizHistoryKey(deckId), record);
      }

      return added.length;
    });
  }

  /**
   * Forget everything recorded for a deck (no-op if nothing was)
   */
  async clear(deckId: string): Promise<void> {
    await this.withDeckLock(deckId, async () => {
      const key = getQuizHistoryKey(deckId);
      if (await this.storage.exists(key)) {
        await this.storage.delete(key);
      }
    });
  }

  private createEmptyRecord(deckId: string): QuizHistoryRecord {
    return {
      version: QUIZ_HISTORY_VERSION,
      deckId,
      cardIds: [],
      lastUpdated: Date.now(),
    };
  }

  /**
   * Run a read-modify-write for one deck after any pending one finishes
   */
  private async withDeckLock<T>(deckId: string, task: () => Promise<T>): Promise<T> {
    let locks = deckLocks.get(this.storage);
    if (!locks) {
      locks = new Map<string, Promise<void>>();
      deckLocks.set(this.storage, locks);
    }

    const key = getQuizHistoryKey(deckId);
    const previous = locks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    locks.set(key, settled);

    try {
      return await run;
    } finally {
      if (locks.get(key) === settled) {
        locks.delete(key);
      }
    }
  }
}
