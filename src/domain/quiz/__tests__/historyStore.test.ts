import { InMemoryStorageAdapter } from '@/adapters/mock/InMemoryStorageAdapter';
import { beforeEach, describe, expect, it } from 'vitest';
import { QuizHistoryStore, getQuizHistoryKey } from '../historyStore';

describe('getQuizHistoryKey', () => {
  it('generates consistent keys for the same deck', () => {
    expect(getQuizHistoryKey('Spanish::Verbs')).toBe(getQuizHistoryKey('Spanish::Verbs'));
    expect(getQuizHistoryKey('Spanish::Verbs')).toMatch(/^history\/quiz\/[0-9a-f]{8}$/);
  });

  it('normalizes whitespace and separators', () => {
    expect(getQuizHistoryKey(' Spanish ')).toBe(getQuizHistoryKey('Spanish'));
    expect(getQuizHistoryKey('decks\\spanish')).toBe(getQuizHistoryKey('decks/spanish'));
  });

  it('is case-sensitive', () => {
    expect(getQuizHistoryKey('Verbs')).not.toBe(getQuizHistoryKey('verbs'));
  });

  it('differs between decks', () => {
    expect(getQuizHistoryKey('spanish')).not.toBe(getQuizHistoryKey('french'));
  });
});

describe('QuizHistoryStore', () => {
  let storage: InMemoryStorageAdapter;
  let store: QuizHistoryStore;

  beforeEach(() => {
    storage = new InMemoryStorageAdapter();
    store = new QuizHistoryStore(storage);
  });

  describe('getRecord', () => {
    it('returns null for a deck without history', async () => {
      expect(await store.getRecord('spanish')).toBeNull();
      expect((await store.getAskedCardIds('spanish')).size).toBe(0);
    });

    it('ignores records with another schema version', async () => {
      await storage.write(getQuizHistoryKey('spanish'), {
        version: 99,
        deckId: 'spanish',
        cardIds: ['c1'],
        lastUpdated: 0,
      });
      expect(await store.getRecord('spanish')).toBeNull();
    });

    it('ignores a record that belongs to another deck', async () => {
      await storage.write(getQuizHistoryKey('spanish'), {
        version: 1,
        deckId: 'french',
        cardIds: ['c1'],
        lastUpdated: 0,
      });

      expect(await store.getRecord('spanish')).toBeNull();
      expect(await store.hasBeenAsked('spanish', 'c1')).toBe(false);
    });

    it('ignores malformed records', async () => {
      await storage.write(getQuizHistoryKey('spanish'), { version: 1, deckId: 'spanish', cardIds: [1, 2] });
      expect(await store.hasBeenAsked('spanish', 'c1')).toBe(false);
    });
  });

  describe('recordAsked', () => {
    it('makes recorded cards report as asked', async () => {
      await store.recordAsked('spanish', ['c1', 'c2']);

      expect(await store.hasBeenAsked('spanish', 'c1')).toBe(true);
      expect(await store.hasBeenAsked('spanish', 'c2')).toBe(true);
      expect(await store.hasBeenAsked('spanish', 'c3')).toBe(false);
    });

    it('keeps decks apart', async () => {
      await store.recordAsked('spanish', ['c1']);
      expect(await store.hasBeenAsked('french', 'c1')).toBe(false);
    });

    it('keeps decks whose ids differ only by case apart', async () => {
      await store.recordAsked('Verbs', ['c1']);

      expect(await store.hasBeenAsked('verbs', 'c1')).toBe(false);
      expect(await store.hasBeenAsked('Verbs', 'c1')).toBe(true);
    });

    it('is idempotent', async () => {
      expect(await store.recordAsked('spanish', ['c1', 'c2'])).toBe(2);
      expect(await store.recordAsked('spanish', ['c2', 'c3', 'c3'])).toBe(1);
      expect(await store.recordAsked('spanish', ['c1'])).toBe(0);

      const record = await store.getRecord('spanish');
      expect(record?.cardIds).toEqual(['c1', 'c2', 'c3']);
      expect(record?.deckId).toBe('spanish');
    });

    it('does not write when nothing is new', async () => {
      await store.recordAsked('spanish', ['c1']);
      storage._failOn('write');

      await expect(store.recordAsked('spanish', ['c1'])).resolves.toBe(0);
    });

    it('does not lose updates from concurrent calls on one deck', async () => {
      await Promise.all([
        store.recordAsked('spanish', ['c1', 'c2']),
        store.recordAsked('spanish', ['c3']),
        store.recordAsked('spanish', ['c4', 'c1']),
      ]);

      const asked = await store.getAskedCardIds('spanish');
      expect([...asked].sort()).toEqual(['c1', 'c2', 'c3', 'c4']);
    });

    it('does not lose updates from separate stores on one storage', async () => {
      const other = new QuizHistoryStore(storage);

      await Promise.all([
        store.recordAsked('spanish', ['c1']),
        other.recordAsked('spanish', ['c2']),
        store.recordAsked('spanish', ['c3']),
      ]);

      expect((await other.getRecord('spanish'))?.cardIds).toEqual(['c1', 'c2', 'c3']);
    });

    it('keeps working after a failed write', async () => {
      storage._failOn('write');
      await expect(store.recordAsked('spanish', ['c1'])).rejects.toThrow('Simulated write failure');

      storage._restore();
      await store.recordAsked('spanish', ['c2']);
      expect([...(await store.getAskedCardIds('spanish'))]).toEqual(['c2']);
    });
  });

  describe('clear', () => {
    it('forgets every recorded card', async () => {
      await store.recordAsked('spanish', ['c1', 'c2']);
      await store.clear('spanish');

      expect(await store.hasBeenAsked('spanish', 'c1')).toBe(false);
      expect(await store.hasBeenAsked('spanish', 'c2')).toBe(false);
      expect(await storage.keys()).toEqual([]);
    });

    it('is a no-op for decks without history', async () => {
      await expect(store.clear('spanish')).resolves.toBeUndefined();
    });

    it('leaves other decks alone', async () => {
      await store.recordAsked('spanish', ['c1']);
      await store.recordAsked('french', ['c1']);
      await store.clear('spanish');

      expect(await store.hasBeenAsked('french', 'c1')).toBe(true);
    });
  });
});
