import { InMemoryStorageAdapter } from '@/adapters/mock/InMemoryStorageAdapter';
import { MockCardSource } from '@/adapters/mock/MockCardSource';
import { createCard, createDeckFixture } from '@/test/fixtures/types';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DeckNotFoundError, InsufficientCardsError, InvalidConfigError } from '../errors';
import { QuizHistoryStore, getQuizHistoryKey } from '../historyStore';
import { QuizService } from '../quizService';
import { createSeededRandom } from '../random';

describe('QuizService', () => {
  let storage: InMemoryStorageAdapter;
  let cards: MockCardSource;
  let service: QuizService;

  beforeEach(() => {
    storage = new InMemoryStorageAdapter();
    cards = new MockCardSource([createDeckFixture('Capitals', 6)]);
    service = new QuizService({ cards, storage, random: createSeededRandom(1), now: () => 5000 });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const historyConfig = { questionCount: 3, choiceCount: 4, saveHistory: true };

  describe('listDecks', () => {
    it('passes through to the card source', async () => {
      expect(await service.listDecks()).toEqual([{ id: 'Capitals', name: 'Capitals', cardCount: 6 }]);
    });
  });

  describe('startQuiz', () => {
    it('generates a session for the deck', async () => {
      const { session, warnings, historyReset } = await service.startQuiz('capitals', {
        questionCount: 4,
        choiceCount: 3,
      });

      expect(session.deckName).toBe('Capitals');
      expect(session.questions).toHaveLength(4);
      expect(session.createdAt).toBe(5000);
      expect(warnings).toEqual([]);
      expect(historyReset).toBe(false);
    });

    it('applies excluded tags through the card source', async () => {
      cards._addDeck('Tagged', [
        createCard('a', { tags: ['leech'] }),
        createCard('b'),
        createCard('c'),
      ]);

      const { session } = await service.startQuiz('Tagged', {
        questionCount: 2,
        choiceCount: 2,
        excludedTags: ['leech'],
      });

      expect(session.questions.map((q) => q.cardId).sort()).toEqual(['b', 'c']);
    });

    it('rejects invalid configuration before loading the deck', async () => {
      await expect(service.startQuiz('Capitals', { choiceCount: 1 })).rejects.toBeInstanceOf(
        InvalidConfigError,
      );
      expect(cards._getLoadCount()).toBe(0);
    });

    it('propagates unknown decks', async () => {
      await expect(service.startQuiz('Nope')).rejects.toBeInstanceOf(DeckNotFoundError);
    });

    it('does not touch history at generation time', async () => {
      await service.startQuiz('Capitals', historyConfig);
      expect(await storage.keys()).toEqual([]);
    });

    it('treats unreadable history as empty and warns', async () => {
      await new QuizHistoryStore(storage).recordAsked('Capitals', ['c1', 'c2', 'c3', 'c4']);
      storage._failOn('read');

      const { session, warnings } = await service.startQuiz('Capitals', historyConfig);

      expect(session.questions).toHaveLength(3);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatch(/^Quiz history could not be read, so earlier questions may repeat: Simulated read failure/);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('fails when history leaves too few cards', async () => {
      await new QuizHistoryStore(storage).recordAsked('Capitals', ['c1', 'c2', 'c3', 'c4']);

      await expect(service.startQuiz('Capitals', historyConfig)).rejects.toBeInstanceOf(
        InsufficientCardsError,
      );
    });
  });

  describe('startQuiz with resetHistoryWhenExhausted', () => {
    beforeEach(() => {
      service = new QuizService(
        { cards, storage, random: createSeededRandom(2) },
        { resetHistoryWhenExhausted: true },
      );
    });

    it('clears the history once every card has been asked', async () => {
      const history = new QuizHistoryStore(storage);
      await history.recordAsked('Capitals', ['c1', 'c2', 'c3', 'c4', 'c5', 'c6']);

      const { session, historyReset } = await service.startQuiz('Capitals', historyConfig);

      expect(historyReset).toBe(true);
      expect(session.questions).toHaveLength(3);
      expect((await history.getAskedCardIds('Capitals')).size).toBe(0);
    });

    it('reports no reset when the history cannot be cleared', async () => {
      await new QuizHistoryStore(storage).recordAsked('Capitals', ['c1', 'c2', 'c3', 'c4', 'c5', 'c6']);
      storage._failOn('delete');

      const { session, historyReset, warnings } = await service.startQuiz('Capitals', historyConfig);

      expect(historyReset).toBe(false);
      expect(session.questions).toHaveLength(3);
      expect(warnings).toEqual([
        'Quiz history could not be cleared: Simulated delete failure for ' + getQuizHistoryKey('Capitals'),
      ]);
    });

    it('still fails when some cards remain but not enough', async () => {
      await new QuizHistoryStore(storage).recordAsked('Capitals', ['c1', 'c2', 'c3', 'c4']);

      await expect(service.startQuiz('Capitals', historyConfig)).rejects.toThrow(
        'Only 2 eligible cards remain for 3 questions; reduce the question count or clear the quiz history.',
      );
    });
  });

  describe('completeQuiz', () => {
    it('scores the session and records its cards', async () => {
      const { session } = await service.startQuiz('Capitals', historyConfig);
      const answers = session.questions.map((q) => q.correctIndex);

      const { result, historySaved, warnings } = await service.completeQuiz(session, answers);

      expect(result).toMatchObject({ total: 3, correct: 3, percent: 100 });
      expect(historySaved).toBe(true);
      expect(warnings).toEqual([]);
      for (const question of session.questions) {
        expect(await service.hasBeenAsked('Capitals', question.cardId)).toBe(true);
      }
    });

    it('keeps later quizzes disjoint from completed ones', async () => {
      const first = await service.startQuiz('Capitals', historyConfig);
      await service.completeQuiz(first.session, []);
      const second = await service.startQuiz('Capitals', historyConfig);

      const firstIds = new Set(first.session.questions.map((q) => q.cardId));
      expect(second.session.questions.filter((q) => firstIds.has(q.cardId))).toEqual([]);
    });

    it('keeps every card when two services complete quizzes at once', async () => {
      const other = new QuizService({ cards, storage, random: createSeededRandom(9) });
      const first = await service.startQuiz('Capitals', historyConfig);
      const second = await other.startQuiz('Capitals', historyConfig);

      await Promise.all([
        service.completeQuiz(first.session, []),
        other.completeQuiz(second.session, []),
      ]);

      const asked = await new QuizHistoryStore(storage).getAskedCardIds('Capitals');
      const expected = new Set([...first.session.questions, ...second.session.questions].map((q) => q.cardId));
      expect([...asked].sort()).toEqual([...expected].sort());
    });

    it('leaves history alone when saveHistory is off', async () => {
      const { session } = await service.startQuiz('Capitals', { questionCount: 3 });

      const { historySaved } = await service.completeQuiz(session, []);

      expect(historySaved).toBe(false);
      expect(await storage.keys()).toEqual([]);
    });

    it('returns the result with a warning when history cannot be written', async () => {
      const { session } = await service.startQuiz('Capitals', historyConfig);
      storage._failOn('write');

      const { result, historySaved, warnings } = await service.completeQuiz(session, [0, 0, 0]);

      expect(result.total).toBe(3);
      expect(historySaved).toBe(false);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatch(/^Quiz history could not be saved: Simulated write failure/);
    });
  });

  describe('clearHistory', () => {
    it('forgets asked cards for the deck', async () => {
      const { session } = await service.startQuiz('Capitals', historyConfig);
      await service.completeQuiz(session, []);

      await service.clearHistory('Capitals');

      expect(await service.hasBeenAsked('Capitals', session.questions[0].cardId)).toBe(false);
    });
  });
});
