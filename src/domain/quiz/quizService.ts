import type { ICardSource } from '@/ports/ICardSource';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';
import { validateQuizConfig } from './config';
import { InsufficientCardsError } from './errors';
import { QuizHistoryStore } from './historyStore';
import { type RandomSource, defaultRandom } from './random';
import { scoreQuizSession } from './scoring';
import { generateQuizSession } from './sessionGenerator';
import type { Deck, DeckInfo, QuizAnswers, QuizConfig, QuizResult, QuizSession } from './types';

export interface QuizServiceDependencies {
  cards: ICardSource;
  storage: IStorageAdapter;
  random?: RandomSource;
  /** Clock, for deterministic tests */
  now?: () => number;
}

export interface QuizServiceOptions {
  /**
   * When every card has been asked, clear the deck's history and start over
   * instead of failing
   */
  resetHistoryWhenExhausted?: boolean;
}

export interface QuizStart {
  session: QuizSession;
  /** Non-fatal problems to show the user */
  warnings: string[];
  /** True when the deck's history was cleared to make room for this quiz; false if clearing failed */
  historyReset: boolean;
}

export interface QuizCompletion {
  result: QuizResult;
  /** True when the session's cards were written to history */
  historySaved: boolean;
  warnings: string[];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Service for running quizzes against a card source.
 * Handles history lookups around generation and commits history on completion.
 * Persistence failures degrade to warnings; the quiz itself is never lost.
 */
export class QuizService {
  private history: QuizHistoryStore;
  private random: RandomSource;
  private now: () => number;

  constructor(
    private deps: QuizServiceDependencies,
    private options: QuizServiceOptions = {},
  ) {
    this.history = new QuizHistoryStore(deps.storage);
    this.random = deps.random ?? defaultRandom;
    this.now = deps.now ?? Date.now;
  }

  async listDecks(): Promise<DeckInfo[]> {
    return this.deps.cards.listDecks();
  }

  /**
   * Load a deck and generate a quiz for it
   *
   * @throws QuizError subclasses for configuration and deck-size problems
   */
  async startQuiz(deckName: string, overrides: Partial<QuizConfig> = {}): Promise<QuizStart> {
    const config = validateQuizConfig(overrides);
    const deck = await this.deps.cards.loadDeck(deckName, config.excludedTags);
    const warnings: string[] = [];

    const history = config.saveHistory
      ? await this.readHistory(deck, warnings)
      : new Set<string>();

    try {
      const session = this.generate(deck, config, history);
      return { session, warnings, historyReset: false };
    } catch (error) {
      if (!this.shouldResetHistory(error)) {
        throw error;
      }

      console.warn(`All cards in "${deck.name}" have been asked; clearing quiz history`);
      let historyReset = true;
      try {
        await this.history.clear(deck.id);
      } catch (clearError) {
        console.warn(`Failed to clear quiz history for "${deck.name}":`, clearError);
        warnings.push(`Quiz history could not be cleared: ${describeError(clearError)}`);
        historyReset = false;
      }
      const session = this.generate(deck, config, new Set<string>());
      return { session, warnings, historyReset };
    }
  }

  /**
   * Grade a finished quiz and, when the session tracks history, record its cards
   */
  async completeQuiz(session: QuizSession, answers: QuizAnswers): Promise<QuizCompletion> {
    const result = scoreQuizSession(session, answers);
    const warnings: string[] = [];

    if (!session.config.saveHistory) {
      return { result, historySaved: false, warnings };
    }

    try {
      await this.history.recordAsked(
        session.deckId,
        session.questions.map((q) => q.cardId),
      );
      return { result, historySaved: true, warnings };
    } catch (error) {
      console.warn(`Failed to save quiz history for "${session.deckName}":`, error);
      warnings.push(`Quiz history could not be saved: ${describeError(error)}`);
      return { result, historySaved: false, warnings };
    }
  }

  async clearHistory(deckName: string): Promise<void> {
    const deck = await this.deps.cards.loadDeck(deckName, []);
    await this.history.clear(deck.id);
  }

  async hasBeenAsked(deckName: string, cardId: string): Promise<boolean> {
    const deck = await this.deps.cards.loadDeck(deckName, []);
    return this.history.hasBeenAsked(deck.id, cardId);
  }

  private generate(deck: Deck, config: QuizConfig, history: ReadonlySet<string>): QuizSession {
    return generateQuizSession({
      deck,
      config,
      history,
      random: this.random,
      now: this.now(),
    });
  }

  /**
   * Read history, treating an unreadable store as empty
   */
  private async readHistory(deck: Deck, warnings: string[]): Promise<ReadonlySet<string>> {
    try {
      return await this.history.getAskedCardIds(deck.id);
    } catch (error) {
      console.warn(`Failed to read quiz history for "${deck.name}":`, error);
      warnings.push(`Quiz history could not be read, so earlier questions may repeat: ${describeError(error)}`);
      return new Set<string>();
    }
  }

  private shouldResetHistory(error: unknown): boolean {
    return (
      this.options.resetHistoryWhenExhausted === true &&
      error instanceof InsufficientCardsError &&
      error.eligible === 0 &&
      error.excludedByHistory > 0
    );
  }
}
