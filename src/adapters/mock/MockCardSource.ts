import { DeckNotFoundError } from '@/domain/quiz/errors';
import { filterExcludedCards, hasQuizzableText } from '@/domain/quiz/tagFilter';
import type { Card, Deck, DeckInfo } from '@/domain/quiz/types';
import type { ICardSource } from '@/ports/ICardSource';
import type { DeckFixture } from '@/test/fixtures/types';

/**
 * Mock implementation of ICardSource for testing
 * Serves decks from in-memory fixtures
 */
export class MockCardSource implements ICardSource {
  private decks: Deck[];
  private loadCount = 0;

  constructor(fixtures: DeckFixture[] = []) {
    this.decks = fixtures.map((fixture) => ({
      id: fixture.id ?? fixture.name,
      name: fixture.name,
      cards: fixture.cards,
    }));
  }

  async listDecks(): Promise<DeckInfo[]> {
    return this.decks
      .map((deck) => ({ id: deck.id, name: deck.name, cardCount: deck.cards.length }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async loadDeck(deckName: string, excludedTags: readonly string[]): Promise<Deck> {
    this.loadCount++;
    const deck = this.decks.find((d) => d.name.toLowerCase() === deckName.toLowerCase());
    if (!deck) {
      throw new DeckNotFoundError(deckName);
    }

    const { included } = filterExcludedCards(deck.cards.filter(hasQuizzableText), excludedTags);
    return { id: deck.id, name: deck.name, cards: included };
  }

  /**
   * Add a deck (for testing)
   */
  _addDeck(name: string, cards: Card[], id: string = name): void {
    this.decks.push({ id, name, cards });
  }

  /**
   * Number of loadDeck calls (for testing)
   */
  _getLoadCount(): number {
    return this.loadCount;
  }
}
