import type { Deck, DeckInfo } from '@/domain/quiz/types';

/**
 * Port interface for the card pool loader
 * Abstracts the flashcard collection the quiz reads from
 */
export interface ICardSource {
  /**
   * List the decks available to quiz on
   * @returns Promise resolving to deck summaries sorted by name
   */
  listDecks(): Promise<DeckInfo[]>;

  /**
   * Load a snapshot of a deck's cards
   *
   * Cards carrying an excluded tag, and cards whose front or back is blank,
   * are left out of the snapshot.
   *
   * @param deckName - Deck name (matched case-insensitively)
   * @param excludedTags - Tag patterns to exclude (glob syntax, hierarchical `::` tags)
   * @throws DeckNotFoundError when no deck has that name
   */
  loadDeck(deckName: string, excludedTags: readonly string[]): Promise<Deck>;
}
