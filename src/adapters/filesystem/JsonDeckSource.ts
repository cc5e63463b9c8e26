/**
 * File system implementation of ICardSource
 *
 * Used by scripts and Node hosts to quiz on decks exported as JSON.
 * Every `*.json` file in the decks directory is one deck:
 *
 *   { "id"?: string, "name": string,
 *     "cards": [{ "id": string | number, "front": string, "back": string, "tags"?: string[] }] }
 *
 * The deck id defaults to the file's base name.
 */

import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { basename, join } from 'node:path';
import { DeckNotFoundError } from '@/domain/quiz/errors';
import { filterExcludedCards, hasQuizzableText } from '@/domain/quiz/tagFilter';
import type { Card, Deck, DeckInfo } from '@/domain/quiz/types';
import type { ICardSource } from '@/ports/ICardSource';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert one raw card entry, or null when it is malformed
 */
function parseCard(raw: unknown): Card | null {
  if (!isRecord(raw)) return null;

  const { id, front, back, tags } = raw;
  if (typeof id !== 'string' && typeof id !== 'number') return null;
  if (typeof front !== 'string' || typeof back !== 'string') return null;

  let cardTags: string[] = [];
  if (tags !== undefined) {
    if (!Array.isArray(tags) || !tags.every((t): t is string => typeof t === 'string')) {
      return null;
    }
    cardTags = tags;
  }

  return { id: String(id), front, back, tags: cardTags };
}

/**
 * Parse a deck file's JSON content
 *
 * @throws Error describing the first structural problem found
 */
export function parseDeckFile(content: string, fallbackId: string): Deck {
  const data: unknown = JSON.parse(content);
  if (!isRecord(data)) {
    throw new Error('deck file must contain a JSON object');
  }
  if (typeof data.name !== 'string' || !data.name.trim()) {
    throw new Error('deck "name" must be a non-empty string');
  }
  if (!Array.isArray(data.cards)) {
    throw new Error('deck "cards" must be an array');
  }

  const cards: Card[] = [];
  const seenIds = new Set<string>();

  data.cards.forEach((raw: unknown, index: number) => {
    const card = parseCard(raw);
    if (!card) {
      throw new Error(`card at index ${index} is malformed`);
    }
    if (seenIds.has(card.id)) {
      throw new Error(`duplicate card id "${card.id}"`);
    }
    seenIds.add(card.id);
    cards.push(card);
  });

  const id = typeof data.id === 'string' && data.id.trim() ? data.id : fallbackId;
  return { id, name: data.name.trim(), cards };
}

/**
 * ICardSource reading deck JSON files from a directory
 */
export class JsonDeckSource implements ICardSource {
  private decksDir: string;

  constructor(decksDir: string) {
    this.decksDir = decksDir;
  }

  async listDecks(): Promise<DeckInfo[]> {
    return this.readAllDecks()
      .map((deck) => ({
        id: deck.id,
        name: deck.name,
        cardCount: deck.cards.filter(hasQuizzableText).length,
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async loadDeck(deckName: string, excludedTags: readonly string[]): Promise<Deck> {
    const wanted = deckName.trim().toLowerCase();
    const deck = this.readAllDecks().find((d) => d.name.toLowerCase() === wanted);
    if (!deck) {
      throw new DeckNotFoundError(deckName);
    }

    const { included } = filterExcludedCards(deck.cards.filter(hasQuizzableText), excludedTags);
    return { id: deck.id, name: deck.name, cards: included };
  }

  /**
   * Read every deck file, skipping (with a warning) those that don't parse
   */
  private readAllDecks(): Deck[] {
    if (!existsSync(this.decksDir)) {
      return [];
    }

    const decks: Deck[] = [];
    const entries = readdirSync(this.decksDir, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith('.json') || entry.name.startsWith('.')) {
        continue;
      }

      const filePath = join(this.decksDir, entry.name);
      try {
        decks.push(parseDeckFile(readFileSync(filePath, 'utf-8'), basename(entry.name, '.json')));
      } catch (error) {
        console.warn(`Skipping deck file ${filePath}:`, error instanceof Error ? error.message : error);
      }
    }

    return decks;
  }
}
