import micromatch from 'micromatch';
import type { Card } from './types';

/**
 * Parse a free-form excluded tags string into an array of patterns
 *
 * Tags are separated by whitespace, commas or newlines. Lines starting with
 * `#` are comments.
 *
 * @param tagsString - Raw string, e.g. from a settings text area
 * @returns Array of non-empty patterns
 */
export function parseExcludedTags(tagsString: string): string[] {
  if (!tagsString.trim()) {
    return [];
  }

  return tagsString
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => !line.startsWith('#'))
    .flatMap((line) => line.split(/[\s,]+/))
    .filter((tag) => tag.length > 0);
}

/**
 * Expand patterns so that excluding a parent tag also excludes its
 * hierarchical children ("lang" also matches "lang::french")
 */
function expandPatterns(patterns: readonly string[]): string[] {
  return patterns.flatMap((pattern) =>
    pattern.endsWith('::*') ? [pattern] : [pattern, `${pattern}::*`],
  );
}

/**
 * Check if a card carries any of the excluded tags
 *
 * Matching is case-insensitive and supports glob wildcards
 * (e.g. "leech", "chapter*", "lang::*").
 *
 * @param card - Card to check
 * @param patterns - Excluded tag patterns
 * @returns true if the card should be excluded
 */
export function isCardExcluded(card: Pick<Card, 'tags'>, patterns: readonly string[]): boolean {
  if (patterns.length === 0 || card.tags.length === 0) {
    return false;
  }

  const expanded = expandPatterns(patterns);
  return card.tags.some((tag) => micromatch.isMatch(tag, expanded, { nocase: true }));
}

/**
 * Filter an array of cards, removing those with excluded tags
 *
 * @returns Object with included cards and excluded count
 */
export function filterExcludedCards<T extends Pick<Card, 'tags'>>(
  cards: readonly T[],
  patterns: readonly string[],
): { included: T[]; excludedCount: number } {
  if (patterns.length === 0) {
    return { included: [...cards], excludedCount: 0 };
  }

  const included: T[] = [];
  let excludedCount = 0;

  for (const card of cards) {
    if (isCardExcluded(card, patterns)) {
      excludedCount++;
    } else {
      included.push(card);
    }
  }

  return { included, excludedCount };
}

/**
 * Whether a card has usable text on both sides
 */
export function hasQuizzableText(card: Pick<Card, 'front' | 'back'>): boolean {
  return card.front.trim().length > 0 && card.back.trim().length > 0;
}
