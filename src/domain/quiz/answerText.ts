/**
 * Answer text helpers
 *
 * Card sides are raw HTML. Choices are compared on a normalized form so that
 * markup and whitespace differences don't produce look-alike options.
 */

/**
 * Strip HTML tags, turning <br> into newlines
 */
export function stripHtml(text: string): string {
  return text
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/?[^>]+>/g, '')
    .trim();
}

/**
 * Normalize answer text for equality checks: drop line breaks, collapse
 * whitespace, lower-case
 */
export function normalizeAnswer(text: string): string {
  return text
    .replace(/[\r\n]/g, '')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ');
}

/**
 * Check whether two answer texts are the same after normalization
 */
export function answersMatch(a: string, b: string): boolean {
  return normalizeAnswer(a) === normalizeAnswer(b);
}

/**
 * Deduplicate answer texts by normalized form, keeping the first raw text seen.
 * Texts matching any of `exclude` are dropped.
 */
export function distinctAnswers(
  texts: Iterable<string>,
  exclude: readonly string[] = [],
): string[] {
  const seen = new Set(exclude.map(normalizeAnswer));
  const result: string[] = [];

  for (const text of texts) {
    const key = normalizeAnswer(text);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(text);
  }

  return result;
}
