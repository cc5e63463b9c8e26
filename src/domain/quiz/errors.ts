/**
 * Quiz error types
 *
 * Every error here is recoverable: callers show the message and let the user
 * adjust the deck or the configuration.
 */

export type QuizErrorCode =
  | 'INVALID_CONFIG'
  | 'INSUFFICIENT_CARDS'
  | 'INSUFFICIENT_POOL'
  | 'DECK_NOT_FOUND'
  | 'INVALID_ANSWER';

/**
 * Base class for quiz errors
 */
export abstract class QuizError extends Error {
  abstract readonly code: QuizErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Quiz configuration has out-of-range or malformed values
 */
export class InvalidConfigError extends QuizError {
  readonly code = 'INVALID_CONFIG';

  constructor(readonly problems: string[]) {
    super(`Invalid quiz configuration: ${problems.join('; ')}`);
  }
}

/**
 * Not enough eligible cards for the requested question count
 */
export class InsufficientCardsError extends QuizError {
  readonly code = 'INSUFFICIENT_CARDS';

  constructor(
    readonly requested: number,
    readonly eligible: number,
    readonly excludedByHistory: number,
  ) {
    const remedy =
      excludedByHistory > 0
        ? 'reduce the question count or clear the quiz history'
        : 'reduce the question count';
    super(
      `Only ${eligible} eligible ${eligible === 1 ? 'card remains' : 'cards remain'} for ${requested} questions; ${remedy}.`,
    );
  }
}

/**
 * Not enough distinct wrong answers and answer reuse is off
 */
export class InsufficientPoolError extends QuizError {
  readonly code = 'INSUFFICIENT_POOL';

  constructor(
    readonly required: number,
    readonly available: number,
  ) {
    super(
      `Need ${required} distinct wrong answers but only ${available} ${available === 1 ? 'is' : 'are'} available; reduce the number of choices or allow answer reuse.`,
    );
  }
}

export class DeckNotFoundError extends QuizError {
  readonly code = 'DECK_NOT_FOUND';

  constructor(readonly deckName: string) {
    super(`Deck not found: ${deckName}`);
  }
}

export class InvalidAnswerError extends QuizError {
  readonly code = 'INVALID_ANSWER';

  constructor(
    readonly questionNumber: number,
    readonly choiceIndex: number,
  ) {
    super(`Question ${questionNumber} has no choice at index ${choiceIndex}`);
  }
}

export function isQuizError(value: unknown): value is QuizError {
  return value instanceof QuizError;
}
