/**
 * Quiz Domain Types
 *
 * Types for turning a deck of flashcards into a multiple-choice quiz
 * and for tracking which cards have already been asked.
 */

// ============ Card Types ============

/**
 * A front/back flashcard, the atomic unit of a deck
 */
export interface Card {
  /** Identifier, unique within its deck */
  readonly id: string;
  /** Prompt side (may contain HTML) */
  readonly front: string;
  /** Answer side (may contain HTML) */
  readonly back: string;
  /** Tags attached to the card */
  readonly tags: readonly string[];
}

/**
 * Tag-filtered snapshot of a deck, as produced by a card source
 */
export interface Deck {
  id: string;
  name: string;
  cards: readonly Card[];
}

/**
 * Deck summary for pickers
 */
export interface DeckInfo {
  id: string;
  name: string;
  cardCount: number;
}

// ============ Config Types ============

/**
 * Where distractors are drawn from
 * - deck: back texts of every card in the deck snapshot
 * - session: back texts of the other cards selected for the quiz
 */
export type DistractorSource = 'deck' | 'session';

/**
 * Options controlling a generated quiz
 */
export interface QuizConfig {
  /** Number of questions (> 0) */
  questionCount: number;
  /** Choices per question, including the correct one (>= 2) */
  choiceCount: number;
  /** Questions shown per page (> 0) */
  questionsPerPage: number;
  /** Repeat distractors when the deck has too few distinct answers */
  allowAnswerReuse: boolean;
  /** Skip previously asked cards and record this quiz's cards once completed */
  saveHistory: boolean;
  /** Tag patterns whose cards are left out of the quiz */
  excludedTags: string[];
  /** Pool the distractors come from */
  distractorSource: DistractorSource;
}

// ============ Question Types ============

/**
 * A card promoted to multiple-choice form
 */
export interface Question {
  /** 1-based position in the session */
  number: number;
  /** Source card identifier */
  cardId: string;
  /** Card front */
  prompt: string;
  /** Card back */
  correctAnswer: string;
  /** Choice texts in display order, the correct answer among them */
  choices: string[];
  /** Index of the correct answer in `choices` */
  correctIndex: number;
}

/**
 * One page of questions
 */
export interface QuizPage {
  /** 0-based page index */
  index: number;
  questions: Question[];
}

/**
 * A generated quiz, ready to be rendered and answered
 */
export interface QuizSession {
  id: string;
  deckId: string;
  deckName: string;
  /** Config snapshot the session was generated with */
  config: QuizConfig;
  questions: Question[];
  pages: QuizPage[];
  createdAt: number;
}

// ============ History Types ============

/**
 * Persisted record of the cards already asked for one deck
 */
export interface QuizHistoryRecord {
  /** Schema version for migrations */
  version: number;
  /** Deck the record belongs to */
  deckId: string;
  /** Card identifiers asked in earlier completed quizzes */
  cardIds: string[];
  /** Last time this record was updated */
  lastUpdated: number;
}

/** Current history schema version */
export const QUIZ_HISTORY_VERSION = 1;

// ============ Result Types ============

/**
 * Chosen choice index per question, aligned with `QuizSession.questions`.
 * `null` marks an unanswered question.
 */
export type QuizAnswers = ReadonlyArray<number | null>;

export interface QuizResultItem {
  number: number;
  cardId: string;
  prompt: string;
  chosenAnswer: string | null;
  correctAnswer: string;
  isCorrect: boolean;
}

/**
 * Graded quiz
 */
export interface QuizResult {
  sessionId: string;
  deckName: string;
  total: number;
  correct: number;
  /** Rounded percentage of correct answers */
  percent: number;
  items: QuizResultItem[];
}
