/**
 * Quiz Module
 *
 * Turns a deck of flashcards into a randomized multiple-choice quiz and
 * tracks which cards have already been asked.
 */

// Types
export type {
  Card,
  Deck,
  DeckInfo,
  DistractorSource,
  Question,
  QuizAnswers,
  QuizConfig,
  QuizHistoryRecord,
  QuizPage,
  QuizResult,
  QuizResultItem,
  QuizSession,
} from './types';
export { QUIZ_HISTORY_VERSION } from './types';

// Errors
export type { QuizErrorCode } from './errors';
export {
  DeckNotFoundError,
  InsufficientCardsError,
  InsufficientPoolError,
  InvalidAnswerError,
  InvalidConfigError,
  QuizError,
  isQuizError,
} from './errors';

// Config
export { DEFAULT_QUIZ_CONFIG, validateQuizConfig } from './config';

// Randomness
export type { RandomSource } from './random';
export { createSeededRandom, hashString, sampleWithoutReplacement, shuffle } from './random';

// Text and tags
export { answersMatch, distinctAnswers, normalizeAnswer, stripHtml } from './answerText';
export { filterExcludedCards, hasQuizzableText, isCardExcluded, parseExcludedTags } from './tagFilter';

// History
export { QuizHistoryStore, getQuizHistoryKey } from './historyStore';

// Generation
export type { ChoiceSamplingInput, SampledChoices } from './distractorSampler';
export { sampleChoices, sampleDistractors } from './distractorSampler';
export type { QuizGenerationInput } from './sessionGenerator';
export { generateQuizSession, getEligibleCards, paginateQuestions } from './sessionGenerator';

// Scoring and export
export { scoreQuizSession } from './scoring';
export { renderResultsHtml } from './exportHtml';

// Service
export type {
  QuizCompletion,
  QuizServiceDependencies,
  QuizServiceOptions,
  QuizStart,
} from './quizService';
export { QuizService } from './quizService';
