/**
 * Quiz Session Generator Module
 *
 * Main orchestrator for building a quiz from a deck snapshot:
 * history exclusion, card selection, distractor sampling and pagination.
 * Generation has no side effects; history is committed by the caller once
 * the quiz is completed.
 */

import { validateQuizConfig } from './config';
import { sampleChoices } from './distractorSampler';
import { InsufficientCardsError } from './errors';
import { type RandomSource, defaultRandom, randomToken, sampleWithoutReplacement } from './random';
import type { Card, Deck, Question, QuizConfig, QuizPage, QuizSession } from './types';

export interface QuizGenerationInput {
  /** Tag-filtered deck snapshot */
  deck: Deck;
  /** Configuration overrides, validated against the defaults */
  config?: Partial<QuizConfig>;
  /** Card ids asked in earlier quizzes on this deck */
  history?: ReadonlySet<string>;
  /** Randomness source. Pass a seeded one for reproducible quizzes. */
  random?: RandomSource;
  /** Creation time. Pass explicit value for deterministic tests. */
  now?: number;
}

/**
 * Split questions into pages; the last page may be shorter
 */
export function paginateQuestions(questions: readonly Question[], perPage: number): QuizPage[] {
  if (!Number.isInteger(perPage) || perPage <= 0) {
    throw new RangeError(`perPage must be a positive integer (got ${perPage})`);
  }

  const pages: QuizPage[] = [];
  for (let i = 0; i < questions.length; i += perPage) {
    pages.push({ index: pages.length, questions: questions.slice(i, i + perPage) });
  }
  return pages;
}

/**
 * Cards still eligible after history exclusion
 *
 * History only applies when `saveHistory` is on.
 */
export function getEligibleCards(
  cards: readonly Card[],
  history: ReadonlySet<string>,
  saveHistory: boolean,
): Card[] {
  if (!saveHistory || history.size === 0) {
    return [...cards];
  }
  return cards.filter((card) => !history.has(card.id));
}

/**
 * Generate a quiz session from a deck snapshot
 *
 * @throws InvalidConfigError for malformed configuration
 * @throws InsufficientCardsError when fewer eligible cards than questions remain
 * @throws InsufficientPoolError when a question can't get enough distractors
 */
export function generateQuizSession(input: QuizGenerationInput): QuizSession {
  const config = validateQuizConfig(input.config);
  const random = input.random ?? defaultRandom;
  const history = input.history ?? new Set<string>();
  const cards = input.deck.cards;

  // 1. Eligible pool
  const eligible = getEligibleCards(cards, history, config.saveHistory);

  // 2. Selection
  if (eligible.length < config.questionCount) {
    throw new InsufficientCardsError(
      config.questionCount,
      eligible.length,
      cards.length - eligible.length,
    );
  }
  const selected = sampleWithoutReplacement(eligible, config.questionCount, random);

  // 3. Questions
  const distractorCards = config.distractorSource === 'deck' ? cards : selected;
  const questions: Question[] = selected.map((card, i) => {
    const { choices, correctIndex } = sampleChoices({
      correctAnswer: card.back,
      candidates: distractorCards.filter((other) => other.id !== card.id).map((other) => other.back),
      choiceCount: config.choiceCount,
      allowReuse: config.allowAnswerReuse,
      random,
    });

    return {
      number: i + 1,
      cardId: card.id,
      prompt: card.front,
      correctAnswer: card.back,
      choices,
      correctIndex,
    };
  });

  // 4. Pages
  const createdAt = input.now ?? Date.now();

  return {
    id: `quiz_${createdAt}_${randomToken(random)}`,
    deckId: input.deck.id,
    deckName: input.deck.name,
    config,
    questions,
    pages: paginateQuestions(questions, config.questionsPerPage),
    createdAt,
  };
}
