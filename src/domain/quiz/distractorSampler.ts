/**
 * Distractor Sampler Module
 *
 * Picks the wrong answers for a question and places the correct answer
 * among them at a random position.
 */

import { distinctAnswers } from './answerText';
import { InsufficientPoolError } from './errors';
import { type RandomSource, defaultRandom, randomInt, sampleWithoutReplacement, shuffle } from './random';

export interface ChoiceSamplingInput {
  /** Correct answer text (kept verbatim in the output) */
  correctAnswer: string;
  /** Candidate answer texts; duplicates and the correct answer are dropped */
  candidates: Iterable<string>;
  /** Total choices wanted, correct answer included */
  choiceCount: number;
  /** Fill a shortfall by repeating candidates */
  allowReuse: boolean;
  random?: RandomSource;
}

export interface SampledChoices {
  choices: string[];
  correctIndex: number;
}

/**
 * Select `choiceCount - 1` distractors
 *
 * - Enough distinct candidates: sampled uniformly without replacement.
 * - Too few, reuse off: InsufficientPoolError.
 * - Too few, reuse on: every candidate once, the rest drawn with replacement.
 *
 * A distractor never equals the correct answer, even with reuse.
 */
export function sampleDistractors(
  correctAnswer: string,
  candidates: Iterable<string>,
  count: number,
  allowReuse: boolean,
  random: RandomSource = defaultRandom,
): string[] {
  const pool = distinctAnswers(candidates, [correctAnswer]);

  if (pool.length >= count) {
    return sampleWithoutReplacement(pool, count, random);
  }

  // An empty pool has nothing to reuse
  if (!allowReuse || pool.length === 0) {
    throw new InsufficientPoolError(count, pool.length);
  }

  const distractors = shuffle(pool, random);
  while (distractors.length < count) {
    distractors.push(pool[randomInt(random, pool.length)]);
  }
  return distractors;
}

/**
 * Build the ordered choices for one question
 */
export function sampleChoices(input: ChoiceSamplingInput): SampledChoices {
  const random = input.random ?? defaultRandom;
  const distractors = sampleDistractors(
    input.correctAnswer,
    input.candidates,
    input.choiceCount - 1,
    input.allowReuse,
    random,
  );

  const ordered = shuffle(
    [
      { text: input.correctAnswer, correct: true },
      ...distractors.map((text) => ({ text, correct: false })),
    ],
    random,
  );

  return {
    choices: ordered.map((choice) => choice.text),
    correctIndex: ordered.findIndex((choice) => choice.correct),
  };
}
