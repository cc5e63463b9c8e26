import { InvalidConfigError } from './errors';
import type { DistractorSource, QuizConfig } from './types';

/**
 * Default quiz configuration
 */
export const DEFAULT_QUIZ_CONFIG: QuizConfig = {
  questionCount: 25,
  choiceCount: 4,
  questionsPerPage: 5,
  allowAnswerReuse: true,
  saveHistory: false,
  excludedTags: [],
  distractorSource: 'deck',
};

const DISTRACTOR_SOURCES: readonly DistractorSource[] = ['deck', 'session'];

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isDistractorSource(value: unknown): value is DistractorSource {
  return DISTRACTOR_SOURCES.some((source) => source === value);
}

/**
 * Merge overrides onto the defaults and check every option
 *
 * @param overrides - Partial configuration, e.g. from a dialog or settings
 * @returns A complete, validated configuration (excluded tags copied)
 * @throws InvalidConfigError listing every violated option
 */
export function validateQuizConfig(overrides: Partial<QuizConfig> = {}): QuizConfig {
  const config = { ...DEFAULT_QUIZ_CONFIG, ...overrides };
  const problems: string[] = [];

  if (!isPositiveInteger(config.questionCount)) {
    problems.push(`questionCount must be a positive integer (got ${String(config.questionCount)})`);
  }
  if (!Number.isInteger(config.choiceCount) || config.choiceCount < 2) {
    problems.push(`choiceCount must be an integer of at least 2 (got ${String(config.choiceCount)})`);
  }
  if (!isPositiveInteger(config.questionsPerPage)) {
    problems.push(
      `questionsPerPage must be a positive integer (got ${String(config.questionsPerPage)})`,
    );
  }
  if (typeof config.allowAnswerReuse !== 'boolean') {
    problems.push('allowAnswerReuse must be a boolean');
  }
  if (typeof config.saveHistory !== 'boolean') {
    problems.push('saveHistory must be a boolean');
  }
  if (!Array.isArray(config.excludedTags) || config.excludedTags.some((t) => typeof t !== 'string')) {
    problems.push('excludedTags must be a list of strings');
  }
  if (!isDistractorSource(config.distractorSource)) {
    problems.push(`distractorSource must be one of ${DISTRACTOR_SOURCES.join(', ')}`);
  }

  if (problems.length > 0) {
    throw new InvalidConfigError(problems);
  }

  return { ...config, excludedTags: [...config.excludedTags] };
}
