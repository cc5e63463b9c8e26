import type { DistractorSource, QuizConfig } from '@/domain/quiz/types';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';

const SETTINGS_KEY = 'settings';

/**
 * Persisted quiz settings (the last choices made in the quiz dialog)
 */
export interface QuizSettings {
  /** Deck preselected when a quiz is opened */
  defaultDeck: string;
  numQuestions: number;
  numChoices: number;
  questionsPerPage: number;
  allowAnswerReuse: boolean;
  /** Skip cards from previous quizzes and remember this quiz's cards */
  saveHistory: boolean;
  /** Tag patterns to leave out (e.g. "leech", "draft::*") */
  excludeTags: string[];
  distractorSource: DistractorSource;
  /** Start over with a fresh history once every card has been asked */
  resetHistoryWhenExhausted: boolean;
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: QuizSettings = {
  defaultDeck: '',
  numQuestions: 25,
  numChoices: 4,
  questionsPerPage: 5,
  allowAnswerReuse: true,
  saveHistory: false,
  excludeTags: [],
  distractorSource: 'deck',
  resetHistoryWhenExhausted: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick<T>(value: unknown, fallback: T, valid: (v: unknown) => v is T): T {
  return valid(value) ? value : fallback;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isStringArray = (v: unknown): v is string[] => Array.isArray(v) && v.every(isString);
const isDistractorSource = (v: unknown): v is DistractorSource => v === 'deck' || v === 'session';

/**
 * Fill settings from stored data; fields that are missing or of the wrong type
 * take their default
 */
export function mergeSettings(stored: unknown): QuizSettings {
  const data = isRecord(stored) ? stored : {};
  const d = DEFAULT_SETTINGS;
  return {
    defaultDeck: pick(data.defaultDeck, d.defaultDeck, isString),
    numQuestions: pick(data.numQuestions, d.numQuestions, isNumber),
    numChoices: pick(data.numChoices, d.numChoices, isNumber),
    questionsPerPage: pick(data.questionsPerPage, d.questionsPerPage, isNumber),
    allowAnswerReuse: pick(data.allowAnswerReuse, d.allowAnswerReuse, isBoolean),
    saveHistory: pick(data.saveHistory, d.saveHistory, isBoolean),
    excludeTags: [...pick(data.excludeTags, d.excludeTags, isStringArray)],
    distractorSource: pick(data.distractorSource, d.distractorSource, isDistractorSource),
    resetHistoryWhenExhausted: pick(data.resetHistoryWhenExhausted, d.resetHistoryWhenExhausted, isBoolean),
  };
}

/**
 * Load settings, filling anything missing from the defaults.
 * Unreadable settings fall back to the defaults.
 */
export async function loadSettings(storage: IStorageAdapter): Promise<QuizSettings> {
  try {
    return mergeSettings(await storage.read<unknown>(SETTINGS_KEY));
  } catch (error) {
    console.warn('Failed to load quiz settings, using defaults:', error);
    return mergeSettings(null);
  }
}

export async function saveSettings(storage: IStorageAdapter, settings: QuizSettings): Promise<void> {
  await storage.write(SETTINGS_KEY, settings);
}

/**
 * Quiz configuration the settings describe (validated at generation time)
 */
export function settingsToQuizConfig(settings: QuizSettings): QuizConfig {
  return {
    questionCount: settings.numQuestions,
    choiceCount: settings.numChoices,
    questionsPerPage: settings.questionsPerPage,
    allowAnswerReuse: settings.allowAnswerReuse,
    saveHistory: settings.saveHistory,
    excludedTags: [...settings.excludeTags],
    distractorSource: settings.distractorSource,
  };
}

/**
 * Fold a quiz configuration back into the settings, to remember it
 */
export function applyQuizConfig(settings: QuizSettings, config: QuizConfig, deckName: string): QuizSettings {
  return {
    ...settings,
    defaultDeck: deckName,
    numQuestions: config.questionCount,
    numChoices: config.choiceCount,
    questionsPerPage: config.questionsPerPage,
    allowAnswerReuse: config.allowAnswerReuse,
    saveHistory: config.saveHistory,
    excludeTags: [...config.excludedTags],
    distractorSource: config.distractorSource,
  };
}
