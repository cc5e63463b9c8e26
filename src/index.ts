export * from '@/domain/quiz';
export type { ICardSource, IStorageAdapter } from '@/ports';
export { InMemoryStorageAdapter, MockCardSource } from '@/adapters/mock';
export { FileStorageAdapter } from '@/adapters/filesystem/FileStorageAdapter';
export { JsonDeckSource, parseDeckFile } from '@/adapters/filesystem/JsonDeckSource';
export type { QuizSettings } from '@/settings';
export {
  DEFAULT_SETTINGS,
  applyQuizConfig,
  loadSettings,
  mergeSettings,
  saveSettings,
  settingsToQuizConfig,
} from '@/settings';
