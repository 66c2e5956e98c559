/**
 * Dictation Module Public Exports
 */

export { DictationController } from './controllers/dictation.controller';
export type { DictationConsole } from './controllers/dictation.controller';
export { DictationSession, createDictationSession } from './services';
export { USAGE, loadDictationConfig, parseCliArgs } from './config';
export type {
  CliOptions,
  DictationConfig,
  DictationEndReason,
  DictationResult,
} from './types/dictation.types';
