export {
  DictationError,
  ConfigError,
  MicrophoneError,
  EXIT_CODES,
  isDictationError,
  toError,
} from './dictation-error';
export type { DictationErrorCode } from './dictation-error';
