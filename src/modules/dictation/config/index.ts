export {
  DEFAULT_LANGUAGE_CODE,
  USAGE,
  loadDictationConfig,
  parseCliArgs,
} from './dictation.config';
export type { LoadConfigDeps } from './dictation.config';
