/**
 * STT Module Public Exports
 */

export {
  createRecognitionProvider,
  GoogleSpeechProvider,
  DeepgramProvider,
} from './services';
export type { RecognitionProviderSettings } from './services';

export {
  classifySpeechError,
  isFatalError,
  RecognitionError,
  SpeechErrorType,
} from './utils/error-classifier';
export type { ClassifiedError } from './utils/error-classifier';

export { STT_PROVIDERS } from './types';
export type {
  ConnectionState,
  RecognitionConfig,
  RecognitionHandlers,
  RecognitionProvider,
  RecognitionStream,
  STTProviderName,
  TranscriptSegment,
} from './types';

export { DEEPGRAM_CONFIG } from './config';
