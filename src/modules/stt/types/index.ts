export type { TranscriptSegment } from './transcript.types';
export { STT_PROVIDERS } from './stt.types';
export type {
  ConnectionState,
  RecognitionConfig,
  RecognitionHandlers,
  RecognitionProvider,
  RecognitionStream,
  RecognitionStreamMetrics,
  STTProviderName,
} from './stt.types';
export { isStreamingRecognizeResponse } from './google-speech.types';
export type {
  GoogleSpeechAlternative,
  GoogleStreamingResponse,
  GoogleStreamingResult,
} from './google-speech.types';
export { isValidTranscriptResponse, isValidMetadataResponse } from './deepgram.types';
export type { DeepgramTranscriptResponse, DeepgramMetadataResponse } from './deepgram.types';
