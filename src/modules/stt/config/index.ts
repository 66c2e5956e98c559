export { TIMEOUT_CONFIG, STT_CONSTANTS } from './timeout.config';
export { GOOGLE_SPEECH_CONFIG } from './google-speech.config';
export type { GoogleSpeechOptions } from './google-speech.config';
export { DEEPGRAM_CONFIG } from './deepgram.config';
export type { DeepgramOptions, DeepgramLiveOptions } from './deepgram.config';
