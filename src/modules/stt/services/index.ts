import { ConfigError } from '@/shared/errors';
import type { GoogleSpeechOptions } from '../config';
import type { RecognitionProvider, STTProviderName } from '../types';
import { DeepgramProvider } from './deepgram-live.service';
import { GoogleSpeechProvider } from './google-speech.service';

export { GoogleSpeechProvider, GoogleRecognitionStream, buildStreamingConfig } from './google-speech.service';
export type { SpeechClientFactory, SpeechStreamingClient } from './google-speech.service';
export { DeepgramProvider, DeepgramRecognitionStream, buildLiveOptions } from './deepgram-live.service';

export interface RecognitionProviderSettings {
  provider: STTProviderName;
  google: GoogleSpeechOptions;
  deepgram: {
    apiKey?: string;
    model: string;
  };
}

/**
 * Build the configured recognition provider
 * @throws {ConfigError} If the provider's credentials are missing
 */
export function createRecognitionProvider(settings: RecognitionProviderSettings): RecognitionProvider {
  switch (settings.provider) {
    case 'google':
      return new GoogleSpeechProvider(settings.google);

    case 'deepgram': {
      const { apiKey, model } = settings.deepgram;
      if (!apiKey) {
        throw new ConfigError('DEEPGRAM_API_KEY is required when STT_PROVIDER=deepgram');
      }
      return new DeepgramProvider({ apiKey, model });
    }
  }
}
