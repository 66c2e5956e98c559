/**
 * Deepgram Configuration
 * Live transcription over Deepgram's websocket API
 */

export const DEEPGRAM_CONFIG = {
  model: 'nova-2' as const,

  // Features
  smart_format: true,
  punctuate: true,
  endpointing: 300, // 300ms silence = end of utterance
  utterances: false,
  diarize: false,
  alternatives: 1,

  // Audio Format
  encoding: 'linear16' as const,
} as const;

export interface DeepgramOptions {
  apiKey: string;
  model: string;
}

// Keep as a type alias: `listen.live` takes the index-signed `LiveSchema`
export type DeepgramLiveOptions = {
  model: string;
  language: string;
  smart_format: boolean;
  punctuate: boolean;
  interim_results: boolean;
  endpointing: number | false;
  utterances: boolean;
  diarize: boolean;
  alternatives: number;
  encoding: string;
  sample_rate: number;
  channels: number;
};
