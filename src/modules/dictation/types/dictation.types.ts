/**
 * Dictation Types
 */

import type { MicrophoneOptions } from '@/modules/audio';
import type { STTProviderName } from '@/modules/stt';
import type { CleanTextOptions } from '@/modules/transcript';
import type { DictationError } from '@/shared/errors';
import type { LogLevel } from '@/shared/utils';

export interface DictationConfig {
  provider: STTProviderName;
  languageCode: string;
  removeFillers: boolean;
  fillerWords: readonly string[];
  showPreview: boolean;
  logLevel: LogLevel;
  audio: MicrophoneOptions;
  google: {
    keyFilename?: string;
    model?: string;
  };
  deepgram: {
    apiKey?: string;
    model: string;
  };
}

export interface CliOptions {
  help: boolean;
  provider?: string;
  language?: string;
  keepFillers: boolean;
  noPreview: boolean;
  recorder?: string;
  device?: string;
  verbose: boolean;
}

export type DictationState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

/**
 * - interrupted: the user stopped the run
 * - stream-limit: the provider hit its maximum stream duration
 * - provider-closed: the provider closed the stream on its own
 * - error: fatal microphone or recognition failure
 */
export type DictationEndReason = 'interrupted' | 'stream-limit' | 'provider-closed' | 'error';

export type SessionEnd =
  | { reason: 'stream-limit' | 'provider-closed' }
  | { reason: 'error'; error: DictationError };

export interface DictationSessionOptions {
  languageCode: string;
  sampleRate: number;
  channels: number;
  interimResults: boolean;
  text: CleanTextOptions;
}

export interface DictationResult {
  sessionId: string;
  paragraph: string;
  finalSegments: number;
  durationMs: number;
  endReason: DictationEndReason;
  error?: DictationError;
}
