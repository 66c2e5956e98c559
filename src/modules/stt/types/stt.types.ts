/**
 * Streaming Recognition Types
 * Provider-neutral contract between the dictation session and a cloud recognizer
 */

import type { TranscriptSegment } from './transcript.types';

export const STT_PROVIDERS = ['google', 'deepgram'] as const;

export type STTProviderName = (typeof STT_PROVIDERS)[number];

export type ConnectionState = 'connecting' | 'open' | 'finishing' | 'closed' | 'error';

export interface RecognitionConfig {
  sessionId: string;
  languageCode: string;
  sampleRate: number;
  channels: number;
  /**
   * Ask the provider for partial (non-final) results
   */
  interimResults: boolean;
}

export interface RecognitionHandlers {
  onSegment(segment: TranscriptSegment): void;
  onError(error: Error): void;
  /**
   * The provider closed the stream without being asked to
   */
  onEnd(): void;
}

export interface RecognitionStream {
  readonly state: ConnectionState;
  readonly isOpen: boolean;
  write(frame: Buffer): void;
  /**
   * Signal end of audio, wait (bounded) for outstanding final results, release the connection
   */
  finish(): Promise<void>;
}

export interface RecognitionProvider {
  readonly name: STTProviderName;
  open(config: RecognitionConfig, handlers: RecognitionHandlers): Promise<RecognitionStream>;
}

export interface RecognitionStreamMetrics {
  framesForwarded: number;
  bytesForwarded: number;
  responsesReceived: number;
  segmentsEmitted: number;
}
