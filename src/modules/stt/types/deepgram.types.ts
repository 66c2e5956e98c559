/**
 * Deepgram Type Definitions and Runtime Type Guards
 * Shapes of Deepgram live transcription messages
 */

export interface DeepgramTranscriptResponse {
  channel: {
    alternatives: Array<{
      transcript: string;
      confidence?: number;
    }>;
  };
  is_final?: boolean;
  speech_final?: boolean;
}

export interface DeepgramMetadataResponse {
  request_id?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Runtime type guard for Deepgram transcript responses
 *
 * @example
 * ```typescript
 * connection.on(LiveTranscriptionEvents.Transcript, (data: unknown) => {
 *   if (!isValidTranscriptResponse(data)) return;
 *   const transcript = data.channel.alternatives[0].transcript;
 * });
 * ```
 */
export function isValidTranscriptResponse(data: unknown): data is DeepgramTranscriptResponse {
  if (!data || typeof data !== 'object' || !('channel' in data)) {
    return false;
  }

  const { channel } = data;
  if (!channel || typeof channel !== 'object' || !('alternatives' in channel)) {
    return false;
  }

  const { alternatives } = channel;
  if (!Array.isArray(alternatives) || alternatives.length === 0) {
    return false;
  }

  const first: unknown = alternatives[0];
  if (!first || typeof first !== 'object' || !('transcript' in first)) {
    return false;
  }

  return typeof first.transcript === 'string';
}

export function isValidMetadataResponse(data: unknown): data is DeepgramMetadataResponse {
  return typeof data === 'object' && data !== null;
}
