/**
 * Google Speech Response Types and Runtime Type Guards
 * Shapes of StreamingRecognizeResponse messages as delivered by the v1 gapic stream
 */

export interface GoogleSpeechAlternative {
  transcript?: string | null;
  confidence?: number | null;
}

export interface GoogleStreamingResult {
  alternatives?: GoogleSpeechAlternative[] | null;
  isFinal?: boolean | null;
  stability?: number | null;
}

export interface GoogleStreamingResponse {
  results?: GoogleStreamingResult[] | null;
  speechEventType?: string | number | null;
  error?: { code?: number | null; message?: string | null } | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isResult(value: unknown): value is GoogleStreamingResult {
  if (!isRecord(value)) {
    return false;
  }
  const { alternatives } = value;
  if (alternatives === undefined || alternatives === null) {
    return true;
  }
  return (
    Array.isArray(alternatives) &&
    alternatives.every(
      (alternative) =>
        isRecord(alternative) &&
        (alternative.transcript === undefined ||
          alternative.transcript === null ||
          typeof alternative.transcript === 'string')
    )
  );
}

/**
 * Runtime type guard for streaming recognize responses
 *
 * @example
 * ```typescript
 * stream.on('data', (data: unknown) => {
 *   if (!isStreamingRecognizeResponse(data)) return;
 *   for (const result of data.results ?? []) { ... }
 * });
 * ```
 */
export function isStreamingRecognizeResponse(data: unknown): data is GoogleStreamingResponse {
  if (!isRecord(data)) {
    return false;
  }

  const { results, error } = data;

  if (error !== undefined && error !== null && !isRecord(error)) {
    return false;
  }

  if (results === undefined || results === null) {
    return true;
  }

  return Array.isArray(results) && results.every(isResult);
}
