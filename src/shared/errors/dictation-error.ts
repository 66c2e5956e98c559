/**
 * Dictation Error Types
 */

export type DictationErrorCode = 'config' | 'microphone' | 'recognition';

export const EXIT_CODES = {
  OK: 0,
  FATAL: 1,
  CONFIG: 2,
  INTERRUPTED_TWICE: 130,
} as const;

export class DictationError extends Error {
  readonly code: DictationErrorCode;
  readonly exitCode: number;

  constructor(code: DictationErrorCode, message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DictationError';
    this.code = code;
    this.exitCode = exitCode;
  }
}

/**
 * Invalid or incomplete configuration, detected before capture starts
 */
export class ConfigError extends DictationError {
  constructor(message: string) {
    super('config', message, EXIT_CODES.CONFIG);
    this.name = 'ConfigError';
  }
}

/**
 * Microphone unavailable, permission denied, or recorder process failure
 */
export class MicrophoneError extends DictationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('microphone', message, EXIT_CODES.FATAL, options);
    this.name = 'MicrophoneError';
  }
}

export function isDictationError(error: unknown): error is DictationError {
  return error instanceof DictationError;
}

/**
 * Normalize a thrown or emitted value into an Error. SDK error events often
 * carry plain objects with a message field.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return new Error(value.message);
  }
  return new Error(String(value));
}
