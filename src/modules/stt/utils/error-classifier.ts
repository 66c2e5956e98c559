/**
 * Error Classification Utility
 * Maps recognition provider failures (gRPC status, HTTP status, socket
 * errors) to a category and a message the user can act on
 */

import { logger } from '@/shared/utils';
import { DictationError, EXIT_CODES } from '@/shared/errors';

export enum SpeechErrorType {
  AUTH = 'auth',
  CONFIG = 'config',
  QUOTA = 'quota',
  /** Provider ended the stream at its maximum duration */
  LIMIT = 'limit',
  NETWORK = 'network',
  SERVER = 'server',
  CANCELLED = 'cancelled',
  UNKNOWN = 'unknown',
}

export interface ClassifiedError {
  type: SpeechErrorType;
  originalError: Error;
  /** gRPC status code (0-16) */
  grpcCode?: number;
  /** HTTP status code */
  statusCode?: number;
  message: string;
  /** Ends the dictation with an error exit */
  fatal: boolean;
}

/**
 * gRPC status codes used by Google Cloud client libraries
 * Reference: https://grpc.github.io/grpc/core/md_doc_statuscodes.html
 */
export const GRPC_STATUS = {
  CANCELLED: 1,
  UNKNOWN: 2,
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  OUT_OF_RANGE: 11,
  INTERNAL: 13,
  UNAVAILABLE: 14,
  UNAUTHENTICATED: 16,
} as const;

export class RecognitionError extends DictationError {
  readonly classification: ClassifiedError;

  constructor(classification: ClassifiedError) {
    super('recognition', classification.message, EXIT_CODES.FATAL, {
      cause: classification.originalError,
    });
    this.name = 'RecognitionError';
    this.classification = classification;
  }
}

function numericProperty(error: Error, key: 'code' | 'status' | 'statusCode'): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * gRPC errors carry a small numeric `code`
 */
function extractGrpcCode(error: Error): number | undefined {
  const code = numericProperty(error, 'code');
  if (code !== undefined && code >= 0 && code <= 16) {
    return code;
  }
  return undefined;
}

/**
 * HTTP status code carried as an error property
 */
function extractStatusCode(error: Error): number | undefined {
  for (const key of ['status', 'statusCode', 'code'] as const) {
    const value = numericProperty(error, key);
    if (value !== undefined && value >= 100 && value <= 599) {
      return value;
    }
  }
  return undefined;
}

/**
 * HTTP status code mentioned in the message, e.g. "HTTP 401: Unauthorized",
 * "Unexpected server response: 403"
 */
function extractStatusFromMessage(error: Error): number | undefined {
  const statusMatch = error.message.match(/(?:HTTP\s|response:\s)?\b([45]\d{2})\b(?:\s|:|$)/i);
  if (statusMatch) {
    return parseInt(statusMatch[1], 10);
  }

  return undefined;
}

function isNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const networkKeywords = [
    'network',
    'timeout',
    'timed out',
    'econnrefused',
    'econnreset',
    'etimedout',
    'enotfound',
    'eai_again',
    'socket',
    'getaddrinfo',
  ];

  return networkKeywords.some((keyword) => message.includes(keyword));
}

/**
 * Client-side credential failures (no gRPC status, raised by the auth library)
 */
function isCredentialsError(error: Error): boolean {
  return /credential|invalid_grant|private key/i.test(error.message);
}

function classified(
  error: Error,
  type: SpeechErrorType,
  message: string,
  codes: { grpcCode?: number; statusCode?: number } = {}
): ClassifiedError {
  return {
    type,
    originalError: error,
    ...codes,
    message,
    fatal: type !== SpeechErrorType.LIMIT && type !== SpeechErrorType.CANCELLED,
  };
}

function classifyGrpc(error: Error, grpcCode: number): ClassifiedError | null {
  switch (grpcCode) {
    case GRPC_STATUS.UNAUTHENTICATED:
      return classified(
        error,
        SpeechErrorType.AUTH,
        'Authentication failed: check the service-account key in GOOGLE_APPLICATION_CREDENTIALS',
        { grpcCode }
      );

    case GRPC_STATUS.PERMISSION_DENIED:
      return classified(
        error,
        SpeechErrorType.AUTH,
        'Permission denied: the credentials cannot use the Speech-to-Text API for this project',
        { grpcCode }
      );

    case GRPC_STATUS.INVALID_ARGUMENT:
    case GRPC_STATUS.NOT_FOUND:
      return classified(error, SpeechErrorType.CONFIG, `Invalid recognition request: ${error.message}`, {
        grpcCode,
      });

    case GRPC_STATUS.RESOURCE_EXHAUSTED:
      return classified(error, SpeechErrorType.QUOTA, 'Speech quota exhausted', { grpcCode });

    case GRPC_STATUS.OUT_OF_RANGE:
      return classified(error, SpeechErrorType.LIMIT, 'Maximum stream duration reached', { grpcCode });

    case GRPC_STATUS.UNAVAILABLE:
    case GRPC_STATUS.DEADLINE_EXCEEDED:
      return classified(
        error,
        SpeechErrorType.NETWORK,
        'Speech service unreachable: check the network connection',
        { grpcCode }
      );

    case GRPC_STATUS.CANCELLED:
      return classified(error, SpeechErrorType.CANCELLED, 'Recognition cancelled', { grpcCode });

    case GRPC_STATUS.INTERNAL:
    case GRPC_STATUS.UNKNOWN:
      return classified(error, SpeechErrorType.SERVER, 'Speech service error', { grpcCode });

    default:
      return null;
  }
}

function classifyHttp(error: Error, statusCode: number): ClassifiedError {
  switch (statusCode) {
    case 401:
      return classified(error, SpeechErrorType.AUTH, 'Invalid API key', { statusCode });
    case 403:
      return classified(error, SpeechErrorType.AUTH, 'Access forbidden', { statusCode });
    case 400:
      return classified(error, SpeechErrorType.CONFIG, 'Invalid request configuration', { statusCode });
    case 404:
      return classified(error, SpeechErrorType.CONFIG, 'Endpoint not found', { statusCode });
    case 429:
      return classified(error, SpeechErrorType.QUOTA, 'Rate limit exceeded', { statusCode });
    default:
      if (statusCode >= 500) {
        return classified(error, SpeechErrorType.SERVER, `Server error ${statusCode}`, { statusCode });
      }
      return classified(error, SpeechErrorType.CONFIG, `Client error ${statusCode}`, { statusCode });
  }
}

/**
 * Classify a recognition provider error
 */
export function classifySpeechError(error: Error): ClassifiedError {
  if (error instanceof RecognitionError) {
    return error.classification;
  }

  const grpcCode = extractGrpcCode(error);
  const statusCode = grpcCode === undefined ? extractStatusCode(error) : undefined;

  logger.debug('Classifying speech error', { message: error.message, grpcCode, statusCode });

  if (grpcCode !== undefined) {
    const result = classifyGrpc(error, grpcCode);
    if (result) {
      return result;
    }
  }

  if (statusCode !== undefined) {
    return classifyHttp(error, statusCode);
  }

  if (isCredentialsError(error)) {
    return classified(
      error,
      SpeechErrorType.AUTH,
      `Could not load credentials: ${error.message}`
    );
  }

  // Before the message status: "connect ECONNREFUSED 10.0.0.1:443" is not an HTTP 443
  if (isNetworkError(error)) {
    return classified(
      error,
      SpeechErrorType.NETWORK,
      'Speech service unreachable: check the network connection'
    );
  }

  const messageStatus = grpcCode === undefined ? extractStatusFromMessage(error) : undefined;
  if (messageStatus !== undefined) {
    return classifyHttp(error, messageStatus);
  }

  logger.warn('Unknown speech error type', { message: error.message });
  return classified(error, SpeechErrorType.UNKNOWN, error.message || 'Unknown recognition error');
}

export function toRecognitionError(error: Error): RecognitionError {
  if (error instanceof RecognitionError) {
    return error;
  }
  return new RecognitionError(classifySpeechError(error));
}

export function isFatalError(error: Error): boolean {
  return classifySpeechError(error).fatal;
}
