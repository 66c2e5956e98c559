/**
 * Timeout Configuration
 */

export const TIMEOUT_CONFIG = {
  CONNECTION_TIMEOUT_MS: 10000, // 10s to open the provider connection
  /**
   * After end of audio, how long to wait for the provider to deliver the
   * remaining final results before the connection is dropped
   */
  FINALIZATION_TIMEOUT_MS: 5000,
} as const;

/**
 * STT Service Constants
 */
export const STT_CONSTANTS = {
  /**
   * WebSocket ready state constants
   * Reference: https://developer.mozilla.org/en-US/docs/Web/API/WebSocket/readyState
   */
  WEBSOCKET_STATE: {
    CONNECTING: 0,
    OPEN: 1,
    CLOSING: 2,
    CLOSED: 3,
  } as const,

  /**
   * Deepgram closes idle sockets after ~10s without audio or KeepAlive
   * Reference: https://developers.deepgram.com/docs/keep-alive
   */
  KEEPALIVE_INTERVAL_MS: 8000,

  /**
   * Log every Nth forwarded frame at debug level
   */
  CHUNK_LOG_FREQUENCY: 100,
} as const;
