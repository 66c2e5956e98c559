/**
 * Google Cloud Speech-to-Text Configuration
 * v1 streaming recognize
 */

export const GOOGLE_SPEECH_CONFIG = {
  encoding: 'LINEAR16' as const,
  enableAutomaticPunctuation: true,
  maxAlternatives: 1,
  // Keep listening across pauses until the user interrupts
  singleUtterance: false,
} as const;

export interface GoogleSpeechOptions {
  /**
   * Service-account key file; when absent the client library's default
   * credential lookup applies
   */
  keyFilename?: string;
  model?: string;
}
