/**
 * Shared Configuration
 * Environment variables (from the process and an optional .env file)
 */

import dotenv from 'dotenv';
import { ConfigError } from '@/shared/errors';

dotenv.config();

export type EnvSource = Record<string, string | undefined>;

/**
 * Raw environment values. Parsing and defaults for dictation options live in
 * the dictation module config.
 */
export function readEnv(source: EnvSource = process.env) {
  return {
    NODE_ENV: source.NODE_ENV || 'development',
    LOG_LEVEL: source.LOG_LEVEL || 'warn',

    // Recognition
    STT_PROVIDER: source.STT_PROVIDER,
    LANGUAGE_CODE: source.LANGUAGE_CODE,
    GOOGLE_APPLICATION_CREDENTIALS: source.GOOGLE_APPLICATION_CREDENTIALS,
    GOOGLE_SPEECH_MODEL: source.GOOGLE_SPEECH_MODEL,
    DEEPGRAM_API_KEY: source.DEEPGRAM_API_KEY,
    DEEPGRAM_MODEL: source.DEEPGRAM_MODEL,

    // Output
    REMOVE_FILLERS: source.REMOVE_FILLERS,
    FILLER_WORDS: source.FILLER_WORDS,
    SHOW_LIVE_PREVIEW: source.SHOW_LIVE_PREVIEW,

    // Capture
    AUDIO_RECORDER: source.AUDIO_RECORDER,
    AUDIO_DEVICE: source.AUDIO_DEVICE,
  };
}

export type Env = ReturnType<typeof readEnv>;

export const env = readEnv();

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parse a boolean env value; unset or blank falls back to the default
 * @throws {ConfigError} On anything that is not a recognizable boolean
 */
export function parseBoolean(value: string | undefined, fallback: boolean, name: string): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;

  throw new ConfigError(`Invalid boolean for ${name}: "${value}" (expected true/false)`);
}

/**
 * Parse a comma separated list, dropping blanks
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
