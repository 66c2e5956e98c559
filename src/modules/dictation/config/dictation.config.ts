/**
 * Dictation Configuration
 * Environment values (see .env.example) overridden by command-line flags
 */

import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { env, parseBoolean, parseList } from '@/shared/config';
import type { Env } from '@/shared/config';
import { ConfigError } from '@/shared/errors';
import { LogLevel, logger, parseLogLevel } from '@/shared/utils';
import {
  BLOCKS_PER_SECOND,
  CHANNELS,
  SAMPLE_RATE,
  SUPPORTED_RECORDERS,
} from '@/modules/audio';
import type { RecorderProgram } from '@/modules/audio';
import { DEEPGRAM_CONFIG, STT_PROVIDERS } from '@/modules/stt';
import type { STTProviderName } from '@/modules/stt';
import { DEFAULT_FILLER_WORDS } from '@/modules/transcript';
import type { CliOptions, DictationConfig } from '../types/dictation.types';

export const DEFAULT_LANGUAGE_CODE = 'en-US';

// BCP-47 tag, e.g. en-US, cmn-Hans-CN
const LANGUAGE_CODE_PATTERN = /^[A-Za-z]{2,3}(?:-[A-Za-z0-9]{2,8})*$/;

export const USAGE = `Usage: live-dictation [options]

Stream the microphone to a cloud speech recognizer. Press Ctrl+C to stop and
print the transcript as a single paragraph.

Options:
  -l, --language <code>   Recognition language (default: ${DEFAULT_LANGUAGE_CODE})
      --provider <name>   Recognition provider: ${STT_PROVIDERS.join(' | ')} (default: google)
      --keep-fillers      Keep filler words (um, uh, hmm) in the paragraph
      --no-preview        Do not show the live preview line
      --recorder <name>   Recorder program: ${SUPPORTED_RECORDERS.join(' | ')} (default: sox)
      --device <name>     Recording device passed to the recorder
  -v, --verbose           Debug logging on stderr
  -h, --help              Show this help
`;

/**
 * @throws {ConfigError} On unknown flags or missing flag values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        language: { type: 'string', short: 'l' },
        provider: { type: 'string' },
        'keep-fillers': { type: 'boolean', default: false },
        'no-preview': { type: 'boolean', default: false },
        recorder: { type: 'string' },
        device: { type: 'string' },
        verbose: { type: 'boolean', short: 'v', default: false },
      },
    });

    return {
      help: values.help === true,
      provider: values.provider,
      language: values.language,
      keepFillers: values['keep-fillers'] === true,
      noPreview: values['no-preview'] === true,
      recorder: values.recorder,
      device: values.device,
      verbose: values.verbose === true,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(message);
  }
}

function isProviderName(value: string): value is STTProviderName {
  return STT_PROVIDERS.some((provider) => provider === value);
}

function isRecorder(value: string): value is RecorderProgram {
  return SUPPORTED_RECORDERS.some((recorder) => recorder === value);
}

export interface LoadConfigDeps {
  fileExists: (path: string) => boolean;
}

/**
 * Resolve the full dictation configuration
 * @throws {ConfigError} On any invalid value
 */
export function loadDictationConfig(
  cli: CliOptions,
  source: Env = env,
  deps: LoadConfigDeps = { fileExists: existsSync }
): DictationConfig {
  const providerName = (cli.provider ?? source.STT_PROVIDER ?? 'google').trim().toLowerCase();
  if (!isProviderName(providerName)) {
    throw new ConfigError(
      `Unknown recognition provider "${providerName}" (expected one of: ${STT_PROVIDERS.join(', ')})`
    );
  }

  const languageCode = (cli.language ?? source.LANGUAGE_CODE ?? DEFAULT_LANGUAGE_CODE).trim();
  if (!LANGUAGE_CODE_PATTERN.test(languageCode)) {
    throw new ConfigError(`Invalid language code "${languageCode}" (expected a tag like en-US)`);
  }

  const recorder = (cli.recorder ?? source.AUDIO_RECORDER ?? 'sox').trim().toLowerCase();
  if (!isRecorder(recorder)) {
    throw new ConfigError(
      `Unsupported recorder "${recorder}" (expected one of: ${SUPPORTED_RECORDERS.join(', ')})`
    );
  }

  const removeFillers = cli.keepFillers
    ? false
    : parseBoolean(source.REMOVE_FILLERS, true, 'REMOVE_FILLERS');
  const showPreview = cli.noPreview
    ? false
    : parseBoolean(source.SHOW_LIVE_PREVIEW, true, 'SHOW_LIVE_PREVIEW');

  const configuredFillers = parseList(source.FILLER_WORDS);
  const fillerWords = configuredFillers.length > 0 ? configuredFillers : DEFAULT_FILLER_WORDS;

  const keyFilename = source.GOOGLE_APPLICATION_CREDENTIALS?.trim() || undefined;
  const device = (cli.device ?? source.AUDIO_DEVICE)?.trim() || undefined;
  const apiKey = source.DEEPGRAM_API_KEY?.trim() || undefined;

  if (providerName === 'google') {
    if (keyFilename && !deps.fileExists(keyFilename)) {
      throw new ConfigError(`GOOGLE_APPLICATION_CREDENTIALS points to a missing file: ${keyFilename}`);
    }
    if (!keyFilename) {
      logger.warn('GOOGLE_APPLICATION_CREDENTIALS not set, relying on default credential lookup');
    }
  }

  if (providerName === 'deepgram' && !apiKey) {
    throw new ConfigError('DEEPGRAM_API_KEY is required when STT_PROVIDER=deepgram');
  }

  return {
    provider: providerName,
    languageCode,
    removeFillers,
    fillerWords,
    showPreview,
    logLevel: cli.verbose ? LogLevel.DEBUG : parseLogLevel(source.LOG_LEVEL),
    audio: {
      sampleRate: SAMPLE_RATE,
      channels: CHANNELS,
      blocksPerSecond: BLOCKS_PER_SECOND,
      recorder,
      ...(device ? { device } : {}),
    },
    google: {
      ...(keyFilename ? { keyFilename } : {}),
      ...(source.GOOGLE_SPEECH_MODEL ? { model: source.GOOGLE_SPEECH_MODEL.trim() } : {}),
    },
    deepgram: {
      ...(apiKey ? { apiKey } : {}),
      model: source.DEEPGRAM_MODEL?.trim() || DEEPGRAM_CONFIG.model,
    },
  };
}
