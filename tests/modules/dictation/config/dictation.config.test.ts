/**
 * Dictation Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadDictationConfig, parseCliArgs, USAGE } from '@/modules/dictation/config';
import type { CliOptions } from '@/modules/dictation';
import { readEnv } from '@/shared/config';
import { ConfigError } from '@/shared/errors';
import { LogLevel } from '@/shared/utils';
import { DEFAULT_FILLER_WORDS } from '@/modules/transcript';

function cli(overrides: Partial<CliOptions> = {}): CliOptions {
  return { help: false, keepFillers: false, noPreview: false, verbose: false, ...overrides };
}

const noFiles = { fileExists: () => false };
const anyFile = { fileExists: () => true };

describe('parseCliArgs', () => {
  it('should default every flag', () => {
    expect(parseCliArgs([])).toEqual({
      help: false,
      provider: undefined,
      language: undefined,
      keepFillers: false,
      noPreview: false,
      recorder: undefined,
      device: undefined,
      verbose: false,
    });
  });

  it('should read long and short flags', () => {
    const options = parseCliArgs([
      '-l',
      'de-DE',
      '--provider',
      'deepgram',
      '--keep-fillers',
      '--no-preview',
      '--recorder',
      'arecord',
      '--device',
      'hw:1,0',
      '-v',
    ]);

    expect(options).toEqual({
      help: false,
      provider: 'deepgram',
      language: 'de-DE',
      keepFillers: true,
      noPreview: true,
      recorder: 'arecord',
      device: 'hw:1,0',
      verbose: true,
    });
  });

  it('should recognize help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it('should reject unknown flags and stray arguments', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['extra'])).toThrow(ConfigError);
  });

  it('should reject a flag missing its value', () => {
    expect(() => parseCliArgs(['--language'])).toThrow(ConfigError);
  });

  it('should document every flag in the usage text', () => {
    const flags = ['--language', '--provider', '--keep-fillers', '--no-preview', '--recorder', '--device', '--verbose', '--help'];
    for (const flag of flags) {
      expect(USAGE).toContain(flag);
    }
  });
});

describe('loadDictationConfig', () => {
  it('should apply defaults', () => {
    expect(loadDictationConfig(cli(), readEnv({}), noFiles)).toEqual({
      provider: 'google',
      languageCode: 'en-US',
      removeFillers: true,
      fillerWords: DEFAULT_FILLER_WORDS,
      showPreview: true,
      logLevel: LogLevel.WARN,
      audio: { sampleRate: 16000, channels: 1, blocksPerSecond: 10, recorder: 'sox' },
      google: {},
      deepgram: { model: 'nova-2' },
    });
  });

  it('should read settings from the environment', () => {
    const config = loadDictationConfig(
      cli(),
      readEnv({
        STT_PROVIDER: 'Deepgram',
        DEEPGRAM_API_KEY: 'test-secret',
        DEEPGRAM_MODEL: 'nova-3',
        LANGUAGE_CODE: 'es-ES',
        REMOVE_FILLERS: 'false',
        FILLER_WORDS: 'like, basically',
        SHOW_LIVE_PREVIEW: 'no',
        AUDIO_RECORDER: 'arecord',
        AUDIO_DEVICE: 'hw:0',
        LOG_LEVEL: 'info',
      }),
      noFiles
    );

    expect(config).toMatchObject({
      provider: 'deepgram',
      languageCode: 'es-ES',
      removeFillers: false,
      fillerWords: ['like', 'basically'],
      showPreview: false,
      logLevel: LogLevel.INFO,
      audio: { recorder: 'arecord', device: 'hw:0' },
      deepgram: { apiKey: 'test-secret', model: 'nova-3' },
    });
  });

  it('should let flags override the environment', () => {
    const config = loadDictationConfig(
      cli({ language: 'fr-FR', keepFillers: true, noPreview: true, recorder: 'rec', device: 'default', verbose: true }),
      readEnv({ LANGUAGE_CODE: 'es-ES', REMOVE_FILLERS: 'true', SHOW_LIVE_PREVIEW: 'true', AUDIO_RECORDER: 'sox' }),
      noFiles
    );

    expect(config.languageCode).toBe('fr-FR');
    expect(config.removeFillers).toBe(false);
    expect(config.showPreview).toBe(false);
    expect(config.audio).toEqual({
      sampleRate: 16000,
      channels: 1,
      blocksPerSecond: 10,
      recorder: 'rec',
      device: 'default',
    });
    expect(config.logLevel).toBe(LogLevel.DEBUG);
  });

  it('should pass the Google key file and model through', () => {
    const config = loadDictationConfig(
      cli(),
      readEnv({ GOOGLE_APPLICATION_CREDENTIALS: '/keys/test-key.json', GOOGLE_SPEECH_MODEL: 'latest_long' }),
      anyFile
    );

    expect(config.google).toEqual({ keyFilename: '/keys/test-key.json', model: 'latest_long' });
  });

  describe('validation', () => {
    it('should reject an unknown provider', () => {
      expect(() => loadDictationConfig(cli({ provider: 'azure' }), readEnv({}), noFiles)).toThrow(
        'Unknown recognition provider "azure" (expected one of: google, deepgram)'
      );
    });

    it('should reject a malformed language code', () => {
      expect(() => loadDictationConfig(cli({ language: 'english' }), readEnv({}), noFiles)).toThrow(
        'Invalid language code "english" (expected a tag like en-US)'
      );
    });

    it('should accept multi-part language tags', () => {
      expect(loadDictationConfig(cli({ language: 'cmn-Hans-CN' }), readEnv({}), noFiles).languageCode).toBe(
        'cmn-Hans-CN'
      );
    });

    it('should reject an unsupported recorder', () => {
      expect(() => loadDictationConfig(cli({ recorder: 'ffmpeg' }), readEnv({}), noFiles)).toThrow(
        'Unsupported recorder "ffmpeg" (expected one of: sox, rec, arecord)'
      );
    });

    it('should reject a malformed boolean', () => {
      expect(() => loadDictationConfig(cli(), readEnv({ REMOVE_FILLERS: 'sometimes' }), noFiles)).toThrow(
        ConfigError
      );
    });

    it('should reject a credentials path that does not exist', () => {
      expect(() =>
        loadDictationConfig(cli(), readEnv({ GOOGLE_APPLICATION_CREDENTIALS: '/keys/missing.json' }), noFiles)
      ).toThrow('GOOGLE_APPLICATION_CREDENTIALS points to a missing file: /keys/missing.json');
    });

    it('should require an API key for Deepgram', () => {
      expect(() => loadDictationConfig(cli({ provider: 'deepgram' }), readEnv({}), noFiles)).toThrow(
        'DEEPGRAM_API_KEY is required when STT_PROVIDER=deepgram'
      );
    });
  });
});
