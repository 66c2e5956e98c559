import { MicrophoneService } from '@/modules/audio';
import { createRecognitionProvider } from '@/modules/stt';
import type { PreviewRenderer } from '@/modules/transcript';
import type { DictationConfig } from '../types/dictation.types';
import { DictationSession } from './dictation-session.service';

export { DictationSession } from './dictation-session.service';
export type { DictationSessionDeps } from './dictation-session.service';

/**
 * Wire a session from configuration: system microphone, configured cloud
 * provider, and the given preview line
 */
export function createDictationSession(config: DictationConfig, renderer: PreviewRenderer): DictationSession {
  return new DictationSession(
    {
      provider: createRecognitionProvider({
        provider: config.provider,
        google: config.google,
        deepgram: config.deepgram,
      }),
      microphone: new MicrophoneService(config.audio),
      renderer,
    },
    {
      languageCode: config.languageCode,
      sampleRate: config.audio.sampleRate,
      channels: config.audio.channels,
      interimResults: config.showPreview,
      text: {
        removeFillers: config.removeFillers,
        fillerWords: config.fillerWords,
      },
    }
  );
}
