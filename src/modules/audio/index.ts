/**
 * Audio Module Public Exports
 */

export { AudioFrameBuffer, MicrophoneService } from './services';
export * from './constants/audio.constants';
export type {
  AudioSource,
  CaptureErrorHandler,
  CaptureMetrics,
  FrameHandler,
  MicrophoneOptions,
} from './types/audio.types';
