/**
 * Audio Capture Types
 */

import type { RecorderProgram } from '../constants/audio.constants';

export interface MicrophoneOptions {
  sampleRate: number;
  channels: number;
  blocksPerSecond: number;
  recorder: RecorderProgram;
  device?: string;
}

export type FrameHandler = (frame: Buffer) => void;
export type CaptureErrorHandler = (error: Error) => void;

/**
 * Anything that produces fixed-size PCM frames
 */
export interface AudioSource {
  start(onFrame: FrameHandler, onError: CaptureErrorHandler): void;
  stop(): void;
  readonly isCapturing: boolean;
}

export interface CaptureMetrics {
  chunksReceived: number;
  framesEmitted: number;
  bytesReceived: number;
}
