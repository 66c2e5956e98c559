/**
 * Microphone Service
 * Captures LINEAR16 PCM from the OS audio subsystem through an external
 * recorder program (sox / rec / arecord) and emits fixed-size frames
 */

import { EventEmitter } from 'node:events';
import { record } from 'node-record-lpcm16';
import type { Recording } from 'node-record-lpcm16';
import { logger } from '@/shared/utils';
import { MicrophoneError, toError } from '@/shared/errors';
import { frameBytesFor } from '../constants/audio.constants';
import { AudioFrameBuffer } from './audio-frame-buffer.service';
import type {
  AudioSource,
  CaptureErrorHandler,
  CaptureMetrics,
  FrameHandler,
  MicrophoneOptions,
} from '../types/audio.types';

interface ActiveCapture {
  stop: () => void;
  onFrame: FrameHandler;
  onError: CaptureErrorHandler;
}

export class MicrophoneService implements AudioSource {
  private active: ActiveCapture | null = null;
  private stopping = false;
  private failed = false;
  private readonly frameBuffer: AudioFrameBuffer;
  readonly metrics: CaptureMetrics = {
    chunksReceived: 0,
    framesEmitted: 0,
    bytesReceived: 0,
  };

  constructor(private readonly options: MicrophoneOptions) {
    this.frameBuffer = new AudioFrameBuffer(
      frameBytesFor(options.sampleRate, options.channels, options.blocksPerSecond)
    );
  }

  get isCapturing(): boolean {
    return this.active !== null;
  }

  /**
   * Start the recorder. Frames are delivered through onFrame; a recorder
   * failure is reported once through onError.
   * @throws {MicrophoneError} If capture is already running or the recorder cannot be launched
   */
  start(onFrame: FrameHandler, onError: CaptureErrorHandler): void {
    if (this.active) {
      throw new MicrophoneError('Microphone capture already started');
    }

    this.stopping = false;
    this.failed = false;
    this.frameBuffer.clear();

    logger.info('Starting microphone capture', {
      recorder: this.options.recorder,
      sampleRate: this.options.sampleRate,
      channels: this.options.channels,
      device: this.options.device ?? 'default',
      frameBytes: this.frameBuffer.frameSize,
    });

    let recording: Recording;
    try {
      recording = record({
        sampleRate: this.options.sampleRate,
        channels: this.options.channels,
        threshold: 0,
        recorder: this.options.recorder,
        audioType: 'raw',
        ...(this.options.device ? { device: this.options.device } : {}),
      });
    } catch (error) {
      throw new MicrophoneError(
        `Could not launch recorder "${this.options.recorder}": ${toError(error).message}`,
        { cause: error }
      );
    }

    this.active = {
      stop: () => recording.stop(),
      onFrame,
      onError,
    };

    // The recorder spawns eagerly; a missing binary surfaces as a ChildProcess 'error'
    const child: unknown = Reflect.get(recording, 'process');
    if (child instanceof EventEmitter) {
      child.on('error', (error: Error) => {
        this.fail(`Recorder "${this.options.recorder}" failed to start: ${error.message}`, error);
      });
    }

    const stream = recording.stream();

    stream.on('data', (chunk: Buffer | string) => {
      this.handleChunk(typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : chunk);
    });

    // The recorder reports a non-zero exit as a string, not an Error
    stream.on('error', (reason: unknown) => {
      const message = reason instanceof Error ? reason.message : String(reason);
      this.fail(`Microphone unavailable: ${message}`, reason);
    });

    stream.on('end', () => {
      logger.debug('Recorder stream ended', { ...this.metrics });
    });
  }

  /**
   * Stop the recorder and emit the trailing partial frame. Safe to call twice.
   */
  stop(): void {
    const active = this.active;
    if (!active) {
      return;
    }

    this.stopping = true;
    this.active = null;

    try {
      active.stop();
    } catch (error) {
      logger.warn('Recorder stop failed', { error: toError(error).message });
    }

    const rest = this.frameBuffer.flush();
    if (rest && !this.failed) {
      this.metrics.framesEmitted++;
      active.onFrame(rest);
    }

    logger.info('Microphone capture stopped', { ...this.metrics });
  }

  private handleChunk(chunk: Buffer): void {
    const active = this.active;
    if (!active) {
      return;
    }

    this.metrics.chunksReceived++;
    this.metrics.bytesReceived += chunk.length;

    for (const frame of this.frameBuffer.push(chunk)) {
      this.metrics.framesEmitted++;
      active.onFrame(frame);
    }
  }

  private fail(message: string, cause: unknown): void {
    // Killing the recorder on stop() makes it report an abnormal exit
    if (this.stopping || this.failed) {
      logger.debug('Ignoring recorder error after stop', { message });
      return;
    }

    const active = this.active;
    this.failed = true;

    const error = new MicrophoneError(message, { cause });
    logger.error('Microphone capture failed', error);

    if (active) {
      this.active = null;
      try {
        active.stop();
      } catch (stopError) {
        logger.debug('Recorder stop after failure threw', { error: toError(stopError).message });
      }
      active.onError(error);
    }
  }
}
