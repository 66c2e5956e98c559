/**
 * Deepgram Live Service
 * Streaming recognition over Deepgram's live transcription websocket
 */

import { createClient, LiveTranscriptionEvents } from '@deepgram/sdk';
import type { ListenLiveClient } from '@deepgram/sdk';
import { logger, waitWithTimeout } from '@/shared/utils';
import { toError } from '@/shared/errors';
import { DEEPGRAM_CONFIG, STT_CONSTANTS, TIMEOUT_CONFIG } from '../config';
import type { DeepgramLiveOptions, DeepgramOptions } from '../config';
import { isValidMetadataResponse, isValidTranscriptResponse } from '../types';
import type {
  ConnectionState,
  RecognitionConfig,
  RecognitionHandlers,
  RecognitionProvider,
  RecognitionStream,
  RecognitionStreamMetrics,
} from '../types';
import { RecognitionError, classifySpeechError, toRecognitionError } from '../utils/error-classifier';

export function buildLiveOptions(config: RecognitionConfig, options: DeepgramOptions): DeepgramLiveOptions {
  return {
    model: options.model,
    language: config.languageCode,
    smart_format: DEEPGRAM_CONFIG.smart_format,
    punctuate: DEEPGRAM_CONFIG.punctuate,
    interim_results: config.interimResults,
    endpointing: DEEPGRAM_CONFIG.endpointing,
    utterances: DEEPGRAM_CONFIG.utterances,
    diarize: DEEPGRAM_CONFIG.diarize,
    alternatives: DEEPGRAM_CONFIG.alternatives,
    encoding: DEEPGRAM_CONFIG.encoding,
    sample_rate: config.sampleRate,
    channels: config.channels,
  };
}

/**
 * Copy a Buffer view into a standalone ArrayBuffer for the websocket
 */
function toArrayBuffer(frame: Buffer): ArrayBufferLike {
  return frame.buffer.slice(frame.byteOffset, frame.byteOffset + frame.byteLength);
}

export class DeepgramRecognitionStream implements RecognitionStream {
  private connectionState: ConnectionState = 'connecting';
  private keepAliveInterval?: NodeJS.Timeout;
  private closeWaiters: Array<() => void> = [];
  private finishPromise: Promise<void> | null = null;
  readonly metrics: RecognitionStreamMetrics = {
    framesForwarded: 0,
    bytesForwarded: 0,
    responsesReceived: 0,
    segmentsEmitted: 0,
  };

  constructor(
    private readonly connection: ListenLiveClient,
    private readonly config: RecognitionConfig,
    private readonly handlers: RecognitionHandlers
  ) {
    this.connection.on(LiveTranscriptionEvents.Transcript, (data: unknown) => this.handleTranscript(data));
    this.connection.on(LiveTranscriptionEvents.Error, (error: unknown) => this.handleError(toError(error)));
    this.connection.on(LiveTranscriptionEvents.Close, () => this.handleClose());
    this.connection.on(LiveTranscriptionEvents.Metadata, (data: unknown) => {
      if (isValidMetadataResponse(data)) {
        logger.debug('Deepgram metadata', {
          sessionId: this.config.sessionId,
          requestId: data.request_id,
          duration: data.duration,
        });
      }
    });
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get isOpen(): boolean {
    return this.connectionState === 'open';
  }

  markOpen(): void {
    this.connectionState = 'open';
    this.startKeepAlive();
  }

  write(frame: Buffer): void {
    if (!this.isOpen) {
      return;
    }

    const readyState = this.connection.getReadyState();
    if (readyState !== STT_CONSTANTS.WEBSOCKET_STATE.OPEN) {
      logger.debug('Deepgram socket not open, dropping frame', {
        sessionId: this.config.sessionId,
        readyState,
      });
      return;
    }

    this.connection.send(toArrayBuffer(frame));
    this.metrics.framesForwarded++;
    this.metrics.bytesForwarded += frame.length;

    if (this.metrics.framesForwarded % STT_CONSTANTS.CHUNK_LOG_FREQUENCY === 0) {
      logger.debug('Audio frames forwarded', {
        sessionId: this.config.sessionId,
        totalFrames: this.metrics.framesForwarded,
      });
    }
  }

  finish(): Promise<void> {
    if (!this.finishPromise) {
      this.finishPromise = this.closeConnection();
    }
    return this.finishPromise;
  }

  private async closeConnection(): Promise<void> {
    this.stopKeepAlive();

    const canDrain =
      this.connectionState === 'open' &&
      this.connection.getReadyState() === STT_CONSTANTS.WEBSOCKET_STATE.OPEN;

    if (this.connectionState === 'open' || this.connectionState === 'connecting') {
      this.connectionState = 'finishing';
    }

    if (canDrain) {
      const closed = new Promise<void>((resolve) => {
        this.closeWaiters.push(resolve);
      });

      // CloseStream: Deepgram flushes outstanding results, then closes the socket
      logger.debug('Requesting Deepgram close', { sessionId: this.config.sessionId });
      this.connection.requestClose();

      const outcome = await waitWithTimeout(closed, TIMEOUT_CONFIG.FINALIZATION_TIMEOUT_MS);
      if (outcome === 'timeout') {
        logger.warn('Deepgram did not close in time', {
          sessionId: this.config.sessionId,
          timeoutMs: TIMEOUT_CONFIG.FINALIZATION_TIMEOUT_MS,
        });
      }
    }

    this.connectionState = 'closed';
    this.closeWaiters = [];
    logger.info('Deepgram stream closed', { sessionId: this.config.sessionId, ...this.metrics });
  }

  private handleTranscript(data: unknown): void {
    this.metrics.responsesReceived++;

    if (!isValidTranscriptResponse(data)) {
      logger.warn('Invalid Deepgram transcript response', { sessionId: this.config.sessionId });
      return;
    }

    const alternative = data.channel.alternatives[0];
    this.metrics.segmentsEmitted++;
    this.handlers.onSegment({
      text: alternative.transcript,
      isFinal: data.is_final === true,
      confidence: alternative.confidence ?? 0,
      timestamp: Date.now(),
    });
  }

  private handleError(error: Error): void {
    // Errors before Open reject DeepgramProvider.open() instead
    if (this.connectionState !== 'open') {
      logger.debug('Deepgram error outside open state', {
        sessionId: this.config.sessionId,
        state: this.connectionState,
        error: error.message,
      });
      return;
    }

    this.connectionState = 'error';
    this.stopKeepAlive();

    const classification = classifySpeechError(error);
    logger.error('Deepgram stream error', {
      sessionId: this.config.sessionId,
      type: classification.type,
      error: error.message,
    });
    this.handlers.onError(new RecognitionError(classification));
  }

  private handleClose(): void {
    this.stopKeepAlive();

    if (this.connectionState === 'finishing') {
      const waiters = this.closeWaiters;
      this.closeWaiters = [];
      waiters.forEach((resolve) => resolve());
      return;
    }

    if (this.connectionState === 'open') {
      this.connectionState = 'closed';
      logger.warn('Deepgram connection closed by the service', { sessionId: this.config.sessionId });
      this.handlers.onEnd();
    }
  }

  private startKeepAlive(): void {
    this.stopKeepAlive();
    this.keepAliveInterval = setInterval(() => {
      if (this.connection.getReadyState() === STT_CONSTANTS.WEBSOCKET_STATE.OPEN) {
        this.connection.keepAlive();
      }
    }, STT_CONSTANTS.KEEPALIVE_INTERVAL_MS);
  }

  private stopKeepAlive(): void {
    if (this.keepAliveInterval) {
      clearInterval(this.keepAliveInterval);
      this.keepAliveInterval = undefined;
    }
  }
}

export class DeepgramProvider implements RecognitionProvider {
  readonly name = 'deepgram' as const;

  constructor(private readonly options: DeepgramOptions) {}

  open(config: RecognitionConfig, handlers: RecognitionHandlers): Promise<RecognitionStream> {
    const liveOptions = buildLiveOptions(config, this.options);

    logger.info('Opening Deepgram live transcription', {
      sessionId: config.sessionId,
      model: liveOptions.model,
      language: liveOptions.language,
      sampleRate: liveOptions.sample_rate,
      interimResults: liveOptions.interim_results,
    });

    return new Promise<RecognitionStream>((resolve, reject) => {
      let settled = false;
      let connection: ListenLiveClient;

      try {
        connection = createClient(this.options.apiKey).listen.live(liveOptions);
      } catch (error) {
        reject(toRecognitionError(toError(error)));
        return;
      }

      const stream = new DeepgramRecognitionStream(connection, config, handlers);

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        connection.requestClose();
        reject(
          toRecognitionError(new Error(`Connection timeout after ${TIMEOUT_CONFIG.CONNECTION_TIMEOUT_MS}ms`))
        );
      }, TIMEOUT_CONFIG.CONNECTION_TIMEOUT_MS);

      connection.on(LiveTranscriptionEvents.Open, () => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        stream.markOpen();
        logger.info('Deepgram connection opened', { sessionId: config.sessionId });
        resolve(stream);
      });

      connection.on(LiveTranscriptionEvents.Error, (error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        reject(toRecognitionError(toError(error)));
      });
    });
  }
}
