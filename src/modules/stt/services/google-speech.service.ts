/**
 * Google Speech Service
 * Streaming recognize over Google Cloud Speech-to-Text v1 (gRPC, bidirectional)
 *
 * The first message on the stream carries the recognition config, every
 * following message carries one audio frame. Responses hold interim and final
 * results for the audio seen so far.
 */

import type { Duplex } from 'node:stream';
import { SpeechClient } from '@google-cloud/speech';
import type { protos } from '@google-cloud/speech';
import { logger, waitWithTimeout } from '@/shared/utils';
import { toError } from '@/shared/errors';
import { GOOGLE_SPEECH_CONFIG, STT_CONSTANTS, TIMEOUT_CONFIG } from '../config';
import type { GoogleSpeechOptions } from '../config';
import { isStreamingRecognizeResponse } from '../types';
import type {
  ConnectionState,
  RecognitionConfig,
  RecognitionHandlers,
  RecognitionProvider,
  RecognitionStream,
  RecognitionStreamMetrics,
  TranscriptSegment,
} from '../types';
import { classifySpeechError, RecognitionError, SpeechErrorType, toRecognitionError } from '../utils/error-classifier';

type StreamingRecognitionConfig = protos.google.cloud.speech.v1.IStreamingRecognitionConfig;
type StreamingRecognizeRequest = protos.google.cloud.speech.v1.IStreamingRecognizeRequest;

/**
 * The part of the gapic SpeechClient this service talks to
 */
export interface SpeechStreamingClient {
  _streamingRecognize(): Duplex;
  close(): Promise<void>;
}

export type SpeechClientFactory = (options: { keyFilename?: string }) => SpeechStreamingClient;

const defaultClientFactory: SpeechClientFactory = (options) => new SpeechClient(options);

export function buildStreamingConfig(
  config: RecognitionConfig,
  options: GoogleSpeechOptions
): StreamingRecognitionConfig {
  return {
    config: {
      encoding: GOOGLE_SPEECH_CONFIG.encoding,
      sampleRateHertz: config.sampleRate,
      audioChannelCount: config.channels,
      languageCode: config.languageCode,
      enableAutomaticPunctuation: GOOGLE_SPEECH_CONFIG.enableAutomaticPunctuation,
      maxAlternatives: GOOGLE_SPEECH_CONFIG.maxAlternatives,
      ...(options.model ? { model: options.model } : {}),
    },
    interimResults: config.interimResults,
    singleUtterance: GOOGLE_SPEECH_CONFIG.singleUtterance,
  };
}

export class GoogleRecognitionStream implements RecognitionStream {
  private connectionState: ConnectionState = 'connecting';
  private ended = false;
  private finishPromise: Promise<void> | null = null;
  readonly metrics: RecognitionStreamMetrics = {
    framesForwarded: 0,
    bytesForwarded: 0,
    responsesReceived: 0,
    segmentsEmitted: 0,
  };

  constructor(
    private readonly client: SpeechStreamingClient,
    private readonly stream: Duplex,
    private readonly config: RecognitionConfig,
    private readonly handlers: RecognitionHandlers
  ) {
    this.stream.on('data', (data: unknown) => this.handleResponse(data));
    this.stream.on('error', (error: unknown) => this.handleError(toError(error)));
    this.stream.on('end', () => this.handleEnd());
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get isOpen(): boolean {
    return this.connectionState === 'open';
  }

  /**
   * Send the config message; must precede any audio
   */
  begin(streamingConfig: StreamingRecognitionConfig): void {
    const request: StreamingRecognizeRequest = { streamingConfig };
    this.stream.write(request);
    this.connectionState = 'open';
  }

  write(frame: Buffer): void {
    if (!this.isOpen) {
      return;
    }

    const request: StreamingRecognizeRequest = { audioContent: frame };
    this.stream.write(request);
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
      this.finishPromise = this.closeStream();
    }
    return this.finishPromise;
  }

  private async closeStream(): Promise<void> {
    const canDrain = this.connectionState === 'open' && !this.ended;
    if (this.connectionState === 'open') {
      this.connectionState = 'finishing';
    }

    if (canDrain) {
      const drained = new Promise<void>((resolve) => {
        this.stream.once('end', resolve);
        this.stream.once('close', resolve);
        this.stream.once('error', resolve);
      });

      logger.debug('Half-closing speech stream, waiting for final results', {
        sessionId: this.config.sessionId,
      });
      this.stream.end();

      const outcome = await waitWithTimeout(drained, TIMEOUT_CONFIG.FINALIZATION_TIMEOUT_MS);
      if (outcome === 'timeout') {
        logger.warn('Speech stream did not drain in time, dropping it', {
          sessionId: this.config.sessionId,
          timeoutMs: TIMEOUT_CONFIG.FINALIZATION_TIMEOUT_MS,
        });
        this.stream.destroy();
      }
    } else {
      this.stream.destroy();
    }

    this.connectionState = 'closed';

    try {
      await this.client.close();
    } catch (error) {
      logger.warn('Failed to close speech client', {
        sessionId: this.config.sessionId,
        error: toError(error).message,
      });
    }

    logger.info('Speech stream closed', { sessionId: this.config.sessionId, ...this.metrics });
  }

  private handleResponse(data: unknown): void {
    this.metrics.responsesReceived++;

    if (!isStreamingRecognizeResponse(data)) {
      logger.warn('Invalid streaming recognize response', { sessionId: this.config.sessionId });
      return;
    }

    if (data.error?.code) {
      const error = Object.assign(new Error(data.error.message || 'Recognition error'), {
        code: data.error.code,
      });
      this.handleError(error);
      return;
    }

    for (const result of data.results ?? []) {
      const alternative = result.alternatives?.[0];
      if (!alternative) {
        continue;
      }

      const segment: TranscriptSegment = {
        text: alternative.transcript ?? '',
        isFinal: result.isFinal === true,
        confidence: alternative.confidence ?? 0,
        timestamp: Date.now(),
      };

      this.metrics.segmentsEmitted++;
      this.handlers.onSegment(segment);
    }
  }

  private handleError(error: Error): void {
    const classification = classifySpeechError(error);

    // Our own half-close or destroy shows up as CANCELLED
    if (this.connectionState === 'finishing' || this.connectionState === 'closed') {
      logger.debug('Speech stream error after finish', {
        sessionId: this.config.sessionId,
        type: classification.type,
        message: classification.message,
      });
      return;
    }

    if (this.connectionState === 'error') {
      return;
    }

    this.connectionState = 'error';

    if (classification.type !== SpeechErrorType.LIMIT) {
      logger.error('Speech stream error', {
        sessionId: this.config.sessionId,
        type: classification.type,
        grpcCode: classification.grpcCode,
        error: error.message,
      });
    }

    this.handlers.onError(new RecognitionError(classification));
  }

  private handleEnd(): void {
    this.ended = true;

    if (this.connectionState === 'open') {
      this.connectionState = 'closed';
      logger.warn('Speech stream ended by the service', { sessionId: this.config.sessionId });
      this.handlers.onEnd();
    }
  }
}

export class GoogleSpeechProvider implements RecognitionProvider {
  readonly name = 'google' as const;

  constructor(
    private readonly options: GoogleSpeechOptions,
    private readonly createClient: SpeechClientFactory = defaultClientFactory
  ) {}

  async open(config: RecognitionConfig, handlers: RecognitionHandlers): Promise<RecognitionStream> {
    const streamingConfig = buildStreamingConfig(config, this.options);

    logger.info('Opening Google streaming recognize', {
      sessionId: config.sessionId,
      languageCode: config.languageCode,
      sampleRate: config.sampleRate,
      interimResults: config.interimResults,
      model: this.options.model ?? 'default',
      credentials: this.options.keyFilename ? 'key file' : 'default lookup',
    });

    let client: SpeechStreamingClient;
    let duplex: Duplex;
    try {
      client = this.createClient(this.options.keyFilename ? { keyFilename: this.options.keyFilename } : {});
      duplex = client._streamingRecognize();
    } catch (error) {
      throw toRecognitionError(toError(error));
    }

    const stream = new GoogleRecognitionStream(client, duplex, config, handlers);
    stream.begin(streamingConfig);
    return stream;
  }
}
