/**
 * Dictation Session
 * One capture run: microphone frames go to the recognition stream, segments
 * come back into the paragraph and the preview line
 */

import { logger, generateId } from '@/shared/utils';
import { DictationError, isDictationError, MicrophoneError, toError } from '@/shared/errors';
import type { AudioSource } from '@/modules/audio';
import { RecognitionError, SpeechErrorType, classifySpeechError } from '@/modules/stt';
import type { RecognitionProvider, RecognitionStream, TranscriptSegment } from '@/modules/stt';
import { ParagraphAssembler } from '@/modules/transcript';
import type { PreviewRenderer } from '@/modules/transcript';
import type {
  DictationEndReason,
  DictationResult,
  DictationSessionOptions,
  DictationState,
  SessionEnd,
} from '../types/dictation.types';

export interface DictationSessionDeps {
  provider: RecognitionProvider;
  microphone: AudioSource;
  renderer: PreviewRenderer;
  assembler?: ParagraphAssembler;
}

function toDictationError(value: unknown): DictationError {
  if (isDictationError(value)) {
    return value;
  }
  return new RecognitionError(classifySpeechError(toError(value)));
}

export class DictationSession {
  readonly sessionId = generateId();
  /**
   * Settles when the run ends without being stopped: a fatal error, or the
   * provider closing the stream. Never rejects.
   */
  readonly done: Promise<SessionEnd>;

  private sessionState: DictationState = 'idle';
  private stream: RecognitionStream | null = null;
  private ending: SessionEnd | null = null;
  private readonly resolveDone: (end: SessionEnd) => void;
  private stopPromise: Promise<DictationResult> | null = null;
  private startedAt = 0;
  private readonly provider: RecognitionProvider;
  private readonly microphone: AudioSource;
  private readonly renderer: PreviewRenderer;
  private readonly assembler: ParagraphAssembler;

  constructor(
    deps: DictationSessionDeps,
    private readonly options: DictationSessionOptions
  ) {
    this.provider = deps.provider;
    this.microphone = deps.microphone;
    this.renderer = deps.renderer;
    this.assembler = deps.assembler ?? new ParagraphAssembler(options.text);

    let resolveDone: (end: SessionEnd) => void = () => undefined;
    this.done = new Promise<SessionEnd>((resolve) => {
      resolveDone = resolve;
    });
    this.resolveDone = resolveDone;
  }

  get state(): DictationState {
    return this.sessionState;
  }

  get paragraphSoFar(): string {
    return this.assembler.getParagraph(this.options.text);
  }

  /**
   * Open the recognition stream, then start the microphone
   * @throws {DictationError} If either side fails to start; whatever was opened is released
   */
  async start(): Promise<void> {
    if (this.sessionState !== 'idle') {
      throw new Error(`Dictation session already ${this.sessionState}`);
    }

    this.sessionState = 'starting';
    logger.info('Starting dictation session', {
      sessionId: this.sessionId,
      provider: this.provider.name,
      languageCode: this.options.languageCode,
    });

    const stream = await this.openStream();
    this.stream = stream;

    try {
      this.microphone.start(
        (frame) => stream.write(frame),
        (error) =>
          this.handleFailure(
            error instanceof MicrophoneError ? error : new MicrophoneError(error.message, { cause: error })
          )
      );
    } catch (error) {
      this.sessionState = 'stopped';
      await stream.finish();
      throw isDictationError(error) ? error : new MicrophoneError(toError(error).message, { cause: error });
    }

    this.startedAt = Date.now();
    this.sessionState = 'running';
  }

  private async openStream(): Promise<RecognitionStream> {
    try {
      return await this.provider.open(
        {
          sessionId: this.sessionId,
          languageCode: this.options.languageCode,
          sampleRate: this.options.sampleRate,
          channels: this.options.channels,
          interimResults: this.options.interimResults,
        },
        {
          onSegment: (segment) => this.handleSegment(segment),
          onError: (error) => this.handleFailure(toDictationError(error)),
          onEnd: () => this.settle({ reason: 'provider-closed' }),
        }
      );
    } catch (error) {
      this.sessionState = 'stopped';
      throw toDictationError(error);
    }
  }

  /**
   * Stop capture, let the provider flush its last results, and assemble the
   * paragraph. Safe to call more than once.
   */
  stop(): Promise<DictationResult> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<DictationResult> {
    this.sessionState = 'stopping';

    // Stopping the microphone first pushes its trailing partial frame into the stream
    this.microphone.stop();

    if (this.stream) {
      try {
        await this.stream.finish();
      } catch (error) {
        logger.warn('Recognition stream did not finish cleanly', {
          sessionId: this.sessionId,
          error: toError(error).message,
        });
      }
    }

    this.renderer.clear();
    this.sessionState = 'stopped';

    const endReason: DictationEndReason = this.ending?.reason ?? 'interrupted';
    const result: DictationResult = {
      sessionId: this.sessionId,
      paragraph: this.assembler.getParagraph(this.options.text),
      finalSegments: this.assembler.finalSegmentCount,
      durationMs: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
      endReason,
      ...(this.ending?.reason === 'error' ? { error: this.ending.error } : {}),
    };

    logger.info('Dictation session stopped', {
      sessionId: this.sessionId,
      endReason,
      finalSegments: result.finalSegments,
      durationMs: result.durationMs,
      paragraphLength: result.paragraph.length,
    });

    return result;
  }

  private handleSegment(segment: TranscriptSegment): void {
    const appended = this.assembler.add(segment);
    this.renderer.render(segment);

    if (appended) {
      logger.debug('Final segment', {
        sessionId: this.sessionId,
        text: segment.text.substring(0, 100),
        confidence: segment.confidence,
      });
    }
  }

  private handleFailure(error: DictationError): void {
    if (!(error instanceof RecognitionError) || error.classification.fatal) {
      this.settle({ reason: 'error', error });
      return;
    }

    if (error.classification.type === SpeechErrorType.LIMIT) {
      logger.warn('Recognition stream reached its maximum duration', { sessionId: this.sessionId });
      this.settle({ reason: 'stream-limit' });
      return;
    }

    logger.warn('Recognition stream ended early', {
      sessionId: this.sessionId,
      type: error.classification.type,
      error: error.message,
    });
    this.settle({ reason: 'provider-closed' });
  }

  /**
   * First ending wins
   */
  private settle(end: SessionEnd): void {
    if (this.ending || this.sessionState === 'stopping' || this.sessionState === 'stopped') {
      return;
    }
    this.ending = end;
    this.resolveDone(end);
  }
}
