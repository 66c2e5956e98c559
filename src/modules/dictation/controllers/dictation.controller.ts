/**
 * Dictation Controller
 * Console front end of a dictation run: banner, wait for interrupt, print the paragraph
 */

import { logger } from '@/shared/utils';
import { EXIT_CODES, isDictationError, toError } from '@/shared/errors';
import type { DictationSession } from '../services/dictation-session.service';
import type { DictationResult, SessionEnd } from '../types/dictation.types';

export interface ConsoleStream {
  write(chunk: string): boolean;
}

export interface DictationConsole {
  /** Final paragraph only */
  stdout: ConsoleStream;
  /** Banner, status and errors */
  stderr: ConsoleStream;
}

export const LISTENING_BANNER = '🎙️  Listening… press Ctrl+C to stop.\n';
export const TRANSCRIPT_HEADING = '\n📝 Transcript (single paragraph):\n';
export const EMPTY_TRANSCRIPT_NOTICE = '\n(No final transcript captured.)\n';

type Outcome = SessionEnd | { reason: 'interrupted' };

function waitForAbort(signal: AbortSignal): Promise<Outcome> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve({ reason: 'interrupted' });
      return;
    }
    signal.addEventListener('abort', () => resolve({ reason: 'interrupted' }), { once: true });
  });
}

export class DictationController {
  constructor(private readonly io: DictationConsole) {}

  /**
   * Run one session until interrupted or until it ends on its own
   * @returns Process exit code
   */
  async run(session: DictationSession, signal: AbortSignal): Promise<number> {
    try {
      await session.start();
    } catch (error) {
      return this.reportStartFailure(error);
    }

    this.io.stderr.write(LISTENING_BANNER);

    const outcome = await Promise.race([session.done, waitForAbort(signal)]);
    logger.debug('Dictation ending', { sessionId: session.sessionId, reason: outcome.reason });

    const result = await session.stop();
    this.printResult(result);

    if (result.error) {
      this.io.stderr.write(`\n✖ ${result.error.message}\n`);
      return result.error.exitCode;
    }

    if (result.endReason === 'stream-limit') {
      this.io.stderr.write('\n(Stopped: the recognition service reached its maximum stream duration.)\n');
    } else if (result.endReason === 'provider-closed') {
      this.io.stderr.write('\n(Stopped: the recognition service closed the stream.)\n');
    }

    return EXIT_CODES.OK;
  }

  printResult(result: DictationResult): void {
    if (!result.paragraph) {
      this.io.stderr.write(EMPTY_TRANSCRIPT_NOTICE);
      return;
    }

    this.io.stderr.write(TRANSCRIPT_HEADING);
    this.io.stdout.write(`${result.paragraph}\n`);
  }

  private reportStartFailure(error: unknown): number {
    if (isDictationError(error)) {
      logger.error('Dictation failed to start', { code: error.code, error: error.message });
      this.io.stderr.write(`✖ ${error.message}\n`);
      return error.exitCode;
    }

    const unexpected = toError(error);
    logger.error('Dictation failed to start', unexpected);
    this.io.stderr.write(`✖ ${unexpected.message}\n`);
    return EXIT_CODES.FATAL;
  }
}
