/**
 * Paragraph Assembler
 * Accumulates final transcript segments, in arrival order, into one paragraph
 */

import { logger } from '@/shared/utils';
import type { TranscriptSegment } from '@/modules/stt';
import type { CleanTextOptions } from '../types/transcript-output.types';
import { cleanText, normalizeText } from '../utils/text-cleaner';

const KEEP_FILLERS: CleanTextOptions = { removeFillers: false, fillerWords: [] };

export class ParagraphAssembler {
  private finalSegments: TranscriptSegment[] = [];
  private interim = '';
  private lastFinalText = '';
  private duplicatesDropped = 0;

  /**
   * @param comparison - Cleaning applied before a final is compared with the
   * previous one, so finals differing only in fillers count as repeats
   */
  constructor(private readonly comparison: CleanTextOptions = KEEP_FILLERS) {}

  /**
   * Record a segment. Non-final segments only replace the interim text.
   * @returns true if the segment was appended to the paragraph
   */
  add(segment: TranscriptSegment): boolean {
    if (!segment.isFinal) {
      this.interim = normalizeText(segment.text);
      return false;
    }

    this.interim = '';
    const text = normalizeText(segment.text);
    const compared = cleanText(text, this.comparison);

    if (!compared) {
      return false;
    }

    // Providers occasionally resend the previous final result
    if (compared === this.lastFinalText) {
      this.duplicatesDropped++;
      logger.debug('Dropping repeated final segment', { text: compared.substring(0, 50) });
      return false;
    }

    this.finalSegments.push({ ...segment, text });
    this.lastFinalText = compared;
    return true;
  }

  get interimText(): string {
    return this.interim;
  }

  get finalSegmentCount(): number {
    return this.finalSegments.length;
  }

  get duplicateCount(): number {
    return this.duplicatesDropped;
  }

  getFinalSegments(): readonly TranscriptSegment[] {
    return this.finalSegments;
  }

  /**
   * Final segments joined with single spaces, then cleaned. Empty when no
   * final segment arrived.
   */
  getParagraph(options: CleanTextOptions): string {
    const joined = this.finalSegments.map((segment) => segment.text).join(' ');
    return cleanText(joined, options);
  }

  reset(): void {
    this.finalSegments = [];
    this.interim = '';
    this.lastFinalText = '';
    this.duplicatesDropped = 0;
  }
}
