/**
 * Preview Renderer
 * Keeps one terminal line showing the latest partial or final text
 */

import type { TranscriptSegment } from '@/modules/stt';
import type { PreviewOutput } from '../types/transcript-output.types';
import { normalizeText } from '../utils/text-cleaner';

// Carriage return + ANSI "erase entire line"
export const CLEAR_LINE = '\r\x1b[2K';
export const PARTIAL_PREFIX = 'preview: ';
export const PARTIAL_SUFFIX = '...';
export const ELLIPSIS = '…';

const DEFAULT_COLUMNS = 80;

export interface PreviewRendererOptions {
  enabled: boolean;
}

export class PreviewRenderer {
  private visible = false;
  private lastLine = '';
  readonly enabled: boolean;

  constructor(
    private readonly output: PreviewOutput,
    options: PreviewRendererOptions
  ) {
    // Overwriting in place only works on a terminal
    this.enabled = options.enabled && output.isTTY === true;
  }

  get isVisible(): boolean {
    return this.visible;
  }

  get currentLine(): string {
    return this.lastLine;
  }

  /**
   * Format a segment for display, without terminal control codes
   */
  formatLine(segment: TranscriptSegment): string {
    const text = normalizeText(segment.text);
    const line = segment.isFinal ? text : `${PARTIAL_PREFIX}${text}${PARTIAL_SUFFIX}`;
    return this.fitToWidth(line);
  }

  render(segment: TranscriptSegment): void {
    if (!this.enabled) {
      return;
    }

    if (!normalizeText(segment.text)) {
      return;
    }

    const line = this.formatLine(segment);

    this.output.write(`${CLEAR_LINE}${line}`);
    this.lastLine = line;
    this.visible = true;
  }

  /**
   * Write complete lines above the preview, then redraw it underneath.
   * `text` should end with a newline.
   */
  printAbove(text: string): void {
    if (!this.enabled || !this.visible) {
      this.output.write(text);
      return;
    }

    this.output.write(`${CLEAR_LINE}${text}${this.lastLine}`);
  }

  clear(): void {
    if (!this.enabled || !this.visible) {
      return;
    }

    this.output.write(CLEAR_LINE);
    this.lastLine = '';
    this.visible = false;
  }

  /**
   * Keep the tail of the line so the newest words stay on screen; writing
   * into the last column would wrap the cursor to the next line
   */
  private fitToWidth(line: string): string {
    const columns = this.output.columns && this.output.columns > 1 ? this.output.columns : DEFAULT_COLUMNS;
    const maxLength = columns - 1;
    const chars = Array.from(line);

    if (chars.length <= maxLength) {
      return line;
    }

    return ELLIPSIS + chars.slice(chars.length - (maxLength - 1)).join('');
  }
}
