/**
 * PreviewRenderer Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  CLEAR_LINE,
  PreviewRenderer,
} from '@/modules/transcript/services/preview-renderer.service';
import type { PreviewOutput } from '@/modules/transcript';
import type { TranscriptSegment } from '@/modules/stt';
import { Logger, LogLevel } from '@/shared/utils/logger';

class FakeTerminal implements PreviewOutput {
  readonly writes: string[] = [];

  constructor(
    readonly isTTY: boolean,
    readonly columns?: number
  ) {}

  write(chunk: string): boolean {
    this.writes.push(chunk);
    return true;
  }
}

function partial(text: string): TranscriptSegment {
  return { text, isFinal: false, confidence: 0, timestamp: 1 };
}

function final(text: string): TranscriptSegment {
  return { text, isFinal: true, confidence: 0.9, timestamp: 1 };
}

describe('PreviewRenderer', () => {
  let terminal: FakeTerminal;
  let renderer: PreviewRenderer;

  beforeEach(() => {
    terminal = new FakeTerminal(true, 80);
    renderer = new PreviewRenderer(terminal, { enabled: true });
  });

  describe('render', () => {
    it('should overwrite the line with a marked partial', () => {
      renderer.render(partial('hello wor'));

      expect(terminal.writes).toEqual([`${CLEAR_LINE}preview: hello wor...`]);
      expect(renderer.currentLine).toBe('preview: hello wor...');
      expect(renderer.isVisible).toBe(true);
    });

    it('should show finals without the partial marker', () => {
      renderer.render(partial('hello wor'));
      renderer.render(final('Hello world.'));

      expect(terminal.writes[1]).toBe('\r\x1b[2KHello world.');
    });

    it('should skip empty text', () => {
      renderer.render(partial('  '));

      expect(terminal.writes).toEqual([]);
      expect(renderer.isVisible).toBe(false);
    });

    it('should keep the newest words when the line is too wide', () => {
      const narrow = new FakeTerminal(true, 20);
      const preview = new PreviewRenderer(narrow, { enabled: true });

      preview.render(partial('one two three four'));

      expect(preview.currentLine).toBe('… two three four...');
      expect(Array.from(preview.currentLine)).toHaveLength(19);
    });

    it('should assume 80 columns when the width is unknown', () => {
      const preview = new PreviewRenderer(new FakeTerminal(true), { enabled: true });
      const text = 'x'.repeat(100);

      expect(Array.from(preview.formatLine(final(text)))).toHaveLength(79);
    });
  });

  describe('disabled', () => {
    it('should write nothing when disabled', () => {
      const preview = new PreviewRenderer(terminal, { enabled: false });

      preview.render(partial('hello'));
      preview.clear();

      expect(terminal.writes).toEqual([]);
      expect(preview.enabled).toBe(false);
    });

    it('should disable itself when the output is not a terminal', () => {
      const piped = new FakeTerminal(false);
      const preview = new PreviewRenderer(piped, { enabled: true });

      preview.render(partial('hello'));

      expect(preview.enabled).toBe(false);
      expect(piped.writes).toEqual([]);
    });
  });

  describe('printAbove', () => {
    it('should put the text above the preview and redraw it', () => {
      renderer.render(partial('hello wor'));

      renderer.printAbove('WARN  slow network\n');

      expect(terminal.writes).toEqual([
        `${CLEAR_LINE}preview: hello wor...`,
        `${CLEAR_LINE}WARN  slow network\npreview: hello wor...`,
      ]);
      expect(renderer.isVisible).toBe(true);
    });

    it('should write the text as is when no preview is shown', () => {
      renderer.printAbove('INFO  ready\n');

      expect(terminal.writes).toEqual(['INFO  ready\n']);
    });

    it('should write the text as is when the output is not a terminal', () => {
      const piped = new FakeTerminal(false);
      const preview = new PreviewRenderer(piped, { enabled: true });

      preview.render(partial('hello'));
      preview.printAbove('INFO  ready\n');

      expect(piped.writes).toEqual(['INFO  ready\n']);
    });

    it('should keep log lines out of the preview line', () => {
      const testLogger = new Logger();
      testLogger.setLevel(LogLevel.DEBUG);
      testLogger.setColors(false);
      testLogger.setTimestamps(false);
      testLogger.setSink((line) => renderer.printAbove(`${line}\n`));

      renderer.render(partial('so the'));
      testLogger.warn('Recognition stream ended early');

      expect(terminal.writes[1]).toBe(`${CLEAR_LINE}WARN  Recognition stream ended early\npreview: so the...`);
    });
  });

  describe('clear', () => {
    it('should erase a visible line once', () => {
      renderer.render(final('done'));

      renderer.clear();
      renderer.clear();

      expect(terminal.writes).toEqual([`${CLEAR_LINE}done`, CLEAR_LINE]);
      expect(renderer.isVisible).toBe(false);
      expect(renderer.currentLine).toBe('');
    });

    it('should write nothing when no line is visible', () => {
      renderer.clear();

      expect(terminal.writes).toEqual([]);
    });
  });
});
