/**
 * Text Cleaning Utilities
 * Whitespace and punctuation normalization, filler-word removal
 */

import type { CleanTextOptions } from '../types/transcript-output.types';

const EDGE_PUNCTUATION = /^([^\p{L}\p{N}]*)(.*?)([^\p{L}\p{N}]*)$/su;
// Marks that survive when the filler they were attached to is removed
const CARRIED_MARKS = /[?!;:]/g;

/**
 * Trim, collapse whitespace runs, drop whitespace before , . ; : ! ?
 */
export function normalizeText(text: string): string {
  return text
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/\s+([,.;:!?])/g, '$1')
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * One matcher per filler word: the word itself, or the word with its final
 * letter repeated (um, umm, ummm)
 */
export function buildFillerMatcher(fillerWords: readonly string[]): (word: string) => boolean {
  const patterns = fillerWords
    .map((word) => word.trim())
    .filter((word) => word.length > 0)
    .map((word) => {
      const last = word.slice(-1);
      return new RegExp(`^${escapeRegExp(word)}${escapeRegExp(last)}*$`, 'iu');
    });

  return (word) => word.length > 0 && patterns.some((pattern) => pattern.test(word));
}

/**
 * Remove filler tokens. Case-insensitive, whole-token only; punctuation around
 * a token is ignored when matching. Commas and periods go away with the filler,
 * other trailing marks attach to the previous kept token.
 *
 * @example
 * removeFillers('um so this is uh a test', ['um', 'uh']); // 'so this is a test'
 */
export function removeFillers(text: string, fillerWords: readonly string[]): string {
  const isFiller = buildFillerMatcher(fillerWords);
  const kept: string[] = [];

  for (const token of text.split(/\s+/)) {
    if (token.length === 0) {
      continue;
    }

    const match = EDGE_PUNCTUATION.exec(token);
    const core = match ? match[2] : token;

    if (!isFiller(core)) {
      kept.push(token);
      continue;
    }

    const trailing = match ? match[3] : '';
    const carried = trailing.match(CARRIED_MARKS)?.join('') ?? '';
    if (carried && kept.length > 0) {
      const previous = kept[kept.length - 1];
      if (!/[?!;:]$/.test(previous)) {
        kept[kept.length - 1] = previous.replace(/[,.]$/, '') + carried;
      }
    }
  }

  return kept.join(' ');
}

/**
 * Normalize, optionally strip fillers, normalize again
 */
export function cleanText(text: string, options: CleanTextOptions): string {
  let cleaned = normalizeText(text);
  if (options.removeFillers && options.fillerWords.length > 0) {
    cleaned = normalizeText(removeFillers(cleaned, options.fillerWords));
  }
  return cleaned;
}
