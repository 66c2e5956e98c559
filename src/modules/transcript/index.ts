/**
 * Transcript Module Public Exports
 */

export { ParagraphAssembler, PreviewRenderer } from './services';
export { cleanText, normalizeText, removeFillers } from './utils/text-cleaner';
export { DEFAULT_FILLER_WORDS } from './config/filler-words.config';
export type { CleanTextOptions, PreviewOutput } from './types/transcript-output.types';
