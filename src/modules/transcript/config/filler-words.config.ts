/**
 * Filler Word Configuration
 */

/**
 * Disfluencies dropped from the final paragraph. Elongated spellings
 * (umm, hmmmm) match through the last-letter repetition rule.
 */
export const DEFAULT_FILLER_WORDS: readonly string[] = ['um', 'uh', 'hmm', 'erm', 'eh'];
