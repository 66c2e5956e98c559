/**
 * Transcript Output Types
 */

export interface CleanTextOptions {
  removeFillers: boolean;
  fillerWords: readonly string[];
}

/**
 * Minimal terminal stream surface (process.stderr / process.stdout satisfy it)
 */
export interface PreviewOutput {
  write(chunk: string): boolean;
  readonly isTTY?: boolean;
  readonly columns?: number;
}
