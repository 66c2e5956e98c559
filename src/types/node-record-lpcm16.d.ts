/**
 * Type declarations for node-record-lpcm16
 * Spawns sox / rec / arecord and exposes its raw PCM output
 */

declare module 'node-record-lpcm16' {
  import type { Readable } from 'node:stream';

  export interface RecordOptions {
    sampleRate?: number;
    channels?: number;
    compress?: boolean;
    threshold?: number;
    thresholdStart?: number | null;
    thresholdEnd?: number | null;
    silence?: string;
    recorder?: string;
    endOnSilence?: boolean;
    audioType?: string;
    device?: string | null;
  }

  export interface Recording {
    stream(): Readable;
    stop(): void;
    pause(): void;
    resume(): void;
    isPaused(): boolean;
  }

  export function record(options?: RecordOptions): Recording;
}
