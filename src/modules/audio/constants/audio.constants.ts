/**
 * Audio Processing Constants
 * Capture format sent to the recognizer: LINEAR16 (signed 16-bit little-endian PCM)
 */

export const SAMPLE_RATE = 16000;
export const CHANNELS = 1;
export const BYTES_PER_SAMPLE = 2;

/**
 * 10 blocks per second = 100ms frames
 */
export const BLOCKS_PER_SECOND = 10;

export const SAMPLES_PER_FRAME = SAMPLE_RATE / BLOCKS_PER_SECOND;

/**
 * 1600 samples x 2 bytes x 1 channel = 3200 bytes
 */
export const FRAME_BYTES = SAMPLES_PER_FRAME * BYTES_PER_SAMPLE * CHANNELS;

export const SUPPORTED_RECORDERS = ['sox', 'rec', 'arecord'] as const;

export type RecorderProgram = (typeof SUPPORTED_RECORDERS)[number];

/**
 * Frame size in bytes for a given capture format
 */
export function frameBytesFor(sampleRate: number, channels: number, blocksPerSecond = BLOCKS_PER_SECOND): number {
  return Math.floor(sampleRate / blocksPerSecond) * BYTES_PER_SAMPLE * channels;
}
