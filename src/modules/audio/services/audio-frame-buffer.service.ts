/**
 * Audio Frame Buffer
 * Re-chunks recorder output (arbitrary sizes) into fixed-size frames
 */

export class AudioFrameBuffer {
  private chunks: Buffer[] = [];
  private buffered = 0;

  constructor(private readonly frameBytes: number) {
    if (!Number.isInteger(frameBytes) || frameBytes <= 0) {
      throw new RangeError(`Frame size must be a positive integer, got ${frameBytes}`);
    }
  }

  get pendingBytes(): number {
    return this.buffered;
  }

  get frameSize(): number {
    return this.frameBytes;
  }

  /**
   * Append a chunk and return every complete frame now available, in order
   */
  push(chunk: Buffer): Buffer[] {
    if (chunk.length === 0) {
      return [];
    }

    this.chunks.push(chunk);
    this.buffered += chunk.length;

    if (this.buffered < this.frameBytes) {
      return [];
    }

    const joined = Buffer.concat(this.chunks, this.buffered);
    const frames: Buffer[] = [];
    let offset = 0;

    while (joined.length - offset >= this.frameBytes) {
      frames.push(joined.subarray(offset, offset + this.frameBytes));
      offset += this.frameBytes;
    }

    const remainder = joined.subarray(offset);
    this.chunks = remainder.length > 0 ? [remainder] : [];
    this.buffered = remainder.length;

    return frames;
  }

  /**
   * Drain the trailing partial frame, if any
   */
  flush(): Buffer | null {
    if (this.buffered === 0) {
      return null;
    }
    const rest = Buffer.concat(this.chunks, this.buffered);
    this.clear();
    return rest;
  }

  clear(): void {
    this.chunks = [];
    this.buffered = 0;
  }
}
