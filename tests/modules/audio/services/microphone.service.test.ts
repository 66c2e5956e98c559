/**
 * MicrophoneService Tests
 * The recorder process is replaced with an in-memory fake
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { RecordOptions } from 'node-record-lpcm16';
import { MicrophoneService } from '@/modules/audio/services/microphone.service';
import type { MicrophoneOptions } from '@/modules/audio';
import { MicrophoneError } from '@/shared/errors';

class FakeRecording {
  readonly process = new EventEmitter();
  readonly output = new EventEmitter();
  readonly stop = vi.fn();

  stream(): EventEmitter {
    return this.output;
  }
}

const recorder = vi.hoisted(() => {
  const state: {
    calls: RecordOptions[];
    next: FakeRecording | null;
  } = { calls: [], next: null };
  return state;
});

vi.mock('node-record-lpcm16', () => ({
  record: (options: RecordOptions) => {
    recorder.calls.push(options);
    if (!recorder.next) {
      throw new Error('spawn failed');
    }
    return recorder.next;
  },
}));

const options: MicrophoneOptions = {
  sampleRate: 16000,
  channels: 1,
  blocksPerSecond: 10,
  recorder: 'sox',
};

describe('MicrophoneService', () => {
  let recording: FakeRecording;
  let frames: Buffer[];
  let errors: Error[];

  const onFrame = (frame: Buffer): void => {
    frames.push(frame);
  };
  const onError = (error: Error): void => {
    errors.push(error);
  };

  beforeEach(() => {
    recording = new FakeRecording();
    recorder.calls = [];
    recorder.next = recording;
    frames = [];
    errors = [];
  });

  describe('start', () => {
    it('should launch the recorder with raw 16-bit capture options', () => {
      const microphone = new MicrophoneService(options);

      microphone.start(onFrame, onError);

      const expected: RecordOptions = {
        sampleRate: 16000,
        channels: 1,
        threshold: 0,
        recorder: 'sox',
        audioType: 'raw',
      };
      expect(recorder.calls).toEqual([expected]);
      expect(microphone.isCapturing).toBe(true);
    });

    it('should pass the device through when configured', () => {
      const microphone = new MicrophoneService({ ...options, recorder: 'arecord', device: 'hw:1,0' });

      microphone.start(onFrame, onError);

      expect(recorder.calls[0]).toMatchObject({ recorder: 'arecord', device: 'hw:1,0' });
    });

    it('should refuse a second start while capturing', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);

      expect(() => microphone.start(onFrame, onError)).toThrow('Microphone capture already started');
    });

    it('should wrap a recorder launch failure in a MicrophoneError', () => {
      recorder.next = null;
      const microphone = new MicrophoneService(options);

      expect(() => microphone.start(onFrame, onError)).toThrow(MicrophoneError);
      expect(() => microphone.start(onFrame, onError)).toThrow('Could not launch recorder "sox": spawn failed');
      expect(microphone.isCapturing).toBe(false);
    });
  });

  describe('frames', () => {
    it('should emit fixed 3200-byte frames from uneven chunks', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);

      recording.output.emit('data', Buffer.alloc(2000, 1));
      expect(frames).toHaveLength(0);

      recording.output.emit('data', Buffer.alloc(2000, 2));

      expect(frames).toHaveLength(1);
      expect(frames[0].length).toBe(3200);
      expect(microphone.metrics).toEqual({ chunksReceived: 2, framesEmitted: 1, bytesReceived: 4000 });
    });

    it('should flush the trailing partial frame on stop', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);
      recording.output.emit('data', Buffer.alloc(4000, 3));

      microphone.stop();

      expect(frames.map((frame) => frame.length)).toEqual([3200, 800]);
      expect(recording.stop).toHaveBeenCalledTimes(1);
      expect(microphone.isCapturing).toBe(false);
    });

    it('should ignore data after stop', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);
      microphone.stop();

      recording.output.emit('data', Buffer.alloc(6400));

      expect(frames).toHaveLength(0);
    });

    it('should be safe to stop twice', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);

      microphone.stop();
      microphone.stop();

      expect(recording.stop).toHaveBeenCalledTimes(1);
    });
  });

  describe('errors', () => {
    it('should report a recorder exit once as a MicrophoneError', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);

      recording.output.emit('error', 'sox has exited with error code 2.');
      recording.output.emit('error', 'sox has exited with error code 2.');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(MicrophoneError);
      expect(errors[0].message).toBe('Microphone unavailable: sox has exited with error code 2.');
      expect(recording.stop).toHaveBeenCalledTimes(1);
      expect(microphone.isCapturing).toBe(false);
    });

    it('should report a missing recorder binary', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);

      recording.process.emit('error', new Error('spawn sox ENOENT'));

      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('Recorder "sox" failed to start: spawn sox ENOENT');
    });

    it('should ignore the abnormal exit caused by stop', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);

      microphone.stop();
      recording.output.emit('error', 'sox has exited with error code 143.');

      expect(errors).toHaveLength(0);
    });

    it('should not emit the partial frame after a failure', () => {
      const microphone = new MicrophoneService(options);
      microphone.start(onFrame, onError);
      recording.output.emit('data', Buffer.alloc(100));

      recording.output.emit('error', new Error('device busy'));
      microphone.stop();

      expect(errors[0].message).toBe('Microphone unavailable: device busy');
      expect(frames).toHaveLength(0);
    });
  });
});
