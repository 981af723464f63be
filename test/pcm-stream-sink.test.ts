import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PcmStreamSink } from '../src/audio/pcm-stream-sink';
import { SinkStartError } from '../src/core/errors';
import { MockFrameTarget, makePCM, makeStream, stallingStream } from './helpers/mock-providers';
import type { Logger } from '../src/utils/logger';

// Suppress logger output in tests
vi.mock('../src/utils/logger', () => {
  function silent(): Logger {
    return { debug: () => {}, info: () => {}, warn: () => {}, error: () => {}, child: silent };
  }
  return { createLogger: silent };
});

/** 48kHz, 20ms frame = 960 samples */
const FRAME = 960;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('PcmStreamSink', () => {
  let target: MockFrameTarget;
  let sink: PcmStreamSink;

  async function playToEnd(chunks: Buffer[]): Promise<void> {
    sink.start(makeStream(chunks));
    await vi.waitFor(() => expect(sink.isPlaying()).toBe(false));
  }

  beforeEach(() => {
    target = new MockFrameTarget();
    sink = new PcmStreamSink(target);
  });

  afterEach(async () => {
    await sink.stop();
  });

  describe('framing', () => {
    it('splits buffers into 960-sample (20ms @ 48kHz) frames', async () => {
      await playToEnd([makePCM(FRAME * 2)]);

      expect(target.frames).toHaveLength(2);
      expect(target.frames[0].samplesPerChannel).toBe(FRAME);
      expect(target.frames[1].samplesPerChannel).toBe(FRAME);
      expect(target.frames[0].sampleRate).toBe(48000);
      expect(target.frames[0].channels).toBe(1);
      expect(sink.framesWritten).toBe(2);
    });

    it('sends a partial last frame as is', async () => {
      // 1440 samples = 1 full frame (960) + 1 partial frame (480)
      await playToEnd([makePCM(FRAME + 480, 5000)]);

      expect(target.frames).toHaveLength(2);
      expect(target.frames[1].samplesPerChannel).toBe(480);
      expect(target.frames[0].samples[0]).toBe(5000);
      expect(target.frames[1].samples[479]).toBe(5000);
    });

    it('handles a buffer with an odd byteOffset', async () => {
      const backing = Buffer.alloc(FRAME * 2 + 1);
      const oddOffset = Buffer.from(backing.buffer, 1, FRAME * 2);
      for (let i = 0; i < FRAME; i++) oddOffset.writeInt16LE(1234, i * 2);

      await playToEnd([oddOffset]);

      expect(target.frames).toHaveLength(1);
      expect(target.frames[0].samples[0]).toBe(1234);
      expect(target.frames[0].samples[FRAME - 1]).toBe(1234);
    });

    it('respects a custom sample rate and frame length', async () => {
      sink = new PcmStreamSink(target, { sampleRate: 16000, frameDurationMs: 10 });
      await playToEnd([makePCM(400)]);

      expect(target.frames.map((f) => f.samplesPerChannel)).toEqual([160, 160, 80]);
      expect(target.frames[0].sampleRate).toBe(16000);
    });

    it('paces full frames in real time', async () => {
      await playToEnd([makePCM(FRAME * 2)]);

      const gap = target.frames[1].capturedAt - target.frames[0].capturedAt;
      expect(gap).toBeGreaterThanOrEqual(15);
    });
  });

  describe('start', () => {
    it('reports playing until the stream is drained', async () => {
      expect(sink.isPlaying()).toBe(false);
      sink.start(makeStream([makePCM(FRAME)]));
      expect(sink.isPlaying()).toBe(true);

      await vi.waitFor(() => expect(sink.isPlaying()).toBe(false));
    });

    it('throws SinkStartError while already playing', () => {
      sink.start(makeStream([makePCM(FRAME * 10)]));
      expect(() => sink.start(makeStream([]))).toThrow(SinkStartError);
    });

    it('resets counters for each stream', async () => {
      await playToEnd([makePCM(FRAME * 2)]);
      await playToEnd([makePCM(100)]);

      expect(sink.framesWritten).toBe(1);
      expect(target.frames).toHaveLength(3);
    });

    it('records a stream failure in lastError and stops playing', async () => {
      async function* failing(): AsyncGenerator<Buffer> {
        yield makePCM(480);
        throw new Error('tts died');
      }
      sink.start(failing());
      await vi.waitFor(() => expect(sink.isPlaying()).toBe(false));

      expect(sink.lastError?.message).toBe('tts died');
      expect(sink.framesWritten).toBe(1);
    });

    it('stops playing when the stream cannot even be iterated', async () => {
      const unreadable: AsyncIterable<Buffer> = {
        [Symbol.asyncIterator]() {
          throw new Error('stream already consumed');
        },
      };
      sink.start(unreadable);
      await vi.waitFor(() => expect(sink.isPlaying()).toBe(false));

      expect(sink.lastError?.message).toBe('stream already consumed');
      expect(target.frames).toHaveLength(0);
      expect(() => sink.start(makeStream([makePCM(100)]))).not.toThrow();
    });
  });

  describe('stop', () => {
    it('takes effect within one frame and flushes the target', async () => {
      sink.start(makeStream([makePCM(FRAME * 50)]));
      await sleep(50);

      const started = performance.now();
      await sink.stop();
      const elapsed = performance.now() - started;

      expect(elapsed).toBeLessThan(40);
      expect(sink.isPlaying()).toBe(false);
      expect(target.flushCount).toBe(1);

      const written = target.frames.length;
      expect(written).toBeLessThan(50);
      await sleep(50);
      expect(target.frames).toHaveLength(written);
    });

    it('does not wait for a stalled producer', async () => {
      sink.start(stallingStream(makePCM(480)));
      await sleep(10);
      expect(sink.isPlaying()).toBe(true);

      await sink.stop();
      expect(sink.isPlaying()).toBe(false);
      expect(target.frames).toHaveLength(1);
    });

    it('resolves immediately when nothing is playing', async () => {
      await sink.stop();
      expect(sink.isPlaying()).toBe(false);
      expect(target.flushCount).toBe(1);
    });
  });
});
