import type { AudioSink } from '../core/types';
import { SinkStartError } from '../core/errors';
import { createDeferred, type Deferred } from '../utils/deferred';
import { createLogger } from '../utils/logger';

const log = createLogger('PcmStreamSink');

/** One paced chunk of PCM16 audio. */
export interface AudioFrame {
  data: Int16Array;
  sampleRate: number;
  channels: number;
  samplesPerChannel: number;
}

/** Where frames go: a WebRTC track source, a device writer, a test buffer. */
export interface FrameTarget {
  captureFrame(frame: AudioFrame): Promise<void>;
  /** Drop anything the target has buffered but not yet played */
  flush?(): void;
}

export interface PcmStreamSinkOptions {
  /** Default: 48000 */
  sampleRate?: number;
  /** Default: 20 */
  frameDurationMs?: number;
}

const CHANNELS = 1;

/**
 * Plays a stream of PCM16 mono buffers (e.g. TTS output) in real time.
 *
 * Each buffer is split into fixed-length frames and written at real-time
 * pace. stop() is checked before every frame, so it takes effect within one
 * frame duration.
 */
export class PcmStreamSink implements AudioSink<AsyncIterable<Buffer>> {
  private readonly target: FrameTarget;
  private readonly sampleRate: number;
  private readonly frameDurationMs: number;
  private readonly samplesPerFrame: number;

  private _playing = false;
  private stopRequested = false;
  private stopped: Deferred<null> = createDeferred<null>();
  private pump: Promise<void> | null = null;
  private _lastError: Error | null = null;
  private _framesWritten = 0;

  constructor(target: FrameTarget, options: PcmStreamSinkOptions = {}) {
    this.target = target;
    this.sampleRate = options.sampleRate ?? 48000;
    this.frameDurationMs = options.frameDurationMs ?? 20;
    this.samplesPerFrame = (this.sampleRate * this.frameDurationMs) / 1000;
  }

  /** Error that ended the last stream early, if any. */
  get lastError(): Error | null {
    return this._lastError;
  }

  /** Frames written during the current or last stream. */
  get framesWritten(): number {
    return this._framesWritten;
  }

  isPlaying(): boolean {
    return this._playing;
  }

  start(stream: AsyncIterable<Buffer>): void {
    if (this._playing) {
      throw new SinkStartError('PcmStreamSink is already playing');
    }
    this._playing = true;
    this.stopRequested = false;
    this.stopped = createDeferred<null>();
    this._lastError = null;
    this._framesWritten = 0;
    this.pump = this.run(stream);
  }

  /** Resolves once the pump has exited and the target is flushed. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.stopped.resolve(null);
    this.target.flush?.();
    if (this.pump) {
      await this.pump;
    }
  }

  private async run(stream: AsyncIterable<Buffer>): Promise<void> {
    const streamStart = performance.now();
    let chunkCount = 0;
    let totalBytes = 0;

    log.debug('stream started');

    // Reads race the stop request so a slow producer cannot hold playback open
    let iterator: AsyncIterator<Buffer> | null = null;
    try {
      iterator = stream[Symbol.asyncIterator]();
      while (!this.stopRequested) {
        const pending = iterator.next();
        void pending.catch((err: unknown) => {
          log.debug('stream read failed:', err);
        });
        const next = await Promise.race([pending, this.stopped.promise]);
        if (next === null || next.done) break;

        const chunk = next.value;
        chunkCount++;
        totalBytes += chunk.byteLength;
        await this.writeFrames(chunk);
      }
    } catch (err: unknown) {
      this._lastError = err instanceof Error ? err : new Error(String(err));
      log.warn('stream failed:', this._lastError.message);
    } finally {
      if (this.stopRequested && iterator?.return) {
        void iterator.return(undefined).catch((err: unknown) => {
          log.debug('stream did not close cleanly:', err);
        });
      }
      this._playing = false;
      const elapsed = performance.now() - streamStart;
      const audioDurationMs = (totalBytes / 2 / this.sampleRate) * 1000;
      log.info(
        `stream ${this.stopRequested ? 'stopped' : 'done'} — ${chunkCount} chunks, ${totalBytes} bytes, ` +
          `audio=${audioDurationMs.toFixed(0)}ms, wall=${elapsed.toFixed(0)}ms`,
      );
    }
  }

  /**
   * Split a PCM16 buffer into frames and write them at real-time pace.
   * A partial frame at the end is sent directly without pacing.
   */
  private async writeFrames(pcm16: Buffer): Promise<void> {
    // Int16Array needs an even byteOffset; ws and friends do not promise one
    const aligned = Buffer.alloc(pcm16.byteLength);
    pcm16.copy(aligned);
    const samples = new Int16Array(aligned.buffer, aligned.byteOffset, Math.floor(aligned.byteLength / 2));

    let offset = 0;
    while (offset < samples.length) {
      if (this.stopRequested) return;

      const end = Math.min(offset + this.samplesPerFrame, samples.length);
      const frameSamples = samples.subarray(offset, end);

      await this.target.captureFrame({
        data: frameSamples,
        sampleRate: this.sampleRate,
        channels: CHANNELS,
        samplesPerChannel: frameSamples.length,
      });
      this._framesWritten++;

      if (frameSamples.length === this.samplesPerFrame) {
        await sleep(this.frameDurationMs);
      }

      offset = end;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
