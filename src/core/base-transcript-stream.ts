import { EventEmitter } from 'events';
import type { TranscriptStream, TranscriptionResult } from './types';

/**
 * Abstract base class for transcript streams.
 * Provides a typed EventEmitter interface for transcription events.
 * Speech-engine adapters extend this and emit as results arrive.
 */
export abstract class BaseTranscriptStream extends EventEmitter implements TranscriptStream {
  abstract close(): Promise<void>;

  override on(event: 'transcription', cb: (result: TranscriptionResult) => void): this;
  override on(event: 'error', cb: (error: Error) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  override on(event: string, cb: (...args: any[]) => void): this {
    return super.on(event, cb);
  }

  override off(event: 'transcription', cb: (result: TranscriptionResult) => void): this;
  override off(event: 'error', cb: (error: Error) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  override off(event: string, cb: (...args: any[]) => void): this {
    return super.off(event, cb);
  }

  override emit(event: 'transcription', result: TranscriptionResult): boolean;
  override emit(event: 'error', error: Error): boolean;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  override emit(event: string | symbol, ...args: any[]): boolean {
    return super.emit(event, ...args);
  }
}
