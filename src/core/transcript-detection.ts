import type { DetectionEvent, DetectionSource, TranscriptStream, TranscriptionResult } from './types';
import { EventQueue } from './event-queue';
import { createLogger } from '../utils/logger';

const log = createLogger('TranscriptDetection');

export interface TranscriptDetectionOptions {
  /** Shortest trimmed transcript that counts as speech (default: 2) */
  minChars?: number;
  now?: () => number;
}

/**
 * Turns an STT stream's interim transcriptions into detection events.
 *
 * A transcription is speech when it is long enough and differs from the
 * last one seen. A repeat usually means the recognizer is still chewing on
 * our own playback, so it is reported as `speech: false`. Every call to
 * stream() forgets the last text, so each session starts clean.
 */
export class TranscriptDetectionSource implements DetectionSource {
  private readonly transcripts: TranscriptStream;
  private readonly minChars: number;
  private readonly now: () => number;

  constructor(transcripts: TranscriptStream, options: TranscriptDetectionOptions = {}) {
    this.transcripts = transcripts;
    this.minChars = Math.max(1, options.minChars ?? 2);
    this.now = options.now ?? (() => performance.now());
  }

  stream(signal: AbortSignal): AsyncIterable<DetectionEvent> {
    const queue = new EventQueue<DetectionEvent>(signal);
    let lastSeen = '';

    const onTranscription = (result: TranscriptionResult) => {
      const text = result.text.trim();
      const speech = text.length >= this.minChars && text !== lastSeen;
      if (text) lastSeen = text;

      const event: DetectionEvent = { speech, timestamp: this.now(), text };
      if (result.confidence !== undefined) event.confidence = result.confidence;
      queue.push(event);
    };

    const onError = (error: Error) => {
      log.warn('Transcript stream error:', error.message);
      queue.fail(error);
      detach();
    };

    const detach = () => {
      this.transcripts.off('transcription', onTranscription);
      this.transcripts.off('error', onError);
    };

    if (signal.aborted) return queue;

    this.transcripts.on('transcription', onTranscription);
    this.transcripts.on('error', onError);
    signal.addEventListener('abort', detach, { once: true });

    return queue;
  }
}
