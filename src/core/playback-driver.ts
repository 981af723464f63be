import type { AudioSink, DriverState, PlaybackOutcome, PlaybackResult } from './types';
import type { PlaybackSession } from './playback-state';
import { SinkStartError, SinkStopError, describeError } from './errors';
import { createDeferred } from '../utils/deferred';
import { createLogger, type Logger } from '../utils/logger';

const log = createLogger('PlaybackDriver');

export interface PlaybackDriverOptions {
  /** Upper bound on how late a natural end of playback is noticed */
  pollIntervalMs: number;
  now: () => number;
  onStateChange?: (state: DriverState) => void;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts, whichever comes first.
 * Lets the poll loop react to a stop request immediately.
 */
function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Drives the audio sink for one session: idle → starting → playing →
 * stopping → finished.
 *
 * Every path ends in `finished`, so waitForCompletion() can never hang on a
 * broken sink. The sink is only ever touched from here.
 */
export class PlaybackDriver<TSource> {
  private readonly sink: AudioSink<TSource>;
  private readonly session: PlaybackSession;
  private readonly options: PlaybackDriverOptions;
  private readonly completion = createDeferred<PlaybackResult>();
  private readonly log: Logger;

  private _state: DriverState = 'idle';
  private error: Error | undefined;
  private stopLatencyMs: number | undefined;

  constructor(sink: AudioSink<TSource>, session: PlaybackSession, options: PlaybackDriverOptions) {
    this.sink = sink;
    this.session = session;
    this.options = options;
    this.log = log.child(`#${session.id}`);
  }

  get state(): DriverState {
    return this._state;
  }

  get sessionId(): number {
    return this.session.id;
  }

  /**
   * Play `source` to the end or until stopped. Never rejects; the result
   * is also what waitForCompletion() resolves with.
   */
  async run(source: TSource): Promise<PlaybackResult> {
    if (this._state !== 'idle') {
      return this.completion.promise;
    }

    this.transition('starting');
    try {
      await this.sink.start(source);
    } catch (err: unknown) {
      this.error =
        err instanceof SinkStartError
          ? err
          : new SinkStartError(`Sink failed to start: ${describeError(err)}`, { cause: err });
      this.log.error(this.error.message);
      // Nothing played, so a stop requested meanwhile interrupted nothing
      return this.finish(false);
    }

    this.transition('playing');
    const stoppedByRequest = await this.pollUntilDone();

    this.transition('stopping');
    if (stoppedByRequest) {
      await this.stopSink();
    }
    return this.finish();
  }

  /** Resolves once `finished`; immediately if already there. */
  waitForCompletion(): Promise<PlaybackResult> {
    return this.completion.promise;
  }

  /** True when a stop request ended playback, false on a natural end. */
  private async pollUntilDone(): Promise<boolean> {
    const { pollIntervalMs } = this.options;
    const signal = this.session.stopSignal;

    while (true) {
      if (this.session.snapshot().stopRequested) return true;
      if (!this.sink.isPlaying()) return false;
      await waitOrAbort(pollIntervalMs, signal);
    }
  }

  private async stopSink(): Promise<void> {
    const { now } = this.options;
    try {
      await this.sink.stop();
    } catch (err: unknown) {
      // Recorded, not rethrown: the session still has to finish
      this.error = new SinkStopError(`Sink failed to stop: ${describeError(err)}`, { cause: err });
      this.log.warn(this.error.message);
    }

    const requestedAt = this.session.stopRequestedAt;
    if (requestedAt !== null) {
      this.stopLatencyMs = now() - requestedAt;
      this.log.debug(`stop_latency: ${this.stopLatencyMs.toFixed(0)}ms`);
    }
  }

  private finish(started = true): Promise<PlaybackResult> {
    this.session.markFinished();
    const snap = this.session.snapshot();

    let outcome: PlaybackOutcome = 'completed';
    if (started && snap.bargeInConfirmed) outcome = 'interrupted';
    else if (started && snap.stopRequested) outcome = 'cancelled';

    const result: PlaybackResult = {
      sessionId: this.session.id,
      outcome,
      durationMs: this.options.now() - this.session.startedAt,
    };
    if (this.error) result.error = this.error;
    if (this.stopLatencyMs !== undefined) result.stopLatencyMs = this.stopLatencyMs;

    this.transition('finished');
    this.log.info(`Playback finished: ${outcome} after ${result.durationMs.toFixed(0)}ms`);
    this.completion.resolve(result);
    return this.completion.promise;
  }

  private transition(state: DriverState): void {
    if (this._state === state) return;
    this.log.debug(`${this._state} -> ${state}`);
    this._state = state;
    try {
      this.options.onStateChange?.(state);
    } catch (err: unknown) {
      // Every path has to reach `finished`, whatever the listener does
      this.log.error(`onStateChange callback threw: ${describeError(err)}`);
    }
  }
}
