import type { PlaybackSnapshot } from './types';
import { AlreadyPlayingError } from './errors';

/**
 * One synthesis-and-playback cycle.
 *
 * Every field is private and touched only inside one synchronous method, so
 * no two operations interleave and no snapshot sees a torn state.
 * Invariants: bargeInConfirmed ⇒ stopRequested; isPlaying never returns to
 * true once cleared.
 */
export class PlaybackSession {
  readonly id: number;
  readonly startedAt: number;

  private _isPlaying = true;
  private _stopRequested = false;
  private _bargeInConfirmed = false;
  private _stopRequestedAt: number | null = null;
  private readonly abortController = new AbortController();

  constructor(id: number, startedAt: number) {
    this.id = id;
    this.startedAt = startedAt;
  }

  /** Aborted by the first requestStop(). Lets the driver wake without polling. */
  get stopSignal(): AbortSignal {
    return this.abortController.signal;
  }

  /** Clock reading passed to the requestStop() that took effect. */
  get stopRequestedAt(): number | null {
    return this._stopRequestedAt;
  }

  /**
   * Ask the driver to stop. Idempotent: returns true only for the call that
   * changed state. A barge-in after a plain stop request is not recorded,
   * and nothing is recorded once the session has finished.
   */
  requestStop(dueToBargeIn: boolean, at: number = performance.now()): boolean {
    if (this._stopRequested || !this._isPlaying) return false;
    this._stopRequested = true;
    if (dueToBargeIn) this._bargeInConfirmed = true;
    this._stopRequestedAt = at;
    this.abortController.abort();
    return true;
  }

  /** Returns true only on the first call. */
  markFinished(): boolean {
    if (!this._isPlaying) return false;
    this._isPlaying = false;
    return true;
  }

  snapshot(): PlaybackSnapshot {
    return Object.freeze({
      isPlaying: this._isPlaying,
      stopRequested: this._stopRequested,
      bargeInConfirmed: this._bargeInConfirmed,
    });
  }
}

/** Owns the current session; refuses to overlap two of them. */
export class PlaybackState {
  private _current: PlaybackSession | null = null;
  private nextId = 1;

  get current(): PlaybackSession | null {
    return this._current;
  }

  beginSession(at: number = performance.now()): PlaybackSession {
    if (this._current && this._current.snapshot().isPlaying) {
      throw new AlreadyPlayingError(this._current.id);
    }
    this._current = new PlaybackSession(this.nextId++, at);
    return this._current;
  }
}
