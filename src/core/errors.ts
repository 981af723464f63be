/**
 * Error kinds raised or recorded by the controller.
 *
 * Only AlreadyPlayingError, UnknownSessionError and InvalidOptionsError are
 * ever thrown to callers. Sink and detection failures are recorded on the
 * PlaybackResult so a waiter always gets an answer.
 */

export class InterruptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InterruptError';
  }
}

/** beginPlayback() while the previous session is still playing. */
export class AlreadyPlayingError extends InterruptError {
  readonly activeSessionId: number;

  constructor(activeSessionId: number) {
    super(`Session #${activeSessionId} is still playing`);
    this.name = 'AlreadyPlayingError';
    this.activeSessionId = activeSessionId;
  }
}

export class SinkStartError extends InterruptError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkStartError';
  }
}

export class SinkStopError extends InterruptError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkStopError';
  }
}

export class DetectionSourceError extends InterruptError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DetectionSourceError';
  }
}

/** A handle that was not issued by this controller. */
export class UnknownSessionError extends InterruptError {
  constructor(sessionId: number) {
    super(`Unknown session #${sessionId}`);
    this.name = 'UnknownSessionError';
  }
}

export class InvalidOptionsError extends InterruptError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}

/** Short description of any thrown value, for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
