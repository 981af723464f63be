import type {
  ConfirmationPolicy,
  DetectionEvent,
  DetectionSource,
  MonitorExit,
  MonitorReport,
} from './types';
import type { PlaybackSession } from './playback-state';
import { DetectionSourceError, describeError } from './errors';
import { createLogger } from '../utils/logger';

const log = createLogger('BargeIn');

export interface BargeInMonitorOptions {
  source: DetectionSource;
  policy: ConfirmationPolicy;
  /** How often to check whether playback is still running (≤ 10ms) */
  pollIntervalMs: number;
  /** Ignore events this soon after the session started */
  echoGuardMs: number;
  now: () => number;
  /** Called once, synchronously, when this monitor's confirmation took effect */
  onConfirmed?: (event: DetectionEvent) => void;
}

/**
 * Watches one playback session for user speech.
 *
 * Consumes a fresh detection stream, feeds every event through the
 * confirmation policy, and on confirmation writes the stop request into the
 * session. It never touches the sink: the driver wakes on the session's stop
 * signal and does the stopping, so this loop goes straight back to the next
 * event.
 */
export class BargeInMonitor {
  private readonly session: PlaybackSession;
  private readonly options: BargeInMonitorOptions;
  private readonly abortController = new AbortController();
  private exit: MonitorExit | null = null;
  private started = false;

  constructor(session: PlaybackSession, options: BargeInMonitorOptions) {
    this.session = session;
    this.options = options;
  }

  get active(): boolean {
    return this.started && this.exit === null;
  }

  /** Cooperative: observed at the next event or poll tick. */
  cancel(): void {
    this.halt('cancelled');
  }

  async run(): Promise<MonitorReport> {
    if (this.started) {
      throw new Error(`Monitor for session #${this.session.id} already ran`);
    }
    this.started = true;

    const { source, policy, pollIntervalMs } = this.options;
    const signal = this.abortController.signal;
    const slog = log.child(`#${this.session.id}`);
    let eventsSeen = 0;
    let error: Error | undefined;

    policy.reset();

    const halted = new Promise<null>((resolve) => {
      if (signal.aborted) resolve(null);
      signal.addEventListener('abort', () => resolve(null), { once: true });
    });

    let iterator: AsyncIterator<DetectionEvent> | null = null;
    let ticker: ReturnType<typeof setInterval> | null = null;

    try {
      iterator = source.stream(signal)[Symbol.asyncIterator]();
      ticker = setInterval(() => {
        if (!this.session.snapshot().isPlaying) this.halt('finished');
      }, pollIntervalMs);
      slog.debug('Monitor active');

      while (!signal.aborted) {
        const pending = iterator.next();
        // A read still in flight when we stop must not surface as unhandled
        void pending.catch((err: unknown) => {
          slog.debug('Detection read failed after monitor exit:', describeError(err));
        });

        const next = await Promise.race([pending, halted]);
        if (next === null) break;
        if (next.done) {
          this.halt('source-ended');
          break;
        }

        eventsSeen++;
        if (this.handleEvent(next.value)) break;
      }
    } catch (err: unknown) {
      error = new DetectionSourceError(
        `Detection source failed: ${describeError(err)}`,
        { cause: err },
      );
      slog.warn(`${error.message} — barge-in disabled for the rest of this session`);
      this.halt('source-error');
    } finally {
      if (ticker) clearInterval(ticker);
      this.halt('cancelled');
      if (iterator?.return) {
        void iterator.return(undefined).catch((err: unknown) => {
          slog.debug('Detection source did not close cleanly:', describeError(err));
        });
      }
    }

    const exit = this.exit ?? 'cancelled';
    slog.debug(`Monitor stopped (${exit}) after ${eventsSeen} events`);
    return error ? { exit, eventsSeen, error } : { exit, eventsSeen };
  }

  /** Returns true when the monitor is done with this session. */
  private handleEvent(event: DetectionEvent): boolean {
    const { policy, echoGuardMs, now } = this.options;

    const at = now();
    if (at - this.session.startedAt < echoGuardMs) {
      return false;
    }
    if (!policy.observe(event)) {
      return false;
    }

    if (this.session.requestStop(true, at)) {
      log.info(`Barge-in confirmed on session #${this.session.id} — user interrupted playback`);
      this.halt('confirmed');
      try {
        this.options.onConfirmed?.(event);
      } catch (err: unknown) {
        // A listener bug is not a detection failure
        log.error(`onConfirmed callback threw: ${describeError(err)}`);
      }
    } else {
      // Someone else already asked for the stop; not a user interruption
      this.halt('cancelled');
    }
    return true;
  }

  private halt(reason: MonitorExit): void {
    if (this.exit !== null) return;
    this.exit = reason;
    this.abortController.abort();
  }
}
