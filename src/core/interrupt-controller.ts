/**
 * InterruptController: coordinates playback with barge-in detection.
 *
 * One controller owns one sink and at most one playing session at a time:
 * - PlaybackState holds the session flags
 * - PlaybackDriver streams to the sink and stops it on request
 * - BargeInMonitor watches detection events and requests the stop
 *
 * Construct one per conversation (or per test); nothing here is global.
 */

import { EventEmitter } from 'events';
import type {
  BeginPlaybackOptions,
  ControllerEvents,
  ControllerOptions,
  DetectionEvent,
  DriverState,
  MonitorReport,
  PlaybackResult,
  PlaybackSnapshot,
  SessionHandle,
} from './types';
import { resolveControllerOptions, type ResolvedControllerOptions } from './config';
import { PlaybackState, type PlaybackSession } from './playback-state';
import { PlaybackDriver } from './playback-driver';
import { BargeInMonitor } from './barge-in-monitor';
import { DetectionSourceError, UnknownSessionError, describeError } from './errors';
import { createLogger } from '../utils/logger';

const log = createLogger('Controller');

interface ActiveSession<TSource> {
  session: PlaybackSession;
  driver: PlaybackDriver<TSource>;
  monitor: BargeInMonitor | null;
  /** Driver result merged with the monitor report */
  result: Promise<PlaybackResult>;
}

export class InterruptController<TSource> {
  private readonly options: ResolvedControllerOptions<TSource>;
  private readonly events = new EventEmitter();
  private readonly playback = new PlaybackState();
  private readonly sessions = new Map<number, ActiveSession<TSource>>();
  private latestDriver: PlaybackDriver<TSource> | null = null;

  constructor(options: ControllerOptions<TSource>) {
    this.options = resolveControllerOptions(options);
  }

  on<E extends keyof ControllerEvents>(event: E, listener: ControllerEvents[E]): this {
    this.events.on(event, listener);
    return this;
  }

  once<E extends keyof ControllerEvents>(event: E, listener: ControllerEvents[E]): this {
    this.events.once(event, listener);
    return this;
  }

  off<E extends keyof ControllerEvents>(event: E, listener: ControllerEvents[E]): this {
    this.events.off(event, listener);
    return this;
  }

  /** Driver state of the most recent session ('idle' before the first one). */
  get state(): DriverState {
    return this.latestDriver?.state ?? 'idle';
  }

  /** True while a session is playing. */
  get busy(): boolean {
    return this.playback.current?.snapshot().isPlaying ?? false;
  }

  /** Handle of the session still playing, if any. */
  get activeHandle(): SessionHandle | null {
    const current = this.playback.current;
    return current && current.snapshot().isPlaying ? { id: current.id } : null;
  }

  /**
   * Start a new session. Throws AlreadyPlayingError while another one is
   * still playing; sink start failures are reported through the result.
   */
  beginPlayback(source: TSource, options: BeginPlaybackOptions = {}): SessionHandle {
    const { sink, detection, policy, pollIntervalMs, monitorPollIntervalMs, echoGuardMs, now } =
      this.options;

    const session = this.playback.beginSession(now());
    const id = session.id;

    const driver = new PlaybackDriver(sink, session, {
      pollIntervalMs,
      now,
      onStateChange: (state) => this.emit('state', state, id),
    });

    const bargeIn = options.bargeIn ?? this.options.bargeIn;
    let monitor: BargeInMonitor | null = null;
    if (bargeIn && detection) {
      monitor = new BargeInMonitor(session, {
        source: detection,
        policy,
        pollIntervalMs: monitorPollIntervalMs,
        echoGuardMs,
        now,
        onConfirmed: (event: DetectionEvent) => this.emit('bargeIn', id, event),
      });
    } else if (bargeIn) {
      log.debug(`Session #${id}: no detection source — barge-in unavailable`);
    }

    log.info(`Session #${id} started (barge-in ${monitor ? 'on' : 'off'})`);
    this.latestDriver = driver;

    const monitorDone: Promise<MonitorReport | null> = monitor
      ? monitor.run().catch((err: unknown): MonitorReport => {
          log.error(`Session #${id}: monitor failed: ${describeError(err)}`);
          return {
            exit: 'source-error',
            eventsSeen: 0,
            error: new DetectionSourceError(`Barge-in monitor failed: ${describeError(err)}`, { cause: err }),
          };
        })
      : Promise.resolve(null);
    const result = this.settle(driver.run(source), monitor, monitorDone);
    this.evictFinished();
    this.sessions.set(id, { session, driver, monitor, result });

    return { id };
  }

  /**
   * Programmatic stop. Reported as 'cancelled', never as a user
   * interruption. No-op once the session has finished.
   */
  requestInterrupt(handle: SessionHandle): void {
    const { session } = this.lookup(handle);
    if (session.requestStop(false, this.options.now())) {
      log.info(`Session #${session.id} cancelled by caller`);
    }
  }

  /**
   * Resolves when the session has finished. Returns the same result on every
   * call, however long after the end. No timeout; wrap in Promise.race for one.
   */
  waitForCompletion(handle: SessionHandle): Promise<PlaybackResult> {
    return this.lookup(handle).result;
  }

  snapshot(handle: SessionHandle): PlaybackSnapshot {
    return this.lookup(handle).session.snapshot();
  }

  /** Stop monitoring a session early; playback itself continues. */
  cancelMonitor(handle: SessionHandle): void {
    this.lookup(handle).monitor?.cancel();
  }

  /**
   * Forget finished sessions; their handles become unknown afterwards.
   * beginPlayback() already keeps only the newest few.
   */
  prune(): number {
    let removed = 0;
    for (const [id, active] of this.sessions) {
      if (active.driver.state === 'finished') {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /** Keep only the newest `retainFinishedSessions` finished sessions. */
  private evictFinished(): void {
    // Map iteration is insertion order, so oldest first
    const finished = [...this.sessions]
      .filter(([, active]) => active.driver.state === 'finished')
      .map(([id]) => id);
    const excess = finished.length - this.options.retainFinishedSessions;
    for (const id of finished.slice(0, Math.max(0, excess))) {
      this.sessions.delete(id);
    }
  }

  /** Interrupt whatever is playing and wait for it to finish. */
  async shutdown(): Promise<void> {
    const handle = this.activeHandle;
    if (handle) {
      this.requestInterrupt(handle);
      await this.waitForCompletion(handle);
    }
    log.info('Controller shut down');
  }

  private emit<E extends keyof ControllerEvents>(
    event: E,
    ...args: Parameters<ControllerEvents[E]>
  ): void {
    // An unhandled 'error' would throw out of the driver; errors are on the result anyway
    if (event === 'error' && this.events.listenerCount('error') === 0) return;
    try {
      this.events.emit(event, ...args);
    } catch (err: unknown) {
      log.error(`'${event}' listener threw: ${describeError(err)}`);
    }
  }

  private lookup(handle: SessionHandle): ActiveSession<TSource> {
    const active = this.sessions.get(handle.id);
    if (!active) throw new UnknownSessionError(handle.id);
    return active;
  }

  private async settle(
    driverDone: Promise<PlaybackResult>,
    monitor: BargeInMonitor | null,
    monitorDone: Promise<MonitorReport | null>,
  ): Promise<PlaybackResult> {
    const result = await driverDone;

    // Playback is over; no point listening any longer
    monitor?.cancel();
    const report = await monitorDone;
    if (report?.error) {
      result.detectionError = report.error;
      this.emit('error', report.error, result.sessionId);
    }

    if (result.error) {
      this.emit('error', result.error, result.sessionId);
    }
    this.emit('finished', result);
    return result;
  }
}
