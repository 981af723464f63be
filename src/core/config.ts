import type { AudioSink, ConfirmationPolicy, ControllerOptions, DetectionSource } from './types';
import { ConsecutivePolicy } from './confirmation-policy';
import { InvalidOptionsError } from './errors';
import { createLogger } from '../utils/logger';

const log = createLogger('Config');

export const DEFAULT_POLL_INTERVAL_MS = 10;
export const DEFAULT_MONITOR_POLL_INTERVAL_MS = 10;
/** The monitor must notice the end of playback within this */
export const MAX_MONITOR_POLL_INTERVAL_MS = 10;
export const DEFAULT_ECHO_GUARD_MS = 0;
/** Finished sessions whose handles stay valid */
export const DEFAULT_RETAIN_FINISHED_SESSIONS = 8;
/** End-to-end target from barge-in confirmation to silence */
export const STOP_LATENCY_TARGET_MS = 150;

export interface ResolvedControllerOptions<TSource> {
  sink: AudioSink<TSource>;
  detection: DetectionSource | null;
  policy: ConfirmationPolicy;
  pollIntervalMs: number;
  monitorPollIntervalMs: number;
  echoGuardMs: number;
  bargeIn: boolean;
  retainFinishedSessions: number;
  now: () => number;
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidOptionsError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

export function resolveControllerOptions<TSource>(
  options: ControllerOptions<TSource>,
): ResolvedControllerOptions<TSource> {
  const pollIntervalMs = requirePositive(
    'pollIntervalMs',
    options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
  );
  const monitorPollIntervalMs = requirePositive(
    'monitorPollIntervalMs',
    options.monitorPollIntervalMs ?? DEFAULT_MONITOR_POLL_INTERVAL_MS,
  );
  if (monitorPollIntervalMs > MAX_MONITOR_POLL_INTERVAL_MS) {
    throw new InvalidOptionsError(
      `monitorPollIntervalMs must be at most ${MAX_MONITOR_POLL_INTERVAL_MS}ms, got ${monitorPollIntervalMs}`,
    );
  }

  const echoGuardMs = options.echoGuardMs ?? DEFAULT_ECHO_GUARD_MS;
  if (!Number.isFinite(echoGuardMs) || echoGuardMs < 0) {
    throw new InvalidOptionsError(`echoGuardMs must be >= 0, got ${echoGuardMs}`);
  }

  const retainFinishedSessions = options.retainFinishedSessions ?? DEFAULT_RETAIN_FINISHED_SESSIONS;
  if (!Number.isInteger(retainFinishedSessions) || retainFinishedSessions < 0) {
    throw new InvalidOptionsError(
      `retainFinishedSessions must be a non-negative integer, got ${retainFinishedSessions}`,
    );
  }

  if (pollIntervalMs >= STOP_LATENCY_TARGET_MS) {
    log.warn(
      `pollIntervalMs=${pollIntervalMs} cannot meet the ${STOP_LATENCY_TARGET_MS}ms stop target`,
    );
  }

  return {
    sink: options.sink,
    detection: options.detection ?? null,
    policy: options.policy ?? new ConsecutivePolicy(),
    pollIntervalMs,
    monitorPollIntervalMs,
    echoGuardMs,
    bargeIn: options.bargeIn ?? true,
    retainFinishedSessions,
    now: options.now ?? (() => performance.now()),
  };
}
