/**
 * playback-interrupt: barge-in coordination for full-duplex voice agents.
 *
 * Quick start:
 * ```ts
 * import { InterruptController, PcmStreamSink, TranscriptDetectionSource } from 'playback-interrupt';
 *
 * const controller = new InterruptController({
 *   sink: new PcmStreamSink(frameTarget),
 *   detection: new TranscriptDetectionSource(sttStream),
 * });
 *
 * const handle = controller.beginPlayback(tts.synthesize('Hello there!'));
 * const { outcome } = await controller.waitForCompletion(handle);
 * // 'completed' | 'interrupted' | 'cancelled'
 * ```
 */

// Core
export { InterruptController } from './core/interrupt-controller';
export { PlaybackState, PlaybackSession } from './core/playback-state';
export { PlaybackDriver } from './core/playback-driver';
export type { PlaybackDriverOptions } from './core/playback-driver';
export { BargeInMonitor } from './core/barge-in-monitor';
export type { BargeInMonitorOptions } from './core/barge-in-monitor';
export { ConsecutivePolicy, ConfidencePolicy } from './core/confirmation-policy';
export type { ConsecutivePolicyOptions, ConfidencePolicyOptions } from './core/confirmation-policy';
export { EventQueue } from './core/event-queue';
export { TranscriptDetectionSource } from './core/transcript-detection';
export type { TranscriptDetectionOptions } from './core/transcript-detection';
export { BaseTranscriptStream } from './core/base-transcript-stream';
export { Speaker } from './core/speaker';
export type { SayOptions } from './core/speaker';
export {
  resolveControllerOptions,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_MONITOR_POLL_INTERVAL_MS,
  DEFAULT_ECHO_GUARD_MS,
  DEFAULT_RETAIN_FINISHED_SESSIONS,
  STOP_LATENCY_TARGET_MS,
} from './core/config';
export type { ResolvedControllerOptions } from './core/config';

// Errors
export {
  InterruptError,
  AlreadyPlayingError,
  SinkStartError,
  SinkStopError,
  DetectionSourceError,
  UnknownSessionError,
  InvalidOptionsError,
} from './core/errors';

// Audio
export { PcmStreamSink } from './audio/pcm-stream-sink';
export type { AudioFrame, FrameTarget, PcmStreamSinkOptions } from './audio/pcm-stream-sink';

// Types
export type {
  DetectionEvent,
  DetectionSource,
  ConfirmationPolicy,
  TranscriptionResult,
  TranscriptStream,
  AudioSink,
  TTSPlugin,
  PlaybackSnapshot,
  DriverState,
  PlaybackOutcome,
  PlaybackResult,
  SessionHandle,
  MonitorExit,
  MonitorReport,
  ControllerOptions,
  BeginPlaybackOptions,
  ControllerEvents,
} from './core/types';

// Utils
export { createLogger, setLogLevel, getLogLevel } from './utils/logger';
export type { LogLevel, Logger } from './utils/logger';
export { createDeferred } from './utils/deferred';
export type { Deferred } from './utils/deferred';
