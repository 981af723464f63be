// ─── Detection ───────────────────────────────────────────────────────────────

/** One "speech likely present" signal from the speech engine. */
export interface DetectionEvent {
  speech: boolean;
  /** 0..1 when the engine reports one */
  confidence?: number;
  /** Milliseconds, on the clock of whoever produced the event */
  timestamp: number;
  /** Interim transcript that produced the event, if any */
  text?: string;
}

/**
 * Restartable detection stream. Each call starts a fresh consumption for one
 * playback session; the sequence ends when `signal` aborts.
 */
export interface DetectionSource {
  stream(signal: AbortSignal): AsyncIterable<DetectionEvent>;
}

/**
 * Decides when detection events amount to a confirmed barge-in.
 * Reset at the start of every session.
 */
export interface ConfirmationPolicy {
  reset(): void;
  /** Returns true when this event confirms the barge-in. */
  observe(event: DetectionEvent): boolean;
}

// ─── Transcripts ─────────────────────────────────────────────────────────────

export interface TranscriptionResult {
  text: string;
  isFinal: boolean;
  confidence?: number;
  language?: string;
}

/** Event side of a streaming STT session. */
export interface TranscriptStream {
  on(event: 'transcription', cb: (result: TranscriptionResult) => void): this;
  on(event: 'error', cb: (error: Error) => void): this;
  off(event: 'transcription', cb: (result: TranscriptionResult) => void): this;
  off(event: 'error', cb: (error: Error) => void): this;
}

// ─── Audio sink ──────────────────────────────────────────────────────────────

/**
 * The device side of playback. Owned by exactly one PlaybackDriver per
 * session; nothing else calls stop().
 */
export interface AudioSink<TSource> {
  /** Begin streaming. Resolves once playback is under way. */
  start(source: TSource): void | Promise<void>;
  stop(): void | Promise<void>;
  /** Polled; false once the sink has drained or been stopped. */
  isPlaying(): boolean;
}

// ─── TTS Plugin ──────────────────────────────────────────────────────────────

export interface TTSPlugin {
  synthesize(text: string, signal?: AbortSignal): AsyncGenerator<Buffer>;
  /** Optional: pre-connect to TTS server */
  warmup?(): Promise<void>;
}

// ─── Sessions ────────────────────────────────────────────────────────────────

export interface PlaybackSnapshot {
  readonly isPlaying: boolean;
  readonly stopRequested: boolean;
  readonly bargeInConfirmed: boolean;
}

export type DriverState = 'idle' | 'starting' | 'playing' | 'stopping' | 'finished';

export type PlaybackOutcome = 'completed' | 'interrupted' | 'cancelled';

export interface PlaybackResult {
  sessionId: number;
  outcome: PlaybackOutcome;
  /** SinkStartError or SinkStopError, for diagnostics only */
  error?: Error;
  /** Set when the detection source failed during the session */
  detectionError?: Error;
  /** Stop request → sink.stop() settled. Only for stopped sessions. */
  stopLatencyMs?: number;
  durationMs: number;
}

export interface SessionHandle {
  readonly id: number;
}

export type MonitorExit = 'confirmed' | 'finished' | 'cancelled' | 'source-ended' | 'source-error';

export interface MonitorReport {
  exit: MonitorExit;
  eventsSeen: number;
  error?: Error;
}

// ─── Options ─────────────────────────────────────────────────────────────────

export interface ControllerOptions<TSource> {
  sink: AudioSink<TSource>;
  /** Detection stream for barge-in. Without one only requestInterrupt() stops playback. */
  detection?: DetectionSource;
  /** Confirmation policy (default: 2 consecutive speech events) */
  policy?: ConfirmationPolicy;
  /** Driver poll interval; bounds how late a natural end is noticed (default: 10ms) */
  pollIntervalMs?: number;
  /** How often the monitor checks whether playback is over (default: 10ms, max 10ms) */
  monitorPollIntervalMs?: number;
  /** Ignore detection events this soon after playback starts (default: 0) */
  echoGuardMs?: number;
  /** Default for BeginPlaybackOptions.bargeIn (default: true) */
  bargeIn?: boolean;
  /** Finished sessions kept for waitForCompletion()/snapshot() (default: 8) */
  retainFinishedSessions?: number;
  /** Clock for latency and echo-guard arithmetic (default: performance.now) */
  now?: () => number;
}

export interface BeginPlaybackOptions {
  /** Run the barge-in monitor for this session */
  bargeIn?: boolean;
}

// ─── Events ──────────────────────────────────────────────────────────────────

export interface ControllerEvents {
  state: (state: DriverState, sessionId: number) => void;
  /** A user interruption was confirmed. */
  bargeIn: (sessionId: number, event: DetectionEvent) => void;
  finished: (result: PlaybackResult) => void;
  error: (error: Error, sessionId: number) => void;
}
