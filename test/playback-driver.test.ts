import { describe, it, expect, vi, afterEach } from 'vitest';
import { PlaybackDriver } from '../src/core/playback-driver';
import { PlaybackSession } from '../src/core/playback-state';
import { SinkStartError, SinkStopError } from '../src/core/errors';
import { MockAudioSink } from './helpers/mock-providers';
import type { DriverState } from '../src/core/types';
import type { Logger } from '../src/utils/logger';

// Suppress logger output in tests
vi.mock('../src/utils/logger', () => {
  function silent(): Logger {
    return { debug: () => {}, info: () => {}, warn: () => {}, error: () => {}, child: silent };
  }
  return { createLogger: silent };
});

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function setup(pollIntervalMs = 5, now: () => number = () => performance.now()) {
  const sink = new MockAudioSink();
  const session = new PlaybackSession(1, now());
  const states: DriverState[] = [];
  const driver = new PlaybackDriver(sink, session, {
    pollIntervalMs,
    now,
    onStateChange: (state) => states.push(state),
  });
  return { sink, session, states, driver };
}

describe('PlaybackDriver', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts idle', () => {
    const { driver } = setup();
    expect(driver.state).toBe('idle');
    expect(driver.sessionId).toBe(1);
  });

  it('completes naturally without calling stop()', async () => {
    const { sink, session, states, driver } = setup();
    const result = await driver.run(20);

    expect(result.outcome).toBe('completed');
    expect(result.sessionId).toBe(1);
    expect(result.error).toBeUndefined();
    expect(result.stopLatencyMs).toBeUndefined();
    expect(sink.startCalls).toBe(1);
    expect(sink.stopCalls).toBe(0);
    expect(states).toEqual(['starting', 'playing', 'stopping', 'finished']);
    expect(session.snapshot().isPlaying).toBe(false);
  });

  it('stops the sink once on a barge-in request → interrupted', async () => {
    const { sink, session, driver } = setup();
    const done = driver.run(Infinity);

    await sleep(12);
    expect(driver.state).toBe('playing');
    session.requestStop(true);
    session.requestStop(true);

    const result = await done;
    expect(result.outcome).toBe('interrupted');
    expect(sink.stopCalls).toBe(1);
    expect(result.stopLatencyMs).toBeGreaterThanOrEqual(0);
    expect(session.snapshot()).toEqual({
      isPlaying: false,
      stopRequested: true,
      bargeInConfirmed: true,
    });
  });

  it('a caller cancel finishes as cancelled', async () => {
    const { sink, session, driver } = setup();
    const done = driver.run(Infinity);
    await sleep(2);
    session.requestStop(false);

    const result = await done;
    expect(result.outcome).toBe('cancelled');
    expect(sink.stopCalls).toBe(1);
  });

  it('a stop requested before the sink started still stops it', async () => {
    const { sink, session, driver } = setup();
    session.requestStop(true);

    const result = await driver.run(Infinity);
    expect(result.outcome).toBe('interrupted');
    expect(sink.startCalls).toBe(1);
    expect(sink.stopCalls).toBe(1);
  });

  it('sink start failure ends the session as completed with the error recorded', async () => {
    const { sink, session, states, driver } = setup();
    const cause = new Error('device busy');
    sink.startError = cause;

    const result = await driver.run(100);
    expect(result.outcome).toBe('completed');
    expect(result.error).toBeInstanceOf(SinkStartError);
    expect(result.error?.message).toBe('Sink failed to start: device busy');
    expect(result.error?.cause).toBe(cause);
    expect(states).toEqual(['starting', 'finished']);
    expect(sink.stopCalls).toBe(0);
    expect(session.snapshot().isPlaying).toBe(false);
  });

  it('passes a SinkStartError from the sink through unchanged', async () => {
    const { sink, driver } = setup();
    const err = new SinkStartError('already playing');
    sink.startError = err;

    const result = await driver.run(100);
    expect(result.error).toBe(err);
  });

  it('sink stop failure is recorded, not thrown, and the session still finishes', async () => {
    const { sink, session, driver } = setup();
    sink.stopError = new Error('driver wedged');
    const done = driver.run(Infinity);

    await sleep(2);
    session.requestStop(true);

    const result = await done;
    expect(result.outcome).toBe('interrupted');
    expect(result.error).toBeInstanceOf(SinkStopError);
    expect(result.error?.message).toBe('Sink failed to stop: driver wedged');
    expect(driver.state).toBe('finished');
    expect(session.snapshot().isPlaying).toBe(false);
  });

  it('a throwing onStateChange callback still lets the session finish', async () => {
    const sink = new MockAudioSink();
    const session = new PlaybackSession(1, performance.now());
    const driver = new PlaybackDriver(sink, session, {
      pollIntervalMs: 5,
      now: () => performance.now(),
      onStateChange: () => {
        throw new Error('listener bug');
      },
    });

    const done = driver.run(Infinity);
    await sleep(2);
    session.requestStop(false);

    const result = await done;
    expect(result.outcome).toBe('cancelled');
    expect(driver.state).toBe('finished');
    expect(sink.stopCalls).toBe(1);
    expect(session.snapshot().isPlaying).toBe(false);
  });

  it('a stop requested while the start is failing is not an interruption', async () => {
    const { sink, session, driver } = setup();
    sink.startDelayMs = 20;
    sink.startError = new Error('no device');

    const done = driver.run(10);
    session.requestStop(true);

    const result = await done;
    expect(result.outcome).toBe('completed');
    expect(result.error).toBeInstanceOf(SinkStartError);
    expect(result.stopLatencyMs).toBeUndefined();
    expect(sink.stopCalls).toBe(0);
  });

  it('waitForCompletion after finish resolves with the same result', async () => {
    const { driver } = setup();
    const result = await driver.run(5);

    expect(await driver.waitForCompletion()).toBe(result);
    expect(await driver.run(5)).toBe(result);
  });

  it('waitForCompletion before finish is released by the end', async () => {
    const { driver, session } = setup();
    const waiting = driver.waitForCompletion();
    const done = driver.run(Infinity);
    session.requestStop(false);

    expect(await waiting).toBe(await done);
  });

  it('stop latency is bounded by poll interval + sink stop time', async () => {
    vi.useFakeTimers();
    const P = 10;
    const S = 20;
    const { sink, session, driver } = setup(P, () => Date.now());
    sink.stopDelayMs = S;

    const done = driver.run(Infinity);
    await vi.advanceTimersByTimeAsync(15);
    session.requestStop(true, Date.now());
    await vi.advanceTimersByTimeAsync(S);

    const result = await done;
    expect(result.outcome).toBe('interrupted');
    expect(result.stopLatencyMs).toBe(S);
    expect(result.stopLatencyMs).toBeLessThanOrEqual(P + S);
  });

  it('notices a natural end within one poll interval', async () => {
    vi.useFakeTimers();
    const { sink, driver } = setup(10, () => Date.now());

    const done = driver.run(Infinity);
    await vi.advanceTimersByTimeAsync(25);
    expect(driver.state).toBe('playing');

    sink.finishNaturally();
    await vi.advanceTimersByTimeAsync(10);
    expect(driver.state).toBe('finished');
    expect((await done).outcome).toBe('completed');
  });
});
