/**
 * Plays a synthetic tone and lets a scripted "user" talk over it.
 *
 * Usage:
 *   npx tsx examples/basic-playback.ts
 */

import {
  EventQueue,
  InterruptController,
  PcmStreamSink,
  Speaker,
  setLogLevel,
  type AudioFrame,
  type DetectionEvent,
  type DetectionSource,
  type FrameTarget,
  type TTSPlugin,
} from '../src';

setLogLevel('info');

const SAMPLE_RATE = 48000;

/** Counts frames instead of sending them anywhere. */
class CountingTarget implements FrameTarget {
  frames = 0;

  async captureFrame(frame: AudioFrame): Promise<void> {
    this.frames++;
    if (this.frames % 50 === 0) {
      console.log(`  ${this.frames} frames (${frame.samplesPerChannel} samples each)`);
    }
  }
}

/** 440Hz tone, 100ms per chunk, roughly one second per word. */
const toneTTS: TTSPlugin = {
  async *synthesize(text: string, signal?: AbortSignal): AsyncGenerator<Buffer> {
    const chunks = text.split(/\s+/).length * 10;
    const samples = SAMPLE_RATE / 10;
    for (let c = 0; c < chunks && !signal?.aborted; c++) {
      const buf = Buffer.alloc(samples * 2);
      for (let i = 0; i < samples; i++) {
        const t = (c * samples + i) / SAMPLE_RATE;
        buf.writeInt16LE(Math.round(Math.sin(2 * Math.PI * 440 * t) * 8000), i * 2);
      }
      yield buf;
    }
  },
};

/** A user who never stops talking; the echo guard holds them off at first. */
class ScriptedUser implements DetectionSource {
  stream(signal: AbortSignal): AsyncIterable<DetectionEvent> {
    const queue = new EventQueue<DetectionEvent>(signal);
    const timer = setInterval(() => {
      queue.push({ speech: true, timestamp: performance.now() });
    }, 50);
    signal.addEventListener('abort', () => clearInterval(timer), { once: true });
    return queue;
  }
}

const target = new CountingTarget();
const controller = new InterruptController<AsyncIterable<Buffer>>({
  sink: new PcmStreamSink(target, { sampleRate: SAMPLE_RATE }),
  detection: new ScriptedUser(),
  echoGuardMs: 1500,
});

controller.on('state', (state, sessionId) => console.log(`#${sessionId} ${state}`));
controller.on('bargeIn', (sessionId) => console.log(`#${sessionId} user barged in`));
controller.on('error', (error, sessionId) => console.error(`#${sessionId} error:`, error.message));

const speaker = new Speaker(controller, toneTTS);

const calm = await speaker.say('one two', { bargeIn: false });
console.log(`First utterance: ${calm.outcome} in ${calm.durationMs.toFixed(0)}ms`);

const long = await speaker.say('this sentence goes on for quite a while');
console.log(
  `Second utterance: ${long.outcome} in ${long.durationMs.toFixed(0)}ms ` +
    `(stop latency ${long.stopLatencyMs?.toFixed(0) ?? 'n/a'}ms)`,
);

await controller.shutdown();
