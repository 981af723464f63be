import type { PlaybackResult, TTSPlugin } from './types';
import type { InterruptController } from './interrupt-controller';
import { createLogger } from '../utils/logger';

const log = createLogger('Speaker');

export interface SayOptions {
  /** Run the barge-in monitor for this utterance (default: controller setting) */
  bargeIn?: boolean;
  /**
   * Interrupt a session that is still playing and wait for it before
   * speaking (default: true). When false, a busy controller throws
   * AlreadyPlayingError.
   */
  preempt?: boolean;
}

/**
 * Speaks text through a TTS plugin under an InterruptController.
 * Synthesis is aborted as soon as playback ends without completing.
 */
export class Speaker {
  private readonly controller: InterruptController<AsyncIterable<Buffer>>;
  private readonly tts: TTSPlugin;

  constructor(controller: InterruptController<AsyncIterable<Buffer>>, tts: TTSPlugin) {
    this.controller = controller;
    this.tts = tts;
  }

  async say(text: string, options: SayOptions = {}): Promise<PlaybackResult> {
    const active = this.controller.activeHandle;
    if (active && (options.preempt ?? true)) {
      log.info(`Stopping session #${active.id} before new speech`);
      this.controller.requestInterrupt(active);
      await this.controller.waitForCompletion(active);
    }

    const abort = new AbortController();
    const stream = this.tts.synthesize(text, abort.signal);
    const handle = this.controller.beginPlayback(stream, { bargeIn: options.bargeIn });

    log.info(`say() #${handle.id}: "${text.slice(0, 60)}"`);

    const result = await this.controller.waitForCompletion(handle);
    if (result.outcome !== 'completed') {
      abort.abort();
      log.debug(`say() #${handle.id} ${result.outcome} — synthesis aborted`);
    }
    return result;
  }
}
