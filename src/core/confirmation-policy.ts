import type { ConfirmationPolicy, DetectionEvent } from './types';

export interface ConsecutivePolicyOptions {
  /** Consecutive speech events needed to confirm (default: 2) */
  threshold?: number;
  /**
   * What a non-speech event does to the run: 'reset' starts over,
   * 'decrement' takes one off so a single dropout does not lose the run.
   * Default: 'reset'
   */
  decay?: 'reset' | 'decrement';
}

/** Confirms after N speech events in a row. */
export class ConsecutivePolicy implements ConfirmationPolicy {
  private readonly threshold: number;
  private readonly decay: 'reset' | 'decrement';
  private count = 0;

  constructor(options: ConsecutivePolicyOptions = {}) {
    this.threshold = Math.max(1, Math.floor(options.threshold ?? 2));
    this.decay = options.decay ?? 'reset';
  }

  get consecutive(): number {
    return this.count;
  }

  reset(): void {
    this.count = 0;
  }

  observe(event: DetectionEvent): boolean {
    if (event.speech) {
      this.count++;
    } else if (this.decay === 'decrement') {
      this.count = Math.max(0, this.count - 1);
    } else {
      this.count = 0;
    }
    return this.count >= this.threshold;
  }
}

export interface ConfidencePolicyOptions {
  /** Minimum confidence for a speech event to count (default: 0.5) */
  minConfidence?: number;
  /** Qualifying events in a row needed to confirm (default: 1) */
  threshold?: number;
}

/**
 * Confirms on speech events at or above a confidence floor.
 * Events without a confidence count as certain.
 */
export class ConfidencePolicy implements ConfirmationPolicy {
  private readonly minConfidence: number;
  private readonly threshold: number;
  private count = 0;

  constructor(options: ConfidencePolicyOptions = {}) {
    this.minConfidence = options.minConfidence ?? 0.5;
    this.threshold = Math.max(1, Math.floor(options.threshold ?? 1));
  }

  reset(): void {
    this.count = 0;
  }

  observe(event: DetectionEvent): boolean {
    const confidence = event.confidence ?? 1;
    if (event.speech && confidence >= this.minConfidence) {
      this.count++;
    } else {
      this.count = 0;
    }
    return this.count >= this.threshold;
  }
}
