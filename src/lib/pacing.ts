/**
 * Proactive throttling: a fixed delay between requests and a longer pause
 * after every full batch
 */

import type { PacingOptions, Sleep } from '../types';
import { sleep as defaultSleep } from './retry';

export const DEFAULT_INTER_REQUEST_DELAY_MS = 2000;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_BATCH_PAUSE_MS = 30000;

export type PacingWait =
  | { kind: 'none' }
  | { kind: 'delay'; ms: number }
  | { kind: 'batch_pause'; ms: number; batch: number };

export class RequestPacer {
  readonly interRequestDelayMs: number;
  readonly batchSize: number;
  readonly batchPauseMs: number;

  private readonly sleep: Sleep;
  private processedSincePause = 0;
  private completedBatches = 0;
  private started = false;

  constructor(options: Partial<PacingOptions> = {}, sleep: Sleep = defaultSleep) {
    this.interRequestDelayMs = options.interRequestDelayMs ?? DEFAULT_INTER_REQUEST_DELAY_MS;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.batchPauseMs = options.batchPauseMs ?? DEFAULT_BATCH_PAUSE_MS;
    this.sleep = sleep;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
  }

  /**
   * What to wait before the next request. The first request goes out at once
   * and nothing is slept after the last one.
   */
  nextWait(): PacingWait {
    if (!this.started) return { kind: 'none' };
    if (this.processedSincePause >= this.batchSize) {
      return { kind: 'batch_pause', ms: this.batchPauseMs, batch: this.completedBatches + 1 };
    }
    return { kind: 'delay', ms: this.interRequestDelayMs };
  }

  async beforeRequest(onWait?: (wait: PacingWait) => void): Promise<PacingWait> {
    const wait = this.nextWait();
    this.started = true;

    if (wait.kind === 'batch_pause') {
      this.processedSincePause = 0;
      this.completedBatches++;
    }
    if (wait.kind !== 'none') {
      onWait?.(wait);
      if (wait.ms > 0) await this.sleep(wait.ms);
    }
    return wait;
  }

  /** Count one finished item, whatever its outcome */
  itemDone(): void {
    this.processedSincePause++;
  }
}
