/**
 * =============================================================================
 * ADMISSION GATE - Per-Instance Concurrency Limit
 * =============================================================================
 *
 * Bounds how many pricing pipelines run at once inside one instance.
 *
 * BEHAVIOUR:
 * - Up to `capacity` callers hold a permit at the same time
 * - Everyone else waits in arrival order (FIFO)
 * - No queue limit and no wait timeout: a waiter is admitted eventually
 *
 * USAGE:
 * ```typescript
 * const gate = new AdmissionGate({ capacity: 100 });
 *
 * const quote = await gate.run(() => pricePipeline(request));
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';

/**
 * Waiting caller
 */
interface Waiter {
  id: number;
  enqueuedAt: number;
  admit: () => void;
}

export interface AdmissionGateOptions {
  /** Maximum pipelines holding a permit at once */
  capacity?: number;
  /** Name for logging */
  name?: string;
}

const DEFAULT_OPTIONS: Required<AdmissionGateOptions> = {
  capacity: 100,
  name: 'pricing'
};

export interface AdmissionGateStats {
  name: string;
  capacity: number;
  active: number;
  waiting: number;
  peakActive: number;
  admitted: number;
}

export class AdmissionGate {
  private waiters: Waiter[] = [];
  private activeCount = 0;
  private peakActive = 0;
  private admittedCount = 0;
  private waiterCounter = 0;
  private readonly options: Required<AdmissionGateOptions>;

  constructor(options: AdmissionGateOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };

    if (!Number.isInteger(this.options.capacity) || this.options.capacity < 1) {
      throw new RangeError(`Admission capacity must be a positive integer, got ${this.options.capacity}`);
    }
  }

  /**
   * Take a permit, waiting in line if all are held
   */
  acquire(): Promise<void> {
    if (this.activeCount < this.options.capacity) {
      this.admit();
      return Promise.resolve();
    }

    return new Promise(resolve => {
      const waiter: Waiter = {
        id: ++this.waiterCounter,
        enqueuedAt: Date.now(),
        admit: () => {
          this.admit();
          resolve();
        }
      };
      this.waiters.push(waiter);

      logger.debug(`Request ${waiter.id} waiting for admission`, {
        gate: this.options.name,
        waiting: this.waiters.length
      });
    });
  }

  /**
   * Return a permit and admit the longest waiter, if any
   */
  release(): void {
    if (this.activeCount > 0) {
      this.activeCount--;
    } else {
      logger.warn(`Admission gate '${this.options.name}' release called with no permit held`);
    }

    const next = this.waiters.shift();
    if (!next) return;

    logger.debug(`Request ${next.id} admitted after waiting`, {
      gate: this.options.name,
      waitMs: Date.now() - next.enqueuedAt
    });
    next.admit();
  }

  /**
   * Run `task` under a permit; the permit is returned however the task ends
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getStats(): AdmissionGateStats {
    return {
      name: this.options.name,
      capacity: this.options.capacity,
      active: this.activeCount,
      waiting: this.waiters.length,
      peakActive: this.peakActive,
      admitted: this.admittedCount
    };
  }

  private admit(): void {
    this.activeCount++;
    this.admittedCount++;
    if (this.activeCount > this.peakActive) {
      this.peakActive = this.activeCount;
    }
  }
}
