import { Logger } from "@nestjs/common";

import type { AdmissionConfig } from "../config.js";
import { PipelineError, type PipelineStage } from "../errors.js";

interface Waiter {
  admit: () => void;
  reject: (error: unknown) => void;
}

/**
 * Bounds in-flight calls to a shared backend. Callers beyond `maxConcurrent`
 * wait in a bounded FIFO queue for at most `queueTimeoutMs`; anything beyond
 * that is turned away with `CapacityExceeded`.
 */
export class AdmissionGate {
  private readonly logger: Logger;
  private readonly queue: Waiter[] = [];
  private active = 0;

  constructor(
    readonly name: string,
    private readonly stage: PipelineStage,
    private readonly config: AdmissionConfig,
  ) {
    this.logger = new Logger(`AdmissionGate:${name}`);
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.active < this.config.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }
    if (this.queue.length >= this.config.maxQueue) {
      this.logger.debug(`Rejecting call: ${this.active} in flight, ${this.queue.length} queued`);
      return Promise.reject(this.capacityError("queue is full"));
    }

    return new Promise<void>((resolve, reject) => {
      const leave = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        const index = this.queue.indexOf(waiter);
        if (index >= 0) {
          this.queue.splice(index, 1);
        }
      };
      const waiter: Waiter = {
        admit: () => {
          leave();
          resolve();
        },
        reject: (error) => {
          leave();
          reject(error);
        },
      };
      const onAbort = () => waiter.reject(signal?.reason);
      const timer = setTimeout(() => {
        this.logger.debug(`Queued call waited ${this.config.queueTimeoutMs}ms without a slot`);
        waiter.reject(this.capacityError("timed out waiting for a slot"));
      }, this.config.queueTimeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private release(): void {
    const next = this.queue[0];
    if (next) {
      // The slot passes straight to the next waiter; `active` is unchanged.
      next.admit();
      return;
    }
    this.active -= 1;
  }

  private capacityError(reason: string): PipelineError {
    return new PipelineError("CapacityExceeded", this.stage, `${this.name} backend is at capacity: ${reason}`, {
      maxConcurrent: this.config.maxConcurrent,
      maxQueue: this.config.maxQueue,
    });
  }
}
