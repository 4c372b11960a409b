import { Injectable } from '@nestjs/common';

/**
 * Promise-chain mutex serializing every vault file operation and the code refresh read.
 * Operations run one at a time in arrival order. A failed operation does not block the next.
 * Not reentrant: an operation must not wait on another `runExclusive` call.
 */
@Injectable()
export class VaultLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(operation: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const queued = this.tail.then(() => operation());
    this.tail = queued.then(
      () => undefined,
      () => undefined,
    );

    try {
      return await queued;
    } finally {
      this.pending -= 1;
    }
  }

  /** Operations queued or running. */
  get size(): number {
    return this.pending;
  }
}
