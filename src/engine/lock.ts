/**
 * DICEPOOL - Engine Lock
 *
 * Every state-changing entry point runs through one EngineLock, so the
 * engine behaves as a single serialized state machine: calls queue up and
 * run one at a time. A call issued from *inside* a running operation (a
 * token hook calling back into the engine) is rejected rather than queued,
 * since queuing it behind its own caller would deadlock. Event listeners are
 * delivered through `outside()`, so they count as new callers.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { EngineError } from '../betting/errors';

export class EngineLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly holder = new AsyncLocalStorage<string>();

  /** Name of the operation whose async context we are in, if any. */
  get current(): string | undefined {
    return this.holder.getStore();
  }

  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const active = this.holder.getStore();
    if (active !== undefined) {
      return Promise.reject(
        new EngineError('Reentrancy', `${operation} called while ${active} is in progress`),
      );
    }

    const result = this.tail.then(() => this.holder.run(operation, fn));
    // The queue advances whether the operation succeeded or not.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /**
   * Run `fn` detached from the current operation. Work it schedules (timers,
   * microtasks, engine calls) is treated as a new caller and queues normally.
   */
  outside<T>(fn: () => T): T {
    return this.holder.exit(fn);
  }

  /** Throws unless called from inside a running operation. */
  assertHeld(what: string): void {
    if (this.holder.getStore() === undefined) {
      throw new Error(`${what} must run inside an engine operation`);
    }
  }
}
