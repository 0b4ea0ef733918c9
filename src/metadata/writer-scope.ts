import { AsyncLocalStorage } from "node:async_hooks";
import { Semaphore } from "../engine/semaphore.js";

/**
 * Single-writer gate shared by the metadata indexes.
 *
 * transaction() bodies run under a one-permit mutex inside an async context.
 * Calls made from within that context go straight through and see the
 * uncommitted state; calls from anywhere else wait for the writer to commit
 * or roll back, so they only ever observe committed state.
 */
export class WriterScope {
  private readonly mutex = new Semaphore(1);
  private readonly context = new AsyncLocalStorage<true>();

  /** Hold the writer mutex for fn (setup, body and commit all run under it) */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(fn);
  }

  /** Run the transaction body; calls it makes bypass the gate */
  enter<T>(fn: () => Promise<T>): Promise<T> {
    return this.context.run(true, fn);
  }

  get inside(): boolean {
    return this.context.getStore() === true;
  }

  /**
   * Run a read or a standalone write against committed state: immediately
   * when called from the open transaction, otherwise once no writer holds
   * the gate.
   */
  async guard<T>(fn: () => T | Promise<T>): Promise<T> {
    if (this.inside) return fn();
    return this.mutex.run(async () => fn());
  }
}
