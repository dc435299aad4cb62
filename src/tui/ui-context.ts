/**
 * Single update context for the terminal UI.
 *
 * Every task that touches UI-owned state (editor, preview, label, cursor)
 * runs through this FIFO queue, one at a time. Tasks from the UI's own key
 * and mouse handlers use `run()`; callbacks arriving from anywhere else
 * (global hot-keys) use `post()`, which never runs the task inline.
 */

import type { Logger } from '../logger.js';

export type UiTask = () => void;

export interface UiContextOptions {
  /** Schedules a queue drain on a later turn. Defaults to `setImmediate`. */
  defer?: (fn: () => void) => void;
  logger?: Logger;
}

export class UiContext {
  private readonly queue: UiTask[] = [];
  private readonly defer: (fn: () => void) => void;
  private readonly logger?: Logger;
  private running = false;
  private scheduled = false;
  private disposed = false;

  constructor(options: UiContextOptions = {}) {
    this.defer = options.defer ?? (fn => { setImmediate(fn); });
    this.logger = options.logger;
  }

  /**
   * Run a task raised by the UI itself. Runs now when the context is idle,
   * otherwise after the in-flight task and everything queued before it.
   */
  run(task: UiTask): void {
    if (this.disposed) return;
    this.queue.push(task);
    if (!this.running) this.drain();
  }

  /**
   * Marshal a task from a foreign context. It is queued behind whatever is
   * already pending and runs on a later turn of the event loop.
   */
  post(task: UiTask): void {
    if (this.disposed) return;
    this.queue.push(task);
    this.schedule();
  }

  /** Tasks waiting to run. */
  pending(): number {
    return this.queue.length;
  }

  isRunning(): boolean {
    return this.running;
  }

  dispose(): void {
    this.disposed = true;
    this.queue.length = 0;
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    this.defer(() => {
      this.scheduled = false;
      if (!this.running && !this.disposed) this.drain();
    });
  }

  private drain(): void {
    this.running = true;
    try {
      let task = this.queue.shift();
      while (task) {
        try {
          task();
        } catch (err) {
          this.logger?.error(`ui task failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
        }
        if (this.disposed) return;
        task = this.queue.shift();
      }
    } finally {
      this.running = false;
    }
  }
}
