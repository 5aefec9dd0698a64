import { createSubsystemLogger } from "./logging.js";

const log = createSubsystemLogger("core/decode-pool");

export interface PoolTask {
  run(): Promise<void>;
  /** Called by `drain()` for every task it abandons or interrupts. */
  cancel(): void;
}

/**
 * Bounded FIFO runner for heavy decode work. At most `concurrency` tasks are in
 * flight; the rest wait in submission order.
 */
export class DecodePool {
  readonly concurrency: number;
  private readonly queue: PoolTask[] = [];
  private readonly running = new Set<PoolTask>();
  private readonly settled = new Map<PoolTask, Promise<void>>();
  private closed = false;

  constructor(concurrency = 4) {
    this.concurrency = Math.max(1, Math.floor(concurrency));
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get activeCount(): number {
    return this.running.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Queues a task. Returns false once the pool has been drained. */
  submit(task: PoolTask): boolean {
    if (this.closed) return false;
    if (this.running.has(task) || this.queue.includes(task)) return true;
    this.queue.push(task);
    this.pump();
    return true;
  }

  /** Removes a task that has not started yet. Running tasks are left alone. */
  cancel(task: PoolTask): boolean {
    const idx = this.queue.indexOf(task);
    if (idx < 0) return false;
    this.queue.splice(idx, 1);
    return true;
  }

  /** Refuses new work, cancels everything queued or running, and waits for running tasks. */
  async drain(): Promise<void> {
    this.closed = true;
    const abandoned = this.queue.splice(0, this.queue.length);
    for (const task of abandoned) task.cancel();
    for (const task of Array.from(this.running)) task.cancel();
    await Promise.all(Array.from(this.settled.values()));
    if (this.running.size > 0) {
      log.warn("tasks still running after drain", { count: this.running.size });
    }
  }

  private pump(): void {
    while (this.running.size < this.concurrency) {
      const task = this.queue.shift();
      if (!task) return;
      this.running.add(task);
      const settled = this.execute(task);
      this.settled.set(task, settled);
    }
  }

  private async execute(task: PoolTask): Promise<void> {
    try {
      await task.run();
    } catch (error) {
      log.error("decode task failed", { error: error instanceof Error ? error.message : String(error) });
    } finally {
      this.running.delete(task);
      this.settled.delete(task);
      this.pump();
    }
  }
}
