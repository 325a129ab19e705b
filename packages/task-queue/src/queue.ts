import { createConsoleLogger, type Logger, sleep, withTimeout } from "@packsmith/core";
import { getErrorMessage, TaskQueueClosedError, TaskQueueFullError } from "@packsmith/errors";
import { BoundedFifoQueue } from "./bounded-fifo.js";
import {
  parseTaskQueueOptions,
  type TaskQueueOptions,
  type TaskQueueOptionsInput,
} from "./config.js";

export type QueuedTask = () => Promise<void> | void;

export interface ShutdownOptions {
  /** Finish queued tasks first (default: true) */
  readonly drain?: boolean;
  /** Upper bound on waiting for workers (default: 10000) */
  readonly timeoutMs?: number;
}

interface BlockedProducer {
  readonly task: QueuedTask;
  readonly admit: () => void;
  readonly reject: (error: Error) => void;
}

/**
 * Bounded, throttled runner for best-effort background work.
 *
 * A fixed set of workers takes tasks in FIFO order. A failing task is
 * logged and the worker moves on; after every task a worker pauses for
 * `delayMs`.
 */
export class BackgroundTaskQueue {
  readonly options: TaskQueueOptions;

  private readonly logger: Logger;
  private readonly store: BoundedFifoQueue<QueuedTask>;
  private readonly blocked: BlockedProducer[] = [];
  private readonly idleWorkers: (() => void)[] = [];
  private readonly workers: Promise<void>[];
  private closing = false;
  private aborted = false;
  private active = 0;
  private shutdownResult: Promise<boolean> | undefined;

  constructor(options: TaskQueueOptionsInput = {}, logger?: Logger) {
    this.options = parseTaskQueueOptions(options);
    this.logger = logger ?? createConsoleLogger(this.options.name);
    this.store = new BoundedFifoQueue<QueuedTask>(this.options.capacity);
    this.workers = Array.from({ length: this.options.concurrency }, (_, index) =>
      this.runWorker(index),
    );
  }

  get name(): string {
    return this.options.name;
  }

  /** Tasks accepted but not yet picked up by a worker */
  get pending(): number {
    return this.store.size;
  }

  /** Producers waiting for a slot (block overflow only) */
  get waiting(): number {
    return this.blocked.length;
  }

  /** Tasks currently executing */
  get running(): number {
    return this.active;
  }

  get isClosed(): boolean {
    return this.closing;
  }

  /**
   * Add a task. Resolves once the queue has accepted it, not when it ran.
   *
   * @throws TaskQueueClosedError after shutdown started
   * @throws TaskQueueFullError when full and the overflow policy is "reject"
   */
  async enqueue(task: QueuedTask): Promise<void> {
    if (this.closing) {
      throw new TaskQueueClosedError(this.name);
    }
    if (this.tryOffer(task)) return;

    if (this.options.overflow === "reject") {
      throw new TaskQueueFullError(this.name, this.options.capacity);
    }
    await new Promise<void>((admit, reject) => {
      this.blocked.push({ task, admit, reject });
    });
  }

  /** Add a task if there is room right now. Never waits, never throws. */
  tryEnqueue(task: QueuedTask): boolean {
    return !this.closing && this.tryOffer(task);
  }

  /**
   * Stop accepting work and wait for the workers to finish.
   *
   * With `drain`, queued tasks still run; without it they are dropped.
   * Producers blocked on a full queue are rejected either way. Resolves to
   * false if the workers were still busy at the timeout, in which case the
   * rest of the queue is dropped.
   */
  shutdown(options: ShutdownOptions = {}): Promise<boolean> {
    this.shutdownResult ??= this.close(options);
    return this.shutdownResult;
  }

  private async close({ drain = true, timeoutMs = 10_000 }: ShutdownOptions): Promise<boolean> {
    this.closing = true;

    const closed = new TaskQueueClosedError(this.name);
    for (const producer of this.blocked.splice(0)) {
      producer.reject(closed);
    }
    if (!drain) {
      this.abort();
    }
    for (const wake of this.idleWorkers.splice(0)) {
      wake();
    }

    const finished = await withTimeout(Promise.all(this.workers), timeoutMs).then(
      () => true,
      () => false,
    );
    if (!finished) {
      const dropped = this.abort();
      this.logger.warn(
        `Shutdown timed out after ${timeoutMs}ms; dropped ${dropped} queued task(s)`,
      );
    }
    return finished;
  }

  private abort(): number {
    this.aborted = true;
    return this.store.drain().length;
  }

  private tryOffer(task: QueuedTask): boolean {
    // Blocked producers keep their place in line
    if (this.blocked.length > 0 || !this.store.offer(task)) return false;
    this.idleWorkers.shift()?.();
    return true;
  }

  private admitBlocked(): void {
    while (this.blocked.length > 0 && !this.store.isFull) {
      const producer = this.blocked.shift();
      if (producer === undefined) break;
      this.store.offer(producer.task);
      producer.admit();
      this.idleWorkers.shift()?.();
    }
  }

  private async nextTask(): Promise<QueuedTask | undefined> {
    for (;;) {
      if (this.aborted) return undefined;
      const task = this.store.dequeue();
      if (task !== undefined) {
        this.admitBlocked();
        return task;
      }
      if (this.closing) return undefined;
      await new Promise<void>((resolve) => {
        this.idleWorkers.push(resolve);
      });
    }
  }

  private async runWorker(index: number): Promise<void> {
    for (;;) {
      const task = await this.nextTask();
      if (task === undefined) return;

      this.active++;
      try {
        await task();
      } catch (err) {
        this.logger.error(`[worker-${index}] task failed: ${getErrorMessage(err)}`, err);
      } finally {
        this.active--;
      }

      if (this.options.delayMs > 0 && !this.aborted) {
        await sleep(this.options.delayMs);
      }
    }
  }
}
