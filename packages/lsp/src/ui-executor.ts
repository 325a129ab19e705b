import { createConsoleLogger, type Logger } from "@packsmith/core";
import { getErrorMessage } from "@packsmith/errors";

export type UiAction = () => void;

/** Marshals visual mutations onto the thread that owns rendering. */
export interface UiExecutor {
  post(action: UiAction): void;
}

/**
 * Runs posted actions on a later event-loop turn, in post order, one batch
 * per turn. While not running it executes actions inline. UI work is
 * best-effort: a failing action is logged at debug and dropped.
 */
export class EventLoopUiExecutor implements UiExecutor {
  private pending: UiAction[] = [];
  private scheduled: NodeJS.Immediate | undefined;
  private running = false;

  constructor(private readonly logger: Logger = createConsoleLogger("ui")) {}

  start(): void {
    this.running = true;
  }

  /** Stops scheduling; anything still pending runs inline now. */
  stop(): void {
    this.running = false;
    if (this.scheduled !== undefined) {
      clearImmediate(this.scheduled);
      this.scheduled = undefined;
    }
    this.drain();
  }

  post(action: UiAction): void {
    if (!this.running) {
      this.runSafely(action);
      return;
    }
    this.pending.push(action);
    this.scheduled ??= setImmediate(() => {
      this.scheduled = undefined;
      this.drain();
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  private drain(): void {
    const batch = this.pending;
    this.pending = [];
    for (const action of batch) {
      this.runSafely(action);
    }
  }

  private runSafely(action: UiAction): void {
    try {
      action();
    } catch (err) {
      this.logger.debug(`UI action failed: ${getErrorMessage(err)}`);
    }
  }
}
