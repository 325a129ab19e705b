import { createConsoleLogger, type Logger } from "@packsmith/core";
import { getErrorMessage } from "@packsmith/errors";

export type SignalStatus = "pending" | "resolved" | "failed";

type SignalState<T> =
  | { readonly status: "pending" }
  | { readonly status: "resolved"; readonly value: T }
  | { readonly status: "failed"; readonly error: Error };

interface Waiter<T> {
  readonly onReady: (value: T) => void;
  readonly onFailed: ((error: Error) => void) | undefined;
}

/**
 * Single-assignment readiness signal.
 *
 * Settles at most once, either resolved or failed. Waiters attached before
 * settlement run when it happens; waiters attached afterwards run
 * immediately. A throwing waiter is logged and does not stop the others.
 */
export class ReadySignal<T> {
  private state: SignalState<T> = { status: "pending" };
  private waiters: Waiter<T>[] = [];

  constructor(private readonly logger: Logger = createConsoleLogger("ready-signal")) {}

  /** Returns false (and changes nothing) if the signal already settled. */
  resolve(value: T): boolean {
    if (this.state.status !== "pending") return false;
    this.state = { status: "resolved", value };
    this.flush();
    return true;
  }

  /** Returns false (and changes nothing) if the signal already settled. */
  fail(error: Error): boolean {
    if (this.state.status !== "pending") return false;
    this.state = { status: "failed", error };
    this.flush();
    return true;
  }

  whenReady(onReady: (value: T) => void, onFailed?: (error: Error) => void): void {
    const waiter: Waiter<T> = { onReady, onFailed };
    if (this.state.status === "pending") {
      this.waiters.push(waiter);
      return;
    }
    this.invoke(waiter);
  }

  /** Promise view of the signal. */
  wait(): Promise<T> {
    return new Promise<T>((resolve, reject) => this.whenReady(resolve, reject));
  }

  get status(): SignalStatus {
    return this.state.status;
  }

  get waiterCount(): number {
    return this.waiters.length;
  }

  private flush(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      this.invoke(waiter);
    }
  }

  private invoke(waiter: Waiter<T>): void {
    const state = this.state;
    try {
      if (state.status === "resolved") {
        waiter.onReady(state.value);
      } else if (state.status === "failed") {
        waiter.onFailed?.(state.error);
      }
    } catch (error) {
      this.logger.warn(`Readiness waiter threw: ${getErrorMessage(error)}`);
    }
  }
}
