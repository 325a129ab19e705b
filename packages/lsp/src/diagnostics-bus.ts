import { createConsoleLogger, type Logger } from "@packsmith/core";
import { toError } from "@packsmith/errors";
import type { DiagnosticsNotification } from "./types.js";

export type DiagnosticsListener = (notification: DiagnosticsNotification) => void;

export interface DiagnosticsBusOptions {
  /** Callback invoked when a listener throws (instead of logging a warning) */
  readonly onListenerError?: (error: Error, subscriptionId: number) => void;
  readonly logger?: Logger;
}

/**
 * In-process fan-out of diagnostics from shared connections to open
 * documents. Neither side holds a reference to the other; sessions come
 * and go by subscription id.
 */
export class DiagnosticsBus {
  private listeners: ReadonlyMap<number, DiagnosticsListener> = new Map();
  private nextId = 0;
  private readonly logger: Logger;
  private readonly onListenerError: ((error: Error, subscriptionId: number) => void) | undefined;

  constructor(options: DiagnosticsBusOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger("diagnostics-bus");
    this.onListenerError = options.onListenerError;
  }

  subscribe(listener: DiagnosticsListener): number {
    const id = this.nextId++;
    // Replace rather than mutate so an in-flight publish keeps its snapshot
    this.listeners = new Map([...this.listeners, [id, listener]]);
    return id;
  }

  /** Returns false when the id is not (or no longer) subscribed. */
  unsubscribe(subscriptionId: number): boolean {
    if (!this.listeners.has(subscriptionId)) return false;
    const next = new Map(this.listeners);
    next.delete(subscriptionId);
    this.listeners = next;
    return true;
  }

  /**
   * Deliver to every current subscriber in subscription order. Listener
   * errors are reported and delivery continues.
   */
  publish(notification: DiagnosticsNotification): void {
    for (const [id, listener] of this.listeners) {
      try {
        listener(notification);
      } catch (err) {
        const error = toError(err);
        if (this.onListenerError) {
          this.onListenerError(error, id);
        } else {
          this.logger.warn(
            `Listener ${id} failed on diagnostics for ${notification.uri}: ${error.message}`,
          );
        }
      }
    }
  }

  get size(): number {
    return this.listeners.size;
  }
}
