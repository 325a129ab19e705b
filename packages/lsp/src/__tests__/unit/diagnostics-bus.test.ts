import { describe, expect, it, vi } from "vitest";
import { DiagnosticsBus } from "../../diagnostics-bus.js";
import type { DiagnosticsNotification } from "../../types.js";
import { createMockLogger, diagnostic } from "../helpers/fixtures.js";

const NOTIFICATION: DiagnosticsNotification = {
  uri: "file:///pack/a.json",
  diagnostics: [diagnostic(1, [0, 0], [0, 1])],
};

describe("DiagnosticsBus", () => {
  it("delivers to every subscriber in subscription order", () => {
    const bus = new DiagnosticsBus({ logger: createMockLogger() });
    const calls: string[] = [];
    bus.subscribe(() => calls.push("first"));
    bus.subscribe(() => calls.push("second"));

    bus.publish(NOTIFICATION);

    expect(calls).toEqual(["first", "second"]);
  });

  it("hands the notification through unchanged", () => {
    const bus = new DiagnosticsBus({ logger: createMockLogger() });
    const listener = vi.fn();
    bus.subscribe(listener);

    bus.publish(NOTIFICATION);

    expect(listener).toHaveBeenCalledWith(NOTIFICATION);
  });

  it("assigns distinct ids and stops delivery after unsubscribe", () => {
    const bus = new DiagnosticsBus({ logger: createMockLogger() });
    const listener = vi.fn();
    const id = bus.subscribe(listener);
    const other = bus.subscribe(() => {});

    expect(other).not.toBe(id);
    expect(bus.unsubscribe(id)).toBe(true);
    expect(bus.unsubscribe(id)).toBe(false);
    expect(bus.size).toBe(1);

    bus.publish(NOTIFICATION);
    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps delivering when a listener throws", () => {
    const logger = createMockLogger();
    const bus = new DiagnosticsBus({ logger });
    const after = vi.fn();
    const badId = bus.subscribe(() => {
      throw new Error("render exploded");
    });
    bus.subscribe(after);

    expect(() => bus.publish(NOTIFICATION)).not.toThrow();

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      `Listener ${badId} failed on diagnostics for file:///pack/a.json: render exploded`,
    );
  });

  it("reports listener errors to onListenerError when given", () => {
    const onListenerError = vi.fn();
    const logger = createMockLogger();
    const bus = new DiagnosticsBus({ onListenerError, logger });
    const id = bus.subscribe(() => {
      throw new Error("boom");
    });

    bus.publish(NOTIFICATION);

    expect(onListenerError).toHaveBeenCalledWith(expect.any(Error), id);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("publishes to a snapshot when listeners change mid-delivery", () => {
    const bus = new DiagnosticsBus({ logger: createMockLogger() });
    const late = vi.fn();
    let secondId = -1;
    bus.subscribe(() => {
      bus.unsubscribe(secondId);
      bus.subscribe(late);
    });
    const second = vi.fn();
    secondId = bus.subscribe(second);

    bus.publish(NOTIFICATION);

    expect(second).toHaveBeenCalledTimes(1);
    expect(late).not.toHaveBeenCalled();
  });
});
