import { ConfigurationError } from "@packsmith/errors";
import { z } from "zod";

/** Background task queue settings */
export const TaskQueueOptionsSchema = z.object({
  /** Used in log lines and errors */
  name: z.string().min(1).default("bg-queue"),
  /** Maximum number of queued (not yet running) tasks */
  capacity: z.number().int().positive().default(256),
  /** Number of workers running tasks in parallel */
  concurrency: z.number().int().positive().default(1),
  /** Pause each worker takes after every task, in ms */
  delayMs: z.number().int().nonnegative().default(0),
  /**
   * What `enqueue` does when the queue is full: reject with
   * TaskQueueFullError, or wait for a free slot
   */
  overflow: z.enum(["reject", "block"]).default("reject"),
});

export type TaskQueueOptions = z.infer<typeof TaskQueueOptionsSchema>;
export type TaskQueueOptionsInput = z.input<typeof TaskQueueOptionsSchema>;
export type OverflowPolicy = TaskQueueOptions["overflow"];

/**
 * @throws ConfigurationError listing every zod issue as `path: message`
 */
export function parseTaskQueueOptions(raw: unknown): TaskQueueOptions {
  const result = TaskQueueOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      "task-queue",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}
