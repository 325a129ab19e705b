/**
 * @packsmith/task-queue
 *
 * Bounded, throttled background task runner and the low-priority
 * startup tasks that use it.
 */

export { BoundedFifoQueue } from "./bounded-fifo.js";
export {
  type OverflowPolicy,
  parseTaskQueueOptions,
  type TaskQueueOptions,
  type TaskQueueOptionsInput,
  TaskQueueOptionsSchema,
} from "./config.js";
export {
  type AppInfo,
  buildUserAgent,
  createLowPriorityQueue,
  LOW_PRIORITY_QUEUE_OPTIONS,
  type LowPriorityTaskOptions,
  runLowPriorityTasks,
  type RuntimeInfo,
} from "./low-priority.js";
export { BackgroundTaskQueue, type QueuedTask, type ShutdownOptions } from "./queue.js";

export const PACKAGE_NAME = "@packsmith/task-queue";
export const PACKAGE_VERSION = "0.0.0";
