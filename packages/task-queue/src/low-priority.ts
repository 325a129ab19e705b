import { createConsoleLogger, type Logger } from "@packsmith/core";
import { getErrorMessage } from "@packsmith/errors";
import type { TaskQueueOptionsInput } from "./config.js";
import { BackgroundTaskQueue } from "./queue.js";

/** The shared queue for deferred startup and housekeeping work. */
export const LOW_PRIORITY_QUEUE_OPTIONS = {
  name: "packsmith-low",
  capacity: 1024,
  concurrency: 1,
  delayMs: 250,
  overflow: "reject",
} as const satisfies TaskQueueOptionsInput;

export function createLowPriorityQueue(logger?: Logger): BackgroundTaskQueue {
  return new BackgroundTaskQueue(LOW_PRIORITY_QUEUE_OPTIONS, logger);
}

export interface AppInfo {
  readonly name: string;
  readonly version: string;
}

export interface RuntimeInfo {
  readonly platform: string;
  readonly arch: string;
  readonly nodeVersion: string;
}

export function buildUserAgent(
  app: AppInfo,
  runtime: RuntimeInfo = {
    platform: process.platform,
    arch: process.arch,
    nodeVersion: process.versions.node,
  },
): string {
  const system = `${runtime.platform}; ${runtime.arch}`;
  return `${app.name}/${app.version} (${system}) Node.js/${runtime.nodeVersion}`;
}

export interface LowPriorityTaskOptions {
  readonly app: AppInfo;
  /** Periodic cache housekeeping; failures are logged at debug and ignored */
  readonly maintenance?: () => Promise<void> | void;
  /** Receives the computed user-agent string */
  readonly onUserAgent?: (userAgent: string) => void;
  readonly logger?: Logger;
}

/**
 * Queue the startup work that must not compete with the editor: the
 * user-agent string used for outgoing requests, then cache maintenance.
 */
export async function runLowPriorityTasks(
  queue: BackgroundTaskQueue,
  options: LowPriorityTaskOptions,
): Promise<void> {
  const logger = options.logger ?? createConsoleLogger("startup");

  await queue.enqueue(() => {
    const userAgent = buildUserAgent(options.app);
    logger.info(`User-Agent: ${userAgent}`);
    options.onUserAgent?.(userAgent);
  });

  const maintenance = options.maintenance;
  if (maintenance === undefined) return;
  await queue.enqueue(async () => {
    try {
      await maintenance();
    } catch (err) {
      logger.debug(`Cache maintenance failed: ${getErrorMessage(err)}`);
    }
  });
}
