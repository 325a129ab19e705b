import { PacksmithError } from "./base.js";

export abstract class TaskQueueError extends PacksmithError {
  abstract readonly queueName: string;
}

/**
 * Rejection for `enqueue` on a full queue under the "reject" overflow policy.
 */
export class TaskQueueFullError extends TaskQueueError {
  readonly code = "TASK_QUEUE_FULL" as const;

  constructor(
    readonly queueName: string,
    readonly capacity: number,
  ) {
    super(`Task queue '${queueName}' is full (capacity ${capacity})`, {
      queueName,
      capacity: String(capacity),
    });
  }
}

export class TaskQueueClosedError extends TaskQueueError {
  readonly code = "TASK_QUEUE_CLOSED" as const;

  constructor(readonly queueName: string) {
    super(`Task queue '${queueName}' is closing`, { queueName });
  }
}
