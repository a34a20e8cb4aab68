/**
 * Base error class for all Qzark errors.
 * Extends Error with a machine-readable code and structured context.
 */
export class QzarkError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    cause?: unknown;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'QzarkError';
    this.code = params.code;
    this.context = params.context;
  }
}

/** A task record in the task file is malformed or incomplete. */
export class TaskDefinitionError extends QzarkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'TASK_DEFINITION_ERROR',
      context,
    });
    this.name = 'TaskDefinitionError';
  }
}

/** A task command exited non-zero, could not be spawned, or timed out. */
export class TaskExecutionError extends QzarkError {
  constructor(taskName: string, message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'TASK_EXECUTION_ERROR',
      context: { taskName, ...context },
    });
    this.name = 'TaskExecutionError';
  }
}

/** Delivery through one notification channel failed. */
export class NotificationDeliveryError extends QzarkError {
  public readonly channel: string;

  constructor(channel: string, message: string, cause?: unknown) {
    super({
      message: `${channel} delivery failed: ${message}`,
      code: 'NOTIFICATION_DELIVERY_ERROR',
      cause,
      context: { channel },
    });
    this.name = 'NotificationDeliveryError';
    this.channel = channel;
  }
}

/** The task queue backend could not be reached or returned bad data. */
export class QueueBackendError extends QzarkError {
  constructor(backend: string, message: string, cause?: unknown) {
    super({
      message: `Queue backend "${backend}" error: ${message}`,
      code: 'QUEUE_BACKEND_ERROR',
      cause,
      context: { backend },
    });
    this.name = 'QueueBackendError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends QzarkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Best-effort message extraction for values caught in a `catch` clause. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
