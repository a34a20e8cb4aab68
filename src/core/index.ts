export {
  QzarkError,
  TaskDefinitionError,
  TaskExecutionError,
  NotificationDeliveryError,
  QueueBackendError,
  ValidationError,
  errorMessage,
} from './errors.js';
export type { Result } from './result.js';
export { ok, err, settle, unwrap } from './result.js';
export type { Task, TaskRecord, ExecutionStatus, ExecutionResult } from './types.js';
export { DEFAULT_INTERVAL_SECONDS, toTaskRecord, fromTaskRecord } from './types.js';
