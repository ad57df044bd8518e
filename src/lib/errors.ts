export class SurgeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends SurgeError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

/** Raised when a pool lease could not be obtained in time. Transient; callers may retry. */
export class TimeoutError extends SurgeError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('ACQUIRE_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for a pooled resource`);
    this.timeoutMs = timeoutMs;
  }
}

export class PoolError extends SurgeError {
  constructor(message: string) {
    super('POOL_MISUSE', message);
  }
}

export class PoolClosedError extends SurgeError {
  constructor() {
    super('POOL_CLOSED', 'Resource pool is closed');
  }
}

export class QueueFullError extends SurgeError {
  readonly capacity: number;

  constructor(capacity: number) {
    super('QUEUE_FULL', `Task queue is full (capacity ${capacity})`);
    this.capacity = capacity;
  }
}

export class ExecutorClosedError extends SurgeError {
  constructor() {
    super('EXECUTOR_CLOSED', 'Task executor has been shut down');
  }
}

export class TaskCancelledError extends SurgeError {
  constructor(id: string) {
    super('TASK_CANCELLED', `Task ${id} was cancelled before it started`);
  }
}

export class UnknownTaskError extends SurgeError {
  constructor(id: string) {
    super('TASK_UNKNOWN', `No task with id ${id}`);
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
