import { v4 as uuidv4 } from 'uuid';
import type { TaskHandle, TaskState, TaskStatus } from '../types';
import {
  ConfigError,
  ExecutorClosedError,
  QueueFullError,
  TaskCancelledError,
  UnknownTaskError,
  toError,
} from './errors';
import { silentLogger, type Logger } from './logger';
import type { MetricsCollector } from './metrics';

export type TaskExecutorOptions = {
  workerCount: number;
  queueCapacity?: number; // pending tasks; unbounded when omitted
  retention?: number; // ms a finished task stays queryable; kept until forget() when omitted
  now?: () => number;
  metrics?: MetricsCollector;
  logger?: Logger;
};

type Work<T> = () => T | Promise<T>;

interface TaskRecord<T> {
  status: TaskStatus<T>;
  work?: Work<T>; // dropped once started
  settled: Promise<TaskStatus<T>>;
  settle: (status: TaskStatus<T>) => void;
}

/**
 * Runs submitted work on a fixed number of workers, off the submitting call
 * path. Tasks move pending → running → succeeded | failed; a pending task can
 * be cancelled straight to failed. Failures are recorded, never rethrown.
 */
export class TaskExecutor<T = unknown> {
  readonly workerCount: number;
  readonly queueCapacity: number;
  readonly retention?: number;
  private readonly tasks = new Map<string, TaskRecord<T>>();
  private readonly queue: string[] = [];
  private running = 0;
  private closed = false;
  private readonly idleWaiters: Array<() => void> = [];
  private readonly now: () => number;
  private readonly metrics?: MetricsCollector;
  private readonly logger: Logger;

  constructor(options: TaskExecutorOptions) {
    const { workerCount, queueCapacity = Number.POSITIVE_INFINITY, retention, now = Date.now, metrics, logger } = options;
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new ConfigError(`workerCount must be a positive integer, got ${workerCount}`);
    }
    if (queueCapacity !== Number.POSITIVE_INFINITY && (!Number.isInteger(queueCapacity) || queueCapacity < 0)) {
      throw new ConfigError(`queueCapacity must be a non-negative integer, got ${queueCapacity}`);
    }
    if (retention !== undefined && (!Number.isFinite(retention) || retention < 0)) {
      throw new ConfigError(`retention must be a non-negative number of milliseconds, got ${retention}`);
    }
    this.workerCount = workerCount;
    this.queueCapacity = queueCapacity;
    this.retention = retention;
    this.now = now;
    this.metrics = metrics;
    this.logger = logger ?? silentLogger;
  }

  /**
   * Queues `work` and returns its handle immediately. Throws QueueFullError when
   * `queueCapacity` tasks are already waiting with every worker busy.
   */
  submit(work: Work<T>): TaskHandle {
    if (this.closed) throw new ExecutorClosedError();
    const freeWorkers = this.workerCount - this.running;
    if (this.queue.length >= this.queueCapacity + freeWorkers) {
      this.metrics?.increment('tasksRejected');
      throw new QueueFullError(this.queueCapacity);
    }

    const id = uuidv4();
    let settle: (status: TaskStatus<T>) => void = () => undefined;
    const settled = new Promise<TaskStatus<T>>((resolve) => {
      settle = resolve;
    });
    this.tasks.set(id, {
      status: { id, state: 'pending', submittedAt: this.now() },
      work,
      settled,
      settle,
    });
    this.queue.push(id);
    this.metrics?.increment('tasksSubmitted');
    this.logger.debug('task submitted', { id, queued: this.queue.length });

    // Workers pick up on the next turn, never inside submit
    setImmediate(() => this.dispatch());
    return { id };
  }

  status(handle: TaskHandle | string): TaskStatus<T> {
    return { ...this.record(handle).status };
  }

  /** Resolves with the terminal status; never rejects because the task failed. */
  async wait(handle: TaskHandle | string): Promise<TaskStatus<T>> {
    const status = await this.record(handle).settled;
    return { ...status };
  }

  /** Cancels a task that has not started. Returns false for running or finished tasks. */
  cancel(handle: TaskHandle | string): boolean {
    const record = this.record(handle);
    if (record.status.state !== 'pending') return false;

    const id = record.status.id;
    const index = this.queue.indexOf(id);
    if (index >= 0) this.queue.splice(index, 1);
    record.work = undefined;
    this.metrics?.increment('tasksCancelled');
    this.finish(record, { ok: false, error: new TaskCancelledError(id) });
    this.notifyIdle();
    return true;
  }

  /** Drops the record of a finished task. */
  forget(handle: TaskHandle | string): boolean {
    const record = this.record(handle);
    if (!isTerminal(record.status.state)) return false;
    return this.tasks.delete(record.status.id);
  }

  stats(): Record<TaskState, number> {
    const counts: Record<TaskState, number> = { pending: 0, running: 0, succeeded: 0, failed: 0 };
    for (const { status } of this.tasks.values()) counts[status.state]++;
    return counts;
  }

  /** Refuses new work and resolves once queued and running tasks are done. */
  async shutdown(): Promise<void> {
    this.closed = true;
    if (this.isIdle()) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private dispatch(): void {
    while (this.running < this.workerCount && this.queue.length > 0) {
      const id = this.queue.shift();
      const record = id === undefined ? undefined : this.tasks.get(id);
      if (!record || !record.work) continue;
      this.run(record, record.work).catch((error: unknown) => {
        // run() records task errors itself; reaching here means bookkeeping broke
        this.logger.error('task executor failure', { id, error: toError(error) });
      });
    }
  }

  private async run(record: TaskRecord<T>, work: Work<T>): Promise<void> {
    this.running++;
    record.work = undefined;
    record.status.state = 'running';
    record.status.startedAt = this.now();
    this.logger.debug('task started', { id: record.status.id });

    try {
      const result = await work();
      this.metrics?.increment('tasksSucceeded');
      this.finish(record, { ok: true, result });
    } catch (error) {
      const err = toError(error);
      this.metrics?.increment('tasksFailed');
      this.logger.warn('task failed', { id: record.status.id, error: err });
      this.finish(record, { ok: false, error: err });
    } finally {
      this.running--;
      this.dispatch();
      this.notifyIdle();
    }
  }

  private finish(record: TaskRecord<T>, outcome: { ok: true; result: T } | { ok: false; error: Error }): void {
    record.status.finishedAt = this.now();
    if (outcome.ok) {
      record.status.state = 'succeeded';
      record.status.result = outcome.result;
    } else {
      record.status.state = 'failed';
      record.status.error = outcome.error;
    }
    record.settle({ ...record.status });
    if (this.retention !== undefined) this.scheduleExpiry(record.status.id, this.retention);
  }

  private scheduleExpiry(id: string, retention: number): void {
    const timer = setTimeout(() => {
      if (this.tasks.delete(id)) this.logger.debug('task record expired', { id });
    }, retention);
    timer.unref();
  }

  private record(handle: TaskHandle | string): TaskRecord<T> {
    const id = typeof handle === 'string' ? handle : handle.id;
    const record = this.tasks.get(id);
    if (!record) throw new UnknownTaskError(id);
    return record;
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  private notifyIdle(): void {
    if (!this.closed || !this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}

function isTerminal(state: TaskState): boolean {
  return state === 'succeeded' || state === 'failed';
}
