import type { Request, Response, NextFunction } from 'express';
import type { TaskStatus } from '../types';
import { QueueFullError, UnknownTaskError } from './errors';
import type { TaskExecutor } from './taskExecutor';

export type DeferredOptions<T> = {
  executor: TaskExecutor<T>;
  work: (req: Request) => () => T | Promise<T>;
  statusPath?: string; // Location prefix for the status route
  hooks?: {
    onSubmitted?: (info: { id: string; req: Request }) => void;
    onRejected?: (info: { error: QueueFullError; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

/**
 * Accepts the request by submitting `work(req)` to the executor and answering
 * 202 with the task id; the client polls the status route for the outcome.
 */
export function deferred<T>(options: DeferredOptions<T>) {
  const { executor, work, statusPath = '/tasks', hooks } = options;

  return function deferredMiddleware(req: Request, res: Response, next: NextFunction) {
    try {
      const { id } = executor.submit(work(req));
      hooks?.onSubmitted?.({ id, req });
      res.setHeader('Location', `${statusPath}/${id}`);
      res.status(202).json({ id, state: 'pending' });
    } catch (error) {
      if (error instanceof QueueFullError) {
        hooks?.onRejected?.({ error, req });
        res.status(503).json({ error: 'Service Unavailable', reason: error.code });
        return;
      }
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}

export interface TaskStatusBody {
  id: string;
  state: TaskStatus['state'];
  result?: unknown;
  error?: string;
  submittedAt: string;
  startedAt?: string;
  finishedAt?: string;
}

export function serializeStatus<T>(status: TaskStatus<T>): TaskStatusBody {
  return {
    id: status.id,
    state: status.state,
    result: status.result,
    error: status.error?.message,
    submittedAt: new Date(status.submittedAt).toISOString(),
    startedAt: status.startedAt === undefined ? undefined : new Date(status.startedAt).toISOString(),
    finishedAt: status.finishedAt === undefined ? undefined : new Date(status.finishedAt).toISOString(),
  };
}

/** Route handler for `GET <statusPath>/:id`. */
export function taskStatus<T>(options: { executor: TaskExecutor<T>; param?: string }) {
  const { executor, param = 'id' } = options;

  return function taskStatusHandler(req: Request, res: Response, next: NextFunction) {
    try {
      res.json(serializeStatus(executor.status(String(req.params[param]))));
    } catch (error) {
      if (error instanceof UnknownTaskError) {
        res.status(404).json({ error: 'Not Found' });
        return;
      }
      next(error);
    }
  };
}
