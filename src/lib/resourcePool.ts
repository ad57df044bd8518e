import type { Lease } from '../types';
import { ConfigError, PoolClosedError, PoolError, TimeoutError, toError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { MetricsCollector } from './metrics';

export type ResourcePoolOptions<R> = {
  resources: R[];
  destroy?: (resource: R) => void | Promise<void>;
  metrics?: MetricsCollector;
  logger?: Logger;
};

export type CreatePoolOptions<R> = Omit<ResourcePoolOptions<R>, 'resources'> & {
  size: number;
  create: (index: number) => R | Promise<R>;
};

export interface PoolStats {
  size: number;
  available: number;
  inUse: number;
  waiting: number;
}

interface Waiter<R> {
  grant: (lease: Lease<R>) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Fixed set of interchangeable resources handed out as leases. A lease owns
 * its resource until released; waiters are served in arrival order.
 */
export class ResourcePool<R> {
  readonly size: number;
  private readonly idle: R[];
  private readonly leased = new Map<number, R>();
  private readonly waiters: Waiter<R>[] = [];
  private readonly destroy?: (resource: R) => void | Promise<void>;
  private readonly metrics?: MetricsCollector;
  private readonly logger: Logger;
  private nextLeaseId = 1;
  private closed = false;

  constructor(options: ResourcePoolOptions<R>) {
    const { resources, destroy, metrics, logger } = options;
    if (resources.length === 0) throw new ConfigError('A resource pool needs at least one resource');
    this.size = resources.length;
    this.idle = [...resources];
    this.destroy = destroy;
    this.metrics = metrics;
    this.logger = logger ?? silentLogger;
  }

  /** Creates `size` resources up front, in order, and pools them. */
  static async create<R>(options: CreatePoolOptions<R>): Promise<ResourcePool<R>> {
    const { size, create, ...rest } = options;
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigError(`size must be a positive integer, got ${size}`);
    }
    const resources: R[] = [];
    try {
      for (let i = 0; i < size; i++) resources.push(await create(i));
    } catch (error) {
      if (rest.destroy) await Promise.allSettled(resources.map((r) => rest.destroy?.(r)));
      throw toError(error);
    }
    return new ResourcePool({ ...rest, resources });
  }

  /**
   * Leases a resource, waiting for a release when none is idle. With a
   * timeout, rejects with TimeoutError if nothing was released in time.
   */
  acquire(timeout?: number): Promise<Lease<R>> {
    if (this.closed) return Promise.reject(new PoolClosedError());
    if (timeout !== undefined && (!Number.isFinite(timeout) || timeout < 0)) {
      return Promise.reject(new ConfigError(`timeout must be a non-negative number, got ${timeout}`));
    }

    const resource = this.idle.shift();
    if (resource !== undefined) return Promise.resolve(this.lease(resource));

    return new Promise<Lease<R>>((resolve, reject) => {
      const waiter: Waiter<R> = { grant: resolve, reject };
      if (timeout !== undefined) {
        waiter.timer = setTimeout(() => {
          this.removeWaiter(waiter);
          this.metrics?.increment('poolTimeouts');
          this.logger.warn('pool acquire timed out', { timeout, waiting: this.waiters.length });
          reject(new TimeoutError(timeout));
        }, timeout);
      }
      this.waiters.push(waiter);
    });
  }

  /** Returns a leased resource; hands it straight to the oldest waiter if any. */
  release(lease: Lease<R>): void {
    const resource = this.leased.get(lease.id);
    if (resource === undefined || resource !== lease.resource) {
      throw new PoolError(`Lease ${lease.id} is not held from this pool (double release?)`);
    }
    this.leased.delete(lease.id);

    if (this.closed) {
      this.dispose(resource);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.grant(this.lease(resource));
      return;
    }
    this.idle.push(resource);
  }

  /** Runs `fn` with a leased resource and releases it on every exit path. */
  async use<T>(fn: (resource: R) => T | Promise<T>, timeout?: number): Promise<T> {
    const lease = await this.acquire(timeout);
    try {
      return await fn(lease.resource);
    } finally {
      this.release(lease);
    }
  }

  stats(): PoolStats {
    return {
      size: this.size,
      available: this.idle.length,
      inUse: this.leased.size,
      waiting: this.waiters.length,
    };
  }

  /**
   * Rejects queued waiters, refuses further acquisitions and destroys idle
   * resources. Leased resources are destroyed as they are released.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(new PoolClosedError());
    }
    const idle = this.idle.splice(0);
    if (this.destroy) {
      await Promise.all(idle.map((resource) => this.destroy?.(resource)));
    }
  }

  private lease(resource: R): Lease<R> {
    const id = this.nextLeaseId++;
    this.leased.set(id, resource);
    this.metrics?.increment('poolAcquired');
    return { id, resource };
  }

  private removeWaiter(waiter: Waiter<R>): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) this.waiters.splice(index, 1);
  }

  private dispose(resource: R): void {
    if (!this.destroy) return;
    Promise.resolve(this.destroy(resource)).catch((error: unknown) =>
      this.logger.error('failed to destroy pooled resource', { error: toError(error) }),
    );
  }
}
