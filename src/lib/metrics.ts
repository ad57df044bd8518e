export interface MetricsData {
  admissionAllowed: number;
  admissionBlocked: number;
  cacheHits: number;
  cacheMisses: number;
  cacheCoalesced: number;
  cacheErrors: number;
  tasksSubmitted: number;
  tasksRejected: number;
  tasksSucceeded: number;
  tasksFailed: number;
  tasksCancelled: number;
  poolAcquired: number;
  poolTimeouts: number;
  totalRequests: number;
  responseTimeSum: number;
  responseTimeCount: number;
  responseTimeBuckets: Map<string, number>; // bucket -> count
  endpointHits: Map<string, number>;
}

// Histogram buckets for response time (in seconds)
const RESPONSE_TIME_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, Number.POSITIVE_INFINITY];

type Counter = Exclude<
  keyof MetricsData,
  'responseTimeSum' | 'responseTimeCount' | 'responseTimeBuckets' | 'endpointHits' | 'totalRequests'
>;

const COUNTERS: ReadonlyArray<{ key: Counter; name: string; help: string }> = [
  { key: 'admissionAllowed', name: 'admission_allowed_total', help: 'Requests admitted by the token bucket' },
  { key: 'admissionBlocked', name: 'admission_blocked_total', help: 'Requests rejected by the token bucket' },
  { key: 'cacheHits', name: 'cache_hits_total', help: 'Result cache hits' },
  { key: 'cacheMisses', name: 'cache_misses_total', help: 'Result cache misses that ran a computation' },
  { key: 'cacheCoalesced', name: 'cache_coalesced_total', help: 'Callers that joined an in-flight computation' },
  { key: 'cacheErrors', name: 'cache_errors_total', help: 'Failed computations or store errors' },
  { key: 'tasksSubmitted', name: 'tasks_submitted_total', help: 'Deferred tasks accepted' },
  { key: 'tasksRejected', name: 'tasks_rejected_total', help: 'Deferred tasks refused because the queue was full' },
  { key: 'tasksSucceeded', name: 'tasks_succeeded_total', help: 'Deferred tasks that completed' },
  { key: 'tasksFailed', name: 'tasks_failed_total', help: 'Deferred tasks that failed' },
  { key: 'tasksCancelled', name: 'tasks_cancelled_total', help: 'Deferred tasks cancelled before they started' },
  { key: 'poolAcquired', name: 'pool_acquired_total', help: 'Resource pool leases granted' },
  { key: 'poolTimeouts', name: 'pool_timeouts_total', help: 'Resource pool acquisitions that timed out' },
];

function emptyMetrics(): MetricsData {
  return {
    admissionAllowed: 0,
    admissionBlocked: 0,
    cacheHits: 0,
    cacheMisses: 0,
    cacheCoalesced: 0,
    cacheErrors: 0,
    tasksSubmitted: 0,
    tasksRejected: 0,
    tasksSucceeded: 0,
    tasksFailed: 0,
    tasksCancelled: 0,
    poolAcquired: 0,
    poolTimeouts: 0,
    totalRequests: 0,
    responseTimeSum: 0,
    responseTimeCount: 0,
    responseTimeBuckets: new Map(),
    endpointHits: new Map(),
  };
}

export class MetricsCollector {
  private readonly metrics: MetricsData = emptyMetrics();
  private readonly prefix: string;

  constructor(options: { prefix?: string } = {}) {
    this.prefix = options.prefix ?? 'surgeguard_';
  }

  increment(counter: Counter, by = 1): void {
    this.metrics[counter] += by;
  }

  recordRequest(endpoint: string, responseTimeMs: number): void {
    this.metrics.totalRequests++;
    this.metrics.responseTimeSum += responseTimeMs;
    this.metrics.responseTimeCount++;

    const seconds = responseTimeMs / 1000;
    const bucket = RESPONSE_TIME_BUCKETS.find((b) => seconds <= b) ?? Number.POSITIVE_INFINITY;
    const bucketKey = bucketLabel(bucket);
    this.metrics.responseTimeBuckets.set(bucketKey, (this.metrics.responseTimeBuckets.get(bucketKey) ?? 0) + 1);

    this.metrics.endpointHits.set(endpoint, (this.metrics.endpointHits.get(endpoint) ?? 0) + 1);
  }

  getCurrentMetrics(): MetricsData {
    return {
      ...this.metrics,
      responseTimeBuckets: new Map(this.metrics.responseTimeBuckets),
      endpointHits: new Map(this.metrics.endpointHits),
    };
  }

  getPrometheusMetrics(): string {
    const current = this.metrics;
    const p = this.prefix;
    const lines: string[] = [];

    for (const { key, name, help } of COUNTERS) {
      lines.push(`# HELP ${p}${name} ${help}`, `# TYPE ${p}${name} counter`, `${p}${name} ${current[key]}`, '');
    }

    const lookups = current.cacheHits + current.cacheMisses + current.cacheCoalesced;
    const hitRatio = lookups > 0 ? (current.cacheHits + current.cacheCoalesced) / lookups : 0;
    lines.push(
      `# HELP ${p}cache_hit_ratio Share of lookups served without a new computation (0-1)`,
      `# TYPE ${p}cache_hit_ratio gauge`,
      `${p}cache_hit_ratio ${hitRatio}`,
      '',
      `# HELP ${p}requests_total Total number of requests`,
      `# TYPE ${p}requests_total counter`,
      `${p}requests_total ${current.totalRequests}`,
      '',
      `# HELP ${p}response_time_seconds Response time histogram`,
      `# TYPE ${p}response_time_seconds histogram`,
    );

    // Prometheus buckets are cumulative
    let cumulative = 0;
    for (const bucket of RESPONSE_TIME_BUCKETS) {
      const label = bucketLabel(bucket);
      cumulative += current.responseTimeBuckets.get(label) ?? 0;
      lines.push(`${p}response_time_seconds_bucket{le="${label}"} ${cumulative}`);
    }
    lines.push(
      `${p}response_time_seconds_sum ${current.responseTimeSum / 1000}`,
      `${p}response_time_seconds_count ${current.responseTimeCount}`,
      '',
    );

    if (current.endpointHits.size > 0) {
      lines.push(`# HELP ${p}endpoint_hits_total Total hits per endpoint`, `# TYPE ${p}endpoint_hits_total counter`);
      for (const [endpoint, hits] of current.endpointHits) {
        const sanitized = endpoint.replace(/[^a-zA-Z0-9_]/g, '_');
        lines.push(`${p}endpoint_hits_total{endpoint="${sanitized}"} ${hits}`);
      }
      lines.push('');
    }

    return lines.join('\n');
  }
}

function bucketLabel(bucket: number): string {
  return bucket === Number.POSITIVE_INFINITY ? '+Inf' : bucket.toString();
}
