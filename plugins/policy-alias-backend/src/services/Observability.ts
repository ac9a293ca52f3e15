import { trace, SpanStatusCode } from '@opentelemetry/api';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type CacheLookupOutcome = 'hit' | 'refreshed' | 'stale' | 'failed';

export type FetchRecord = {
  namespacesScanned: number;
  namespacesFetched: number;
  failedNamespaces: number;
  aliases: number;
  ms: number;
};

export class Observability {
  private readonly registry: Registry;
  private readonly tracer = trace.getTracer('policy-aliases');

  private readonly fetchLatency: Histogram<string>;
  private readonly namespaceFetches: Counter<string>;
  private readonly cacheLookups: Counter<string>;
  private readonly retries: Counter<string>;
  private readonly queryLatency: Histogram<string>;
  private readonly errors: Counter<string>;
  private readonly cachedAliases: Gauge<string>;

  private readonly sampleRate: number;

  constructor(opts?: { registry?: Registry; sampleRate?: number; collectDefaults?: boolean }) {
    this.registry = opts?.registry ?? new Registry();
    this.sampleRate = opts?.sampleRate ?? 0;
    if (opts?.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.fetchLatency = new Histogram({
      name: 'policy_aliases_fetch_duration_ms',
      help: 'Duration of a full namespace fan-out in milliseconds',
      buckets: [500, 1000, 2500, 5000, 10000, 20000, 40000, 80000],
      registers: [this.registry],
    });
    this.namespaceFetches = new Counter({
      name: 'policy_aliases_namespace_fetch_total',
      help: 'Per-namespace detail fetches by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });
    this.cacheLookups = new Counter({
      name: 'policy_aliases_cache_lookup_total',
      help: 'Alias cache lookups by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });
    this.retries = new Counter({
      name: 'policy_aliases_retry_total',
      help: 'Retried fetch attempts',
      registers: [this.registry],
    });
    this.queryLatency = new Histogram({
      name: 'policy_aliases_query_latency_ms',
      help: 'Latency per query operation in milliseconds',
      labelNames: ['operation'] as const,
      buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
      registers: [this.registry],
    });
    this.errors = new Counter({
      name: 'policy_aliases_errors_total',
      help: 'Errors by stage',
      labelNames: ['stage'] as const,
      registers: [this.registry],
    });
    this.cachedAliases = new Gauge({
      name: 'policy_aliases_cached_total',
      help: 'Aliases held by the cache after the last successful fetch',
      registers: [this.registry],
    });
  }

  recordFetch(record: FetchRecord) {
    const span = this.tracer.startSpan('catalog.fetch');
    try {
      span.setAttributes({
        'catalog.namespaces': record.namespacesScanned,
        'catalog.failed': record.failedNamespaces,
        'catalog.aliases': record.aliases,
      });
      this.fetchLatency.observe(record.ms);
      this.namespaceFetches.labels('success').inc(record.namespacesFetched - record.failedNamespaces);
      this.namespaceFetches.labels('failure').inc(record.failedNamespaces);
      this.cachedAliases.set(record.aliases);
      span.setStatus({ code: SpanStatusCode.OK });
    } finally {
      span.end();
    }
  }

  recordCacheLookup(outcome: CacheLookupOutcome) {
    this.cacheLookups.labels(outcome).inc();
  }

  recordRetry() {
    this.retries.inc();
  }

  recordQuery(operation: string, ms: number) {
    this.queryLatency.labels(operation).observe(ms);
  }

  recordError(stage: string, error: unknown) {
    const span = this.tracer.startSpan(`error.${stage}`);
    try {
      this.errors.labels(stage).inc();
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({ code: SpanStatusCode.ERROR });
    } finally {
      span.end();
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  metricsContentType(): string {
    return this.registry.contentType;
  }

  recordDiagnostic(event: Record<string, unknown>) {
    if (this.sampleRate > 0 && Math.random() < this.sampleRate) {
      // eslint-disable-next-line no-console
      console.log('[policy-aliases]', JSON.stringify(event));
    }
  }
}
