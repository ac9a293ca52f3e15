import { createRouter, type PluginConfig, type PluginServices } from './router';
import { ArmCatalogClient } from './clients/ArmCatalogClient';
import { AliasCache } from './services/AliasCache';
import { InMemoryCacheService, type CacheService } from './services/CacheService';
import { RetryExecutor } from './services/ErrorHandler';
import { ParallelNamespaceFetcher } from './services/NamespaceFetcher';
import { Observability } from './services/Observability';
import { PolicyAliasService } from './services/PolicyAliasService';
import type { RemoteCatalogClient } from './types/Catalog';

export type PluginDeps = {
  catalogClient?: RemoteCatalogClient;
  getToken?: () => Promise<string>;
  cacheStore?: CacheService;
  observability?: Observability;
  now?: () => number;
};

function numberFrom(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PluginConfig {
  const subscriptionId = env.SUBSCRIPTION_ID;
  if (!subscriptionId) {
    throw new Error('SUBSCRIPTION_ID environment variable must be set');
  }
  return {
    catalog: {
      subscriptionId,
      endpoint: env.ARM_ENDPOINT || undefined,
      accessToken: env.ARM_ACCESS_TOKEN || undefined,
    },
    cache: { ttlSeconds: numberFrom(env, 'CACHE_TTL_SECONDS') },
    fetch: { concurrency: numberFrom(env, 'FETCH_CONCURRENCY') },
    retry: {
      maxRetries: numberFrom(env, 'RETRY_MAX_ATTEMPTS'),
      baseDelaySeconds: numberFrom(env, 'RETRY_BASE_DELAY_SECONDS'),
    },
    observability: { sampleRate: numberFrom(env, 'OBSERVABILITY_SAMPLE_RATE') },
  };
}

export function createServicesFromConfig(config: PluginConfig, deps: PluginDeps = {}): PluginServices {
  const observability =
    deps.observability ??
    new Observability({
      sampleRate: config.observability?.sampleRate,
      collectDefaults: config.observability?.defaultMetrics,
    });

  let client = deps.catalogClient;
  if (!client) {
    const accessToken = config.catalog.accessToken;
    const getToken = deps.getToken ?? (accessToken ? async () => accessToken : undefined);
    if (!getToken) {
      throw new Error('A token provider or catalog.accessToken is required to reach the remote catalog');
    }
    client = new ArmCatalogClient({
      subscriptionId: config.catalog.subscriptionId,
      endpoint: config.catalog.endpoint,
      apiVersion: config.catalog.apiVersion,
      timeoutMs: config.catalog.timeoutMs,
      getToken,
    });
  }

  const fetcher = new ParallelNamespaceFetcher(
    client,
    {
      concurrency: config.fetch?.concurrency,
      progressInterval: config.fetch?.progressInterval,
    },
    observability,
  );

  const retry = new RetryExecutor({
    maxRetries: config.retry?.maxRetries,
    baseDelaySeconds: config.retry?.baseDelaySeconds,
    operationName: 'Policy alias fetch',
    onRetry: () => observability.recordRetry(),
  });

  const cache = new AliasCache(
    fetcher,
    retry,
    deps.cacheStore ?? new InMemoryCacheService(),
    { ttlSeconds: config.cache?.ttlSeconds, now: deps.now },
    observability,
  );

  return {
    aliases: new PolicyAliasService(cache, observability),
    observability,
    subscriptionId: config.catalog.subscriptionId,
  };
}

export function createRouterFromConfig(config: PluginConfig, deps: PluginDeps = {}) {
  return createRouter(createServicesFromConfig(config, deps));
}
