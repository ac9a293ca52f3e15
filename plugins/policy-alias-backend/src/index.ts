export { createRouter, type PluginConfig, type PluginServices } from './router';
export { configFromEnv, createRouterFromConfig, createServicesFromConfig, type PluginDeps } from './pluginFactory';
export { ArmCatalogClient, type ArmClientConfig } from './clients/ArmCatalogClient';
export { AliasCache, type AliasCacheOptions, type AliasSource, type CacheState } from './services/AliasCache';
export { AggregationEngine } from './services/AggregationEngine';
export { InMemoryCacheService, type CacheService } from './services/CacheService';
export { CatalogError, ErrorHandler, RetryExecutor, type CatalogErrorKind, type RetryConfig } from './services/ErrorHandler';
export { ParallelNamespaceFetcher, flattenNamespace, type FetcherOptions } from './services/NamespaceFetcher';
export { Observability } from './services/Observability';
export { PolicyAliasService } from './services/PolicyAliasService';
export { WorkerPool } from './services/WorkerPool';
export type * from './types/Catalog';
