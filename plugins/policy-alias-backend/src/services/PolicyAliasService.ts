import type { FetchOutcome, NamespaceCount, PolicyAlias, Statistics } from '../types/Catalog';
import type { AliasCache } from './AliasCache';
import { AggregationEngine } from './AggregationEngine';
import type { Observability } from './Observability';

/** Public surface of the alias catalog consumed by the router. */
export class PolicyAliasService {
  private readonly aggregation: AggregationEngine;

  constructor(
    private readonly cache: AliasCache,
    private readonly observability?: Observability,
  ) {
    this.aggregation = new AggregationEngine(cache);
  }

  getPolicyAliases(forceRefresh = false): Promise<readonly PolicyAlias[]> {
    return this.timed('aliases', () => this.cache.getAliases(forceRefresh));
  }

  getStatistics(): Promise<Statistics> {
    return this.timed('statistics', () => this.aggregation.statistics());
  }

  searchAliases(query?: string | null, namespaceFilter?: string | null): Promise<readonly PolicyAlias[]> {
    return this.timed('search', () => this.aggregation.search(query, namespaceFilter));
  }

  getNamespacesWithCounts(): Promise<NamespaceCount[]> {
    return this.timed('namespace-counts', () => this.aggregation.namespacesWithCounts());
  }

  getNamespaces(): Promise<string[]> {
    return this.timed('namespaces', () => this.aggregation.namespaces());
  }

  lastFetchOutcome(): FetchOutcome | undefined {
    return this.cache.lastOutcome();
  }

  private async timed<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      return await run();
    } finally {
      this.observability?.recordQuery(operation, Date.now() - start);
    }
  }
}
