import type { NamespaceCount, PolicyAlias, Statistics } from '../types/Catalog';
import type { AliasCache } from './AliasCache';

export type AliasReader = Pick<AliasCache, 'getAliases' | 'isValid' | 'ageSeconds'>;

const TOP_NAMESPACES = 10;

function countByNamespace(aliases: readonly PolicyAlias[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const alias of aliases) {
    counts.set(alias.namespace, (counts.get(alias.namespace) ?? 0) + 1);
  }
  return counts;
}

function searchableText(alias: PolicyAlias): string {
  return [alias.namespace, alias.resourceType, alias.aliasName, alias.defaultPath ?? ''].join(' ').toLowerCase();
}

/** Read-only views over the cached alias list. Never forces a refresh. */
export class AggregationEngine {
  constructor(private readonly cache: AliasReader) {}

  async statistics(): Promise<Statistics> {
    const aliases = await this.cache.getAliases(false);
    const counts = countByNamespace(aliases);
    const resourceTypes = new Set<string>();
    for (const alias of aliases) {
      resourceTypes.add(`${alias.namespace}/${alias.resourceType}`);
    }

    // Array.prototype.sort is stable, so ties keep first-occurrence order
    const topNamespaces = [...counts.entries()]
      .map(([namespace, count]) => ({ namespace, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, TOP_NAMESPACES);

    return {
      totalAliases: aliases.length,
      totalNamespaces: counts.size,
      totalResourceTypes: resourceTypes.size,
      cacheAgeSeconds: this.cache.ageSeconds(),
      cacheValid: this.cache.isValid(),
      topNamespaces,
    };
  }

  async search(query?: string | null, namespaceFilter?: string | null): Promise<readonly PolicyAlias[]> {
    const aliases = await this.cache.getAliases(false);
    if (!query && !namespaceFilter) return aliases;

    const terms = (query ?? '').toLowerCase().split(/\s+/).filter(term => term.length > 0);

    return aliases.filter(alias => {
      if (namespaceFilter && alias.namespace !== namespaceFilter) return false;
      if (terms.length === 0) return true;
      const text = searchableText(alias);
      return terms.every(term => text.includes(term));
    });
  }

  async namespacesWithCounts(): Promise<NamespaceCount[]> {
    const aliases = await this.cache.getAliases(false);
    return [...countByNamespace(aliases).entries()]
      .map(([namespace, count]) => ({ namespace, count }))
      .sort((a, b) => b.count - a.count || compareNames(a.namespace, b.namespace));
  }

  async namespaces(): Promise<string[]> {
    const aliases = await this.cache.getAliases(false);
    return [...countByNamespace(aliases).keys()].sort(compareNames);
  }
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
