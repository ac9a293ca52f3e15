import type {
  AliasEntry,
  AliasPattern,
  FetchOutcome,
  NamespaceDetail,
  NamespaceSummary,
  PolicyAlias,
  RemoteCatalogClient,
} from '../types/Catalog';
import { CatalogError, ErrorHandler, toError } from './ErrorHandler';
import type { Observability } from './Observability';
import { WorkerPool } from './WorkerPool';

export type FetcherOptions = {
  concurrency?: number;
  progressInterval?: number;
};

type UnitResult = { namespace: string; aliases: PolicyAlias[]; failed: boolean };

/** Append-only collector that every completed unit of work funnels into. */
class AliasSink {
  readonly aliases: PolicyAlias[] = [];
  readonly failedNamespaces: string[] = [];
  namespacesWithAliases = 0;
  completed = 0;

  accept(result: UnitResult) {
    this.completed += 1;
    if (result.failed) {
      this.failedNamespaces.push(result.namespace);
    } else if (result.aliases.length > 0) {
      this.namespacesWithAliases += 1;
      this.aliases.push(...result.aliases);
    }
  }
}

function normalizePattern(pattern: Partial<AliasPattern> | null | undefined): AliasPattern | null {
  if (!pattern) return null;
  return {
    phrase: pattern.phrase ?? null,
    variable: pattern.variable ?? null,
    type: pattern.type ?? null,
  };
}

function toPolicyAlias(namespace: string, resourceType: string, alias: AliasEntry): PolicyAlias {
  return {
    namespace,
    resourceType,
    aliasName: alias.name,
    defaultPath: alias.defaultPath ?? null,
    defaultPattern: normalizePattern(alias.defaultPattern),
    type: alias.type ?? null,
  };
}

export function flattenNamespace(namespace: string, detail: NamespaceDetail): PolicyAlias[] {
  const aliases: PolicyAlias[] = [];
  for (const resourceType of detail.resourceTypes ?? []) {
    for (const alias of resourceType.aliases ?? []) {
      aliases.push(toPolicyAlias(namespace, resourceType.resourceType, alias));
    }
  }
  return aliases;
}

export class ParallelNamespaceFetcher {
  private readonly concurrency: number;
  private readonly progressInterval: number;

  constructor(
    private readonly client: RemoteCatalogClient,
    options: FetcherOptions = {},
    private readonly observability?: Observability,
  ) {
    this.concurrency = options.concurrency ?? 25;
    this.progressInterval = options.progressInterval ?? 100;
  }

  async fetchAll(): Promise<FetchOutcome> {
    const start = Date.now();

    let listing: NamespaceSummary[];
    try {
      listing = await this.client.listNamespaces();
    } catch (error) {
      if (ErrorHandler.classify(error) === 'auth') throw error;
      throw new CatalogError('fatal-list', `Failed to list namespaces: ${toError(error).message}`, { cause: error });
    }
    const total = listing.length;
    console.info(`[policy-aliases] Fetched ${total} provider namespaces in ${elapsed(start)}s`);

    const namespaces: string[] = [];
    for (const summary of listing) {
      if (summary.namespace) namespaces.push(summary.namespace);
    }

    const sink = new AliasSink();
    const pool = new WorkerPool(this.concurrency);
    await pool.runAll(
      namespaces,
      namespace => this.fetchNamespace(namespace),
      result => {
        sink.accept(result);
        if (sink.completed % this.progressInterval === 0) {
          console.info(
            `[policy-aliases] Progress: ${sink.completed}/${total} namespaces, ` +
              `${sink.aliases.length} aliases found (${elapsed(start, 1)}s)`,
          );
        }
      },
    );

    console.info(`[policy-aliases] Namespaces with aliases: ${sink.namespacesWithAliases}`);
    if (sink.failedNamespaces.length > 0) {
      const shown = sink.failedNamespaces.slice(0, 5).join(', ');
      const more = sink.failedNamespaces.length > 5 ? '...' : '';
      console.warn(`[policy-aliases] Failed to fetch ${sink.failedNamespaces.length} namespaces: ${shown}${more}`);
    }
    console.info(
      `[policy-aliases] Processed ${sink.aliases.length} policy aliases from ${total} namespaces in ${elapsed(start)}s`,
    );

    this.observability?.recordFetch({
      namespacesScanned: total,
      namespacesFetched: namespaces.length,
      failedNamespaces: sink.failedNamespaces.length,
      aliases: sink.aliases.length,
      ms: Date.now() - start,
    });

    return {
      aliases: sink.aliases,
      failedNamespaces: sink.failedNamespaces,
      namespacesScanned: total,
    };
  }

  private async fetchNamespace(namespace: string): Promise<UnitResult> {
    try {
      const detail = await this.client.getNamespaceDetail(namespace);
      return { namespace, aliases: flattenNamespace(namespace, detail), failed: false };
    } catch (error) {
      console.warn(`[policy-aliases] Failed to fetch aliases for ${namespace}: ${ErrorHandler.describe(error)}`);
      return { namespace, aliases: [], failed: true };
    }
  }
}

function elapsed(start: number, digits = 2): string {
  return ((Date.now() - start) / 1000).toFixed(digits);
}
