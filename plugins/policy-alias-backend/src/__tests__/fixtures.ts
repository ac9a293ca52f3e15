import type {
  FetchOutcome,
  NamespaceDetail,
  NamespaceSummary,
  PolicyAlias,
  RemoteCatalogClient,
} from '../types/Catalog';

export function alias(namespace: string, resourceType: string, aliasName: string, defaultPath: string | null = null): PolicyAlias {
  return { namespace, resourceType, aliasName, defaultPath, defaultPattern: null, type: null };
}

export function detail(namespace: string, resourceTypes: Record<string, string[]>): NamespaceDetail {
  return {
    namespace,
    resourceTypes: Object.entries(resourceTypes).map(([resourceType, names]) => ({
      resourceType,
      aliases: names.map(name => ({ name, defaultPath: `properties.${name}` })),
    })),
  };
}

export function outcome(aliases: PolicyAlias[]): FetchOutcome {
  return { aliases, failedNamespaces: [], namespacesScanned: new Set(aliases.map(a => a.namespace)).size };
}

/** In-process stand-in for the remote catalog. A detail entry that is an Error is thrown on fetch. */
export class FakeCatalogClient implements RemoteCatalogClient {
  listCalls = 0;
  readonly detailCalls: string[] = [];
  listError?: Error;
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly details: Record<string, NamespaceDetail | Error>,
    private readonly listing?: NamespaceSummary[],
    private readonly delayMs = 0,
  ) {}

  async listNamespaces(): Promise<NamespaceSummary[]> {
    this.listCalls += 1;
    if (this.listError) throw this.listError;
    return this.listing ?? Object.keys(this.details).map(namespace => ({ namespace }));
  }

  async getNamespaceDetail(namespace: string): Promise<NamespaceDetail> {
    this.detailCalls.push(namespace);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.delayMs));
      }
      const entry = this.details[namespace];
      if (entry === undefined) throw new Error(`Namespace ${namespace} not found`);
      if (entry instanceof Error) throw entry;
      return entry;
    } finally {
      this.inFlight -= 1;
    }
  }
}
