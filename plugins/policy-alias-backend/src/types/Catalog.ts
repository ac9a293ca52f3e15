// Shapes of the remote provider catalog and of the flattened alias records served from it
export type NamespaceSummary = {
  namespace?: string | null;
};

export type AliasPattern = {
  phrase: string | null;
  variable: string | null;
  type: string | null;
};

export type AliasEntry = {
  name: string;
  defaultPath?: string | null;
  defaultPattern?: Partial<AliasPattern> | null;
  type?: string | null;
};

export type ResourceTypeEntry = {
  resourceType: string;
  aliases?: AliasEntry[] | null;
};

export type NamespaceDetail = {
  namespace: string;
  resourceTypes?: ResourceTypeEntry[] | null;
};

export type PolicyAlias = {
  namespace: string;
  resourceType: string;
  aliasName: string;
  defaultPath: string | null;
  defaultPattern: AliasPattern | null;
  type: string | null;
};

export type FetchOutcome = {
  readonly aliases: readonly PolicyAlias[];
  readonly failedNamespaces: readonly string[];
  readonly namespacesScanned: number;
};

export type NamespaceCount = {
  namespace: string;
  count: number;
};

export type Statistics = {
  totalAliases: number;
  totalNamespaces: number;
  totalResourceTypes: number;
  cacheAgeSeconds: number | null;
  cacheValid: boolean;
  topNamespaces: NamespaceCount[];
};

export interface RemoteCatalogClient {
  listNamespaces(): Promise<NamespaceSummary[]>;
  getNamespaceDetail(namespace: string): Promise<NamespaceDetail>;
}
