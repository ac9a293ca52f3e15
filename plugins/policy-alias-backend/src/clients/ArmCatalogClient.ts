import http from 'http';
import https from 'https';
import type {
  AliasEntry,
  AliasPattern,
  NamespaceDetail,
  NamespaceSummary,
  RemoteCatalogClient,
  ResourceTypeEntry,
} from '../types/Catalog';
import { CatalogError, ErrorHandler, type CatalogErrorKind } from '../services/ErrorHandler';

export type ArmClientConfig = {
  subscriptionId: string;
  getToken: () => Promise<string>;
  endpoint?: string;
  apiVersion?: string;
  timeoutMs?: number;
  tls?: { rejectUnauthorized?: boolean };
};

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function arrayOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function statusToKind(status: number): CatalogErrorKind {
  return ErrorHandler.classify({ status });
}

export function parseNamespaceList(body: unknown): { items: NamespaceSummary[]; nextLink: string | null } {
  if (!isObject(body)) return { items: [], nextLink: null };
  const items = arrayOf(body.value)
    .filter(isObject)
    .map(entry => ({ namespace: optionalString(entry.namespace) }));
  return { items, nextLink: optionalString(body.nextLink) };
}

function parsePattern(value: unknown): Partial<AliasPattern> | null {
  if (!isObject(value)) return null;
  return {
    phrase: optionalString(value.phrase),
    variable: optionalString(value.variable),
    type: optionalString(value.type),
  };
}

function parseAlias(value: unknown): AliasEntry | undefined {
  if (!isObject(value) || typeof value.name !== 'string') return undefined;
  return {
    name: value.name,
    defaultPath: optionalString(value.defaultPath),
    defaultPattern: parsePattern(value.defaultPattern),
    type: optionalString(value.type),
  };
}

export function parseNamespaceDetail(namespace: string, body: unknown): NamespaceDetail {
  if (!isObject(body)) return { namespace, resourceTypes: [] };
  const resourceTypes: ResourceTypeEntry[] = [];
  for (const entry of arrayOf(body.resourceTypes)) {
    if (!isObject(entry) || typeof entry.resourceType !== 'string') continue;
    const aliases: AliasEntry[] = [];
    for (const raw of arrayOf(entry.aliases)) {
      const alias = parseAlias(raw);
      if (alias) aliases.push(alias);
    }
    resourceTypes.push({ resourceType: entry.resourceType, aliases });
  }
  return { namespace: optionalString(body.namespace) ?? namespace, resourceTypes };
}

/** Lists provider namespaces and their aliases through the Resource Manager REST API. */
export class ArmCatalogClient implements RemoteCatalogClient {
  constructor(private readonly config: ArmClientConfig) {}

  private baseUrl(): URL {
    return new URL(this.config.endpoint ?? 'https://management.azure.com');
  }

  private providersPath(namespace?: string): URL {
    const url = this.baseUrl();
    const suffix = namespace ? `/${encodeURIComponent(namespace)}` : '';
    url.pathname = `/subscriptions/${encodeURIComponent(this.config.subscriptionId)}/providers${suffix}`;
    url.searchParams.set('api-version', this.config.apiVersion ?? '2021-04-01');
    return url;
  }

  async listNamespaces(): Promise<NamespaceSummary[]> {
    const items: NamespaceSummary[] = [];
    let next: URL | null = this.providersPath();
    while (next) {
      const page = parseNamespaceList(await this.request(next));
      items.push(...page.items);
      next = page.nextLink ? this.sameOrigin(page.nextLink) : null;
    }
    return items;
  }

  // The bearer token goes with every page request, so paging may not leave the configured endpoint
  private sameOrigin(link: string): URL {
    const url = new URL(link);
    const expected = this.baseUrl().origin;
    if (url.origin !== expected) {
      throw new CatalogError('unknown', `Refusing to follow nextLink to ${url.origin}; expected ${expected}`);
    }
    return url;
  }

  async getNamespaceDetail(namespace: string): Promise<NamespaceDetail> {
    const url = this.providersPath(namespace);
    url.searchParams.set('$expand', 'resourceTypes/aliases');
    return parseNamespaceDetail(namespace, await this.request(url));
  }

  private async request(url: URL): Promise<unknown> {
    const token = await this.config.getToken();
    const isHttps = url.protocol === 'https:';
    const headers = { accept: 'application/json', authorization: `Bearer ${token}` };
    const timeoutMs = this.config.timeoutMs ?? 30000;

    return new Promise<unknown>((resolve, reject) => {
      const options: https.RequestOptions = {
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port,
        path: url.pathname + url.search,
        method: 'GET',
        headers,
      };
      if (isHttps && this.config.tls?.rejectUnauthorized === false) {
        options.rejectUnauthorized = false;
      }

      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on('data', (d: Buffer | string) => chunks.push(Buffer.isBuffer(d) ? d : Buffer.from(d)));
        res.on('end', () => {
          const raw = Buffer.concat(chunks).toString('utf-8');
          const status = res.statusCode ?? 0;
          if (status >= 200 && status < 300) {
            try {
              resolve(JSON.parse(raw));
            } catch (e) {
              reject(new CatalogError('unknown', `Invalid JSON from ${url.pathname}`, { cause: e, status }));
            }
          } else {
            reject(new CatalogError(statusToKind(status), `ARM HTTP ${status}: ${raw.slice(0, 200)}`, { status }));
          }
        });
        res.on('error', reject);
      };

      const req = isHttps ? https.request(options, onResponse) : http.request(options, onResponse);
      req.setTimeout(timeoutMs, () => {
        req.destroy(Object.assign(new Error(`Request to ${url.pathname} timed out`), { code: 'ETIMEDOUT' }));
      });
      req.on('error', (error: Error) => {
        const kind = ErrorHandler.classify(error) === 'transient' ? 'transient' : 'unknown';
        reject(new CatalogError(kind, error.message, { cause: error }));
      });
      req.end();
    });
  }
}
