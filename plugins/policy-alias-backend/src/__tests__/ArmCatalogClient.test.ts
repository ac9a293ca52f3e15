import http from 'node:http';
import {
  ArmCatalogClient,
  parseNamespaceDetail,
  parseNamespaceList,
  statusToKind,
} from '../clients/ArmCatalogClient';

describe('ArmCatalogClient parsing', () => {
  it('should read namespaces and the next page link', () => {
    expect(
      parseNamespaceList({
        value: [{ namespace: 'Microsoft.Compute' }, { namespace: null }, 'junk', { id: 'no-namespace' }],
        nextLink: 'https://example.test/next',
      }),
    ).toEqual({
      items: [{ namespace: 'Microsoft.Compute' }, { namespace: null }, { namespace: null }],
      nextLink: 'https://example.test/next',
    });
  });

  it('should tolerate a body that is not an object', () => {
    expect(parseNamespaceList(null)).toEqual({ items: [], nextLink: null });
    expect(parseNamespaceDetail('Ns', 'oops')).toEqual({ namespace: 'Ns', resourceTypes: [] });
  });

  it('should extract resource types and aliases', () => {
    const parsed = parseNamespaceDetail('Microsoft.Web', {
      namespace: 'Microsoft.Web',
      resourceTypes: [
        {
          resourceType: 'sites',
          aliases: [
            {
              name: 'Microsoft.Web/sites/httpsOnly',
              defaultPath: 'properties.httpsOnly',
              type: 'NotSpecified',
              defaultPattern: { phrase: 'httpsOnly', variable: 7 },
            },
            { defaultPath: 'missing.name' },
          ],
        },
        { resourceType: 'locations' },
        { aliases: [] },
      ],
    });

    expect(parsed).toEqual({
      namespace: 'Microsoft.Web',
      resourceTypes: [
        {
          resourceType: 'sites',
          aliases: [
            {
              name: 'Microsoft.Web/sites/httpsOnly',
              defaultPath: 'properties.httpsOnly',
              type: 'NotSpecified',
              defaultPattern: { phrase: 'httpsOnly', variable: null, type: null },
            },
          ],
        },
        { resourceType: 'locations', aliases: [] },
      ],
    });
  });

  it('should map HTTP statuses to error kinds', () => {
    expect(statusToKind(401)).toBe('auth');
    expect(statusToKind(403)).toBe('auth');
    expect(statusToKind(429)).toBe('transient');
    expect(statusToKind(502)).toBe('transient');
    expect(statusToKind(404)).toBe('unknown');
  });
});

describe('ArmCatalogClient requests', () => {
  let server: http.Server;
  let endpoint: string;
  const seenAuth: string[] = [];

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      seenAuth.push(req.headers.authorization ?? '');
      const url = new URL(req.url ?? '/', 'http://localhost');
      const send = (status: number, body: unknown) => {
        res.writeHead(status, { 'content-type': 'application/json' });
        res.end(JSON.stringify(body));
      };

      if (url.pathname === '/subscriptions/sub-1/providers') {
        if (url.searchParams.get('$skiptoken') === '2') {
          send(200, { value: [{ namespace: 'Microsoft.Storage' }] });
          return;
        }
        send(200, {
          value: [{ namespace: 'Microsoft.Compute' }, { namespace: 'Microsoft.Network' }],
          nextLink: `${endpoint}/subscriptions/sub-1/providers?api-version=2021-04-01&$skiptoken=2`,
        });
        return;
      }
      if (url.pathname === '/subscriptions/sub-offsite/providers') {
        send(200, {
          value: [{ namespace: 'Microsoft.Compute' }],
          nextLink: 'http://other-host.test/subscriptions/sub-offsite/providers?api-version=2021-04-01&$skiptoken=2',
        });
        return;
      }
      if (url.pathname === '/subscriptions/sub-1/providers/Microsoft.Compute') {
        if (url.searchParams.get('$expand') !== 'resourceTypes/aliases') {
          send(400, { error: 'expand missing' });
          return;
        }
        send(200, {
          namespace: 'Microsoft.Compute',
          resourceTypes: [{ resourceType: 'disks', aliases: [{ name: 'Microsoft.Compute/disks/sku.name' }] }],
        });
        return;
      }
      if (url.pathname === '/subscriptions/sub-1/providers/Forbidden') {
        send(403, { error: 'forbidden' });
        return;
      }
      send(503, { error: 'busy' });
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server did not bind a TCP port');
    endpoint = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  function client() {
    return new ArmCatalogClient({ subscriptionId: 'sub-1', endpoint, getToken: async () => 'test-token' });
  }

  it('should follow next links across pages', async () => {
    const namespaces = await client().listNamespaces();

    expect(namespaces).toEqual([
      { namespace: 'Microsoft.Compute' },
      { namespace: 'Microsoft.Network' },
      { namespace: 'Microsoft.Storage' },
    ]);
    expect(seenAuth[seenAuth.length - 1]).toBe('Bearer test-token');
  });

  it('should refuse a next link on another origin', async () => {
    const offsite = new ArmCatalogClient({ subscriptionId: 'sub-offsite', endpoint, getToken: async () => 'test-token' });
    const requestsBefore = seenAuth.length;

    await expect(offsite.listNamespaces()).rejects.toMatchObject({
      kind: 'unknown',
      message: `Refusing to follow nextLink to http://other-host.test; expected ${endpoint}`,
    });
    expect(seenAuth.length).toBe(requestsBefore + 1);
  });

  it('should expand aliases when fetching a namespace', async () => {
    const detail = await client().getNamespaceDetail('Microsoft.Compute');

    expect(detail).toEqual({
      namespace: 'Microsoft.Compute',
      resourceTypes: [
        {
          resourceType: 'disks',
          aliases: [{ name: 'Microsoft.Compute/disks/sku.name', defaultPath: null, defaultPattern: null, type: null }],
        },
      ],
    });
  });

  it('should tag authorization failures', async () => {
    await expect(client().getNamespaceDetail('Forbidden')).rejects.toMatchObject({ kind: 'auth', status: 403 });
  });

  it('should tag server failures as transient', async () => {
    await expect(client().getNamespaceDetail('Anything')).rejects.toMatchObject({ kind: 'transient', status: 503 });
  });

  it('should tag connection failures as transient', async () => {
    const unreachable = new ArmCatalogClient({
      subscriptionId: 'sub-1',
      endpoint: 'http://127.0.0.1:1',
      getToken: async () => 'test-token',
    });

    await expect(unreachable.listNamespaces()).rejects.toMatchObject({ kind: 'transient' });
  });
});
