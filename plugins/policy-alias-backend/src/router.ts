import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { PolicyAliasService } from './services/PolicyAliasService';
import type { Observability } from './services/Observability';
import { toError } from './services/ErrorHandler';

export type PluginConfig = {
  catalog: {
    subscriptionId: string;
    endpoint?: string;
    apiVersion?: string;
    accessToken?: string;
    timeoutMs?: number;
  };
  cache?: { ttlSeconds?: number };
  fetch?: { concurrency?: number; progressInterval?: number };
  retry?: { maxRetries?: number; baseDelaySeconds?: number };
  observability?: { sampleRate?: number; defaultMetrics?: boolean };
};

export type PluginServices = {
  aliases: PolicyAliasService;
  observability: Observability;
  subscriptionId: string;
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function queryFlag(value: unknown): boolean {
  return value === 'true' || value === '1';
}

function roundMs(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

function reply(res: Response, body: unknown, status = 200) {
  const startedAt: unknown = res.locals.startedAt;
  if (typeof startedAt === 'number') {
    res.setHeader('X-Process-Time-Ms', String(roundMs(startedAt)));
  }
  res.status(status).json(body);
}

export function createRouter(services: PluginServices) {
  const router = Router();
  const { aliases, observability } = services;

  router.use((_req: Request, res: Response, next: NextFunction) => {
    res.locals.startedAt = performance.now();
    next();
  });

  function fail(res: Response, stage: string, message: string, e: unknown) {
    observability.recordError(stage, e);
    console.error(`[policy-aliases] ${message}: ${toError(e).message}`);
    reply(res, { error: message, message: toError(e).message }, 500);
  }

  router.get('/health', (_req: Request, res: Response) => {
    reply(res, {
      status: 'healthy',
      subscriptionId: services.subscriptionId ? `${services.subscriptionId.slice(0, 8)}...` : 'not-set',
      timestamp: new Date().toISOString(),
    });
  });

  // Prometheus metrics endpoint
  router.get('/metrics', async (_req: Request, res: Response) => {
    try {
      const body = await observability.getMetrics();
      res.setHeader('Content-Type', observability.metricsContentType());
      res.send(body);
    } catch (e) {
      fail(res, 'metrics', 'Failed to collect metrics', e);
    }
  });

  router.get('/statistics', async (_req: Request, res: Response) => {
    try {
      reply(res, await aliases.getStatistics());
    } catch (e) {
      fail(res, 'statistics', 'Failed to retrieve statistics', e);
    }
  });

  router.get('/aliases', async (req: Request, res: Response) => {
    const start = performance.now();
    const query = queryString(req.query.query);
    const namespace = queryString(req.query.namespace);
    try {
      const result =
        query || namespace
          ? await aliases.searchAliases(query ?? '', namespace)
          : await aliases.getPolicyAliases(queryFlag(req.query.forceRefresh));
      const queryTimeMs = roundMs(start);
      observability.recordDiagnostic({ q: query, ns: namespace, count: result.length, queryTimeMs });
      reply(res, { aliases: result, count: result.length, queryTimeMs });
    } catch (e) {
      fail(res, 'aliases', 'Failed to retrieve aliases', e);
    }
  });

  router.get('/namespaces', async (req: Request, res: Response) => {
    try {
      if (queryFlag(req.query.withCounts)) {
        const withCounts = await aliases.getNamespacesWithCounts();
        reply(res, { namespaces: withCounts.map(entry => entry.namespace), withCounts });
        return;
      }
      reply(res, { namespaces: await aliases.getNamespaces() });
    } catch (e) {
      fail(res, 'namespaces', 'Failed to retrieve namespaces', e);
    }
  });

  router.post('/refresh', async (_req: Request, res: Response) => {
    const start = performance.now();
    try {
      const refreshed = await aliases.getPolicyAliases(true);
      const statistics = await aliases.getStatistics();
      reply(res, {
        message: 'Cache refreshed successfully',
        aliasesCount: refreshed.length,
        statistics,
        refreshTimeMs: roundMs(start),
      });
    } catch (e) {
      fail(res, 'refresh', 'Failed to refresh cache', e);
    }
  });

  return router;
}
