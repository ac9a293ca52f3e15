import type { FetchOutcome, PolicyAlias } from '../types/Catalog';
import type { CacheService } from './CacheService';
import { ErrorHandler, RetryExecutor } from './ErrorHandler';
import type { Observability } from './Observability';

export interface AliasSource {
  fetchAll(): Promise<FetchOutcome>;
}

export type CacheState = {
  aliases: readonly PolicyAlias[];
  fetchedAt: number;
};

export type AliasCacheOptions = {
  ttlSeconds?: number;
  now?: () => number;
};

const STATE_KEY = 'policy-aliases:state';

// The cached list is shared with every reader and with lastOutcome(), so it must not be writable
function freezeOutcome(outcome: FetchOutcome): FetchOutcome {
  return Object.freeze({
    aliases: Object.freeze(outcome.aliases.map(alias => Object.freeze(alias))),
    failedNamespaces: Object.freeze([...outcome.failedNamespaces]),
    namespacesScanned: outcome.namespacesScanned,
  });
}

/**
 * Holds the last successful catalog fetch. Reads within the TTL never touch the
 * network; a failed refresh serves the previous snapshot when one exists.
 */
export class AliasCache {
  private readonly ttlMs: number;
  private readonly now: () => number;
  private inFlight?: Promise<readonly PolicyAlias[]>;
  private outcome?: FetchOutcome;

  constructor(
    private readonly source: AliasSource,
    private readonly retry: RetryExecutor,
    private readonly store: CacheService,
    options: AliasCacheOptions = {},
    private readonly observability?: Observability,
  ) {
    this.ttlMs = (options.ttlSeconds ?? 3600) * 1000;
    this.now = options.now ?? Date.now;
  }

  async getAliases(forceRefresh = false): Promise<readonly PolicyAlias[]> {
    const state = this.state();
    if (!forceRefresh && state && this.isFresh(state)) {
      this.observability?.recordCacheLookup('hit');
      return state.aliases;
    }
    return this.refresh();
  }

  isValid(): boolean {
    const state = this.state();
    return state !== undefined && this.isFresh(state);
  }

  getFetchedAt(): number | undefined {
    return this.state()?.fetchedAt;
  }

  /** Age of the cached snapshot in whole seconds, or null before the first fetch. */
  ageSeconds(): number | null {
    const fetchedAt = this.getFetchedAt();
    if (fetchedAt === undefined) return null;
    return Math.floor((this.now() - fetchedAt) / 1000);
  }

  lastOutcome(): FetchOutcome | undefined {
    return this.outcome;
  }

  // Concurrent callers share the refresh already in flight
  private refresh(): Promise<readonly PolicyAlias[]> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async load(): Promise<readonly PolicyAlias[]> {
    console.info('[policy-aliases] Fetching policy aliases from remote catalog');
    try {
      const outcome = freezeOutcome(await this.retry.execute(() => this.source.fetchAll()));
      const state: CacheState = { aliases: outcome.aliases, fetchedAt: this.now() };
      this.store.set(STATE_KEY, state, 0);
      this.outcome = outcome;
      this.observability?.recordCacheLookup('refreshed');
      console.info(`[policy-aliases] Cached ${outcome.aliases.length} policy aliases`);
      return state.aliases;
    } catch (error) {
      this.observability?.recordError('fetch', error);
      const stale = this.state();
      if (stale) {
        console.warn(`[policy-aliases] Returning stale cache after fetch failure: ${ErrorHandler.describe(error)}`);
        this.observability?.recordCacheLookup('stale');
        return stale.aliases;
      }
      console.error(`[policy-aliases] Failed to fetch policy aliases: ${ErrorHandler.describe(error)}`);
      this.observability?.recordCacheLookup('failed');
      throw error;
    }
  }

  private state(): CacheState | undefined {
    return this.store.get<CacheState>(STATE_KEY);
  }

  private isFresh(state: CacheState): boolean {
    return this.now() - state.fetchedAt < this.ttlMs;
  }
}
