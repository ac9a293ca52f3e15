import pRetry from 'p-retry';

export type CatalogErrorKind = 'auth' | 'transient' | 'fatal-list' | 'unknown';

export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;
  readonly status?: number;

  constructor(kind: CatalogErrorKind, message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CatalogError';
    this.kind = kind;
    this.status = options.status;
  }
}

export type RetryConfig = {
  maxRetries?: number;
  baseDelaySeconds?: number;
  operationName?: string;
  onRetry?: (event: { attempt: number; delaySeconds: number; error: Error }) => void;
};

const AUTH_STATUSES = [401, 403];
const TRANSIENT_STATUSES = [408, 429, 500, 502, 503, 504];
const TRANSIENT_CODES = ['ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'TIMEOUT'];

function readProp(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  return Reflect.get(error, key);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class ErrorHandler {
  static classify(error: unknown): CatalogErrorKind {
    if (error instanceof CatalogError) return error.kind;

    const status = readProp(error, 'status') ?? readProp(error, 'statusCode');
    if (typeof status === 'number') {
      if (AUTH_STATUSES.includes(status)) return 'auth';
      if (TRANSIENT_STATUSES.includes(status) || status >= 500) return 'transient';
      return 'unknown';
    }

    const code = readProp(error, 'code');
    if (typeof code === 'string' && TRANSIENT_CODES.includes(code)) {
      return 'transient';
    }

    return 'unknown';
  }

  // fatal-list is a failure to enumerate namespaces and is retried like a transient one
  static isRetryable(error: unknown): boolean {
    const kind = ErrorHandler.classify(error);
    return kind === 'transient' || kind === 'fatal-list';
  }

  static describe(error: unknown): string {
    const err = toError(error);
    const kind = ErrorHandler.classify(error);
    return `${err.name} [${kind}]: ${err.message}`;
  }
}

export class RetryExecutor {
  private readonly maxRetries: number;
  private readonly baseDelaySeconds: number;

  constructor(private readonly config: RetryConfig = {}) {
    this.maxRetries = config.maxRetries ?? 3;
    this.baseDelaySeconds = config.baseDelaySeconds ?? 1.0;
  }

  delayFor(attemptIndex: number): number {
    return this.baseDelaySeconds * 2 ** attemptIndex;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.maxRetries <= 0) {
      throw new Error('Retry failed');
    }

    const name = this.config.operationName ?? 'Operation';
    const seen: { lastTransient?: Error; aborted?: boolean } = {};

    try {
      return await pRetry(
        async () => {
          try {
            return await operation();
          } catch (caught) {
            const error = toError(caught);
            if (!ErrorHandler.isRetryable(caught)) {
              if (ErrorHandler.classify(caught) === 'auth') {
                console.error(`[policy-aliases] ${name} authentication error: ${error.message}`);
              }
              seen.aborted = true;
              throw new pRetry.AbortError(error);
            }
            seen.lastTransient = error;
            // p-retry stops on TypeError unless the message is a known network failure
            if (error instanceof TypeError) {
              throw new CatalogError('transient', error.message, { cause: error });
            }
            throw error;
          }
        },
        {
          retries: this.maxRetries - 1,
          factor: 2,
          minTimeout: this.baseDelaySeconds * 1000,
          randomize: false,
          onFailedAttempt: (error) => {
            if (error.retriesLeft > 0) {
              const delaySeconds = this.delayFor(error.attemptNumber - 1);
              console.warn(
                `[policy-aliases] ${name} attempt ${error.attemptNumber} failed: ${error.message}. Retrying in ${delaySeconds}s...`,
              );
              this.config.onRetry?.({ attempt: error.attemptNumber, delaySeconds, error });
            } else {
              console.error(`[policy-aliases] All ${this.maxRetries} attempts of ${name} failed`);
            }
          },
        },
      );
    } catch (error) {
      if (seen.lastTransient && !seen.aborted) {
        throw seen.lastTransient;
      }
      throw error;
    }
  }
}
