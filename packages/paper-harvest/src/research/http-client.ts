import { setTimeout as sleep } from 'node:timers/promises';
import type { z } from 'zod';
import type { RequestPolicy } from '../config.js';
import { AcquisitionError, ProviderError } from '../core/errors.js';

interface ProviderRequest {
  provider: string;
  url: URL;
  headers?: Record<string, string>;
}

interface JsonRequest<T> extends ProviderRequest {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

interface PageRequest extends ProviderRequest {
  /** Reason the page is a refusal rather than content, or null. A refusal is never retried. */
  detectRefusal?: (html: string, finalUrl: string) => string | null;
}

export interface FetchedPage {
  html: string;
  url: string;
}

const isRetryable = (error: unknown): boolean => {
  if (error instanceof AcquisitionError) {
    return false;
  }
  if (error instanceof ProviderError) {
    return error.status === undefined || error.status >= 500 || error.status === 429;
  }
  return true;
};

/**
 * Outbound lookups of one provider family under a shared {@link RequestPolicy}: requests are spaced
 * by `minIntervalMs`, and network errors, 5xx and 429 answers are retried.
 */
export class ProviderHttpClient {
  private lastRequestAt = 0;

  constructor(
    private readonly policy: RequestPolicy,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async fetchJson<T>({ schema, ...request }: JsonRequest<T>): Promise<T> {
    return this.send(request, 'application/json', async (response) => {
      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError(`Provider ${request.provider} returned an unexpected payload`, request.provider, response.status, {
          url: request.url.toString(),
          issues: parsed.error.issues.slice(0, 5).map((issue) => issue.message)
        });
      }
      return parsed.data;
    });
  }

  async fetchPage({ detectRefusal, ...request }: PageRequest): Promise<FetchedPage> {
    return this.send(request, 'text/html,application/xhtml+xml', async (response) => {
      const html = await response.text();
      const finalUrl = response.url || request.url.toString();
      const refusal = detectRefusal?.(html, finalUrl) ?? null;
      if (refusal) {
        throw new AcquisitionError(refusal, 'blocked', { provider: request.provider, url: finalUrl });
      }
      return { html, url: finalUrl };
    });
  }

  private async send<T>(
    { provider, url, headers }: ProviderRequest,
    accept: string,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const { retryAttempts, retryDelayMs, timeoutMs } = this.policy;
    let lastError: unknown;

    for (let attempt = 0; attempt <= retryAttempts; attempt += 1) {
      await this.waitTurn();

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const response = await this.fetchImpl(url, {
          method: 'GET',
          headers: { accept, ...headers },
          signal: controller.signal
        });

        if (!response.ok) {
          const body = await response.text();
          throw new ProviderError(`Provider ${provider} returned HTTP ${response.status}`, provider, response.status, {
            url: url.toString(),
            body: body.slice(0, 1000)
          });
        }

        return await read(response);
      } catch (error) {
        lastError = error;
        if (attempt >= retryAttempts || !isRetryable(error)) {
          break;
        }
        await sleep(retryDelayMs);
      } finally {
        clearTimeout(timeoutId);
      }
    }

    if (lastError instanceof Error) {
      throw lastError;
    }

    throw new ProviderError(`Unknown provider error for ${provider}`, provider, undefined, { url: url.toString() });
  }

  private async waitTurn(): Promise<void> {
    const waitMs = this.lastRequestAt + this.policy.minIntervalMs - Date.now();
    if (waitMs > 0) {
      await sleep(waitMs);
    }
    this.lastRequestAt = Date.now();
  }
}
