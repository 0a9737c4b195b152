import { sha256 } from "../utils/hash";
import { Logger, silentLogger } from "../log/logger";
import { errorMessage } from "../errors";

export interface HttpResponse {
  status: number;
  body: Buffer;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; country-blocklist-aggregator/1.0)";
const ACCEPT = "application/json, text/html;q=0.9, application/xhtml+xml;q=0.9, */*;q=0.8";

export const nodeHttpFetch: HttpFetch = async (url, init) => {
  const res = await fetch(url, { headers: init.headers, signal: init.signal, redirect: "follow" });
  const body = Buffer.from(await res.arrayBuffer());
  return { status: res.status, body };
};

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

export interface FetchedPayload {
  url: string;
  body: Buffer;
  fingerprint: string;
}

export type FetchFirstResult =
  | { ok: true; payload: FetchedPayload }
  | { ok: false; failures: string[] };

export interface SourceFetcherOptions {
  http?: HttpFetch;
  userAgent?: string;
  requestTimeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  const msg = errorMessage(error);
  return /timeout|ETIMEDOUT|ECONNRESET|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed/i.test(msg);
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
  });
}

/** Child signal aborted by the parent or after `timeoutMs`, whichever comes first. */
function withTimeout(parent: AbortSignal, timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener("abort", onAbort, { once: true });
  }
  const timer = setTimeout(() => controller.abort(new Error(`Request timeout after ${timeoutMs}ms`)), timeoutMs);
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent.removeEventListener("abort", onAbort);
    }
  };
}

/**
 * Fetch plumbing shared by every adapter: identifying headers, per-request
 * timeout, retry of transient failures, candidate URL fallthrough and content
 * fingerprinting. Adapters hold one instead of inheriting it.
 */
export class SourceFetcher {
  private readonly http: HttpFetch;
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: SourceFetcherOptions = {}) {
    this.http = options.http ?? nodeHttpFetch;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 20000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.logger = options.logger ?? silentLogger;
  }

  fingerprint(content: string | Buffer): string {
    return sha256(content);
  }

  async fetch(url: string, signal: AbortSignal): Promise<FetchedPayload> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        return await this.fetchOnce(url, signal);
      } catch (error) {
        lastError = error;
        if (signal.aborted || attempt >= this.retries || !isRetryable(error)) break;
        const wait = this.retryDelayMs * Math.pow(2, attempt);
        this.logger.debug(`[fetch] retry ${attempt + 1}/${this.retries} for ${url} in ${wait}ms`);
        await delay(wait, signal);
      }
    }
    throw lastError;
  }

  /** Tries each URL in order; the first 200 answer wins. */
  async fetchFirst(urls: readonly string[], signal: AbortSignal): Promise<FetchFirstResult> {
    const failures: string[] = [];
    for (const url of urls) {
      if (signal.aborted) {
        failures.push(`${url}: aborted`);
        break;
      }
      try {
        return { ok: true, payload: await this.fetch(url, signal) };
      } catch (error) {
        failures.push(`${url}: ${errorMessage(error)}`);
      }
    }
    return { ok: false, failures };
  }

  private async fetchOnce(url: string, parent: AbortSignal): Promise<FetchedPayload> {
    const { signal, dispose } = withTimeout(parent, this.requestTimeoutMs);
    try {
      const res = await this.http(url, {
        headers: { "User-Agent": this.userAgent, Accept: ACCEPT },
        signal
      });
      if (res.status !== 200) {
        throw new HttpStatusError(url, res.status);
      }
      return { url, body: res.body, fingerprint: this.fingerprint(res.body) };
    } finally {
      dispose();
    }
  }
}
