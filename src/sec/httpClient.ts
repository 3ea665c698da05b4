import { type Logger, silentLogger } from "../../engine/logger.js";

/**
 * Lightweight HTTP client for SEC endpoints with rate limiting and retries.
 */
export interface SecHttpClientOptions {
  userAgent: string;
  baseDelayMs?: number;
  maxRetries?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export class SecHttpError extends Error {
  status?: number;
  statusText?: string;
  url: string;
  bodySnippet?: string;

  constructor(opts: { message: string; url: string; status?: number; statusText?: string; bodySnippet?: string }) {
    super(opts.message);
    this.name = "SecHttpError";
    this.url = opts.url;
    this.status = opts.status;
    this.statusText = opts.statusText;
    this.bodySnippet = opts.bodySnippet;
  }
}

const isNetworkError = (err: unknown): boolean =>
  err instanceof TypeError || (err instanceof Error && err.name === "FetchError");

export class SecHttpClient {
  private readonly userAgent: string;
  private readonly baseDelayMs: number;
  private readonly maxRetries: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private lastRequestTime = 0;

  constructor(options: SecHttpClientOptions) {
    if (!options.userAgent || options.userAgent.length < 6) {
      throw new Error("userAgent is required and should include contact info");
    }
    this.userAgent = options.userAgent;
    this.baseDelayMs = options.baseDelayMs ?? 200;
    this.maxRetries = options.maxRetries ?? 3;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  private async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }

  private async enforceRateLimit(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.baseDelayMs) {
      await this.sleep(this.baseDelayMs - elapsed);
    }
    this.lastRequestTime = Date.now();
  }

  async getJson<T>(url: string): Promise<T> {
    let attempt = 0;
    let backoff = this.baseDelayMs;
    let lastFailure: { status: number; statusText: string; bodySnippet: string } | undefined;

    while (attempt <= this.maxRetries) {
      await this.enforceRateLimit();
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: "GET",
          headers: {
            "User-Agent": this.userAgent,
            Accept: "application/json",
            "Accept-Encoding": "gzip, deflate",
          },
        });
      } catch (err) {
        if (isNetworkError(err) && attempt < this.maxRetries) {
          attempt += 1;
          this.logger.warn(`SEC request to ${url} failed (${String(err)}); retry ${attempt}/${this.maxRetries}`);
          await this.sleep(backoff);
          backoff *= 2;
          continue;
        }
        throw new SecHttpError({
          message: `SEC request error: ${err instanceof Error ? err.message : String(err)}`,
          url,
        });
      }

      if (response.ok) {
        return (await response.json()) as T;
      }

      const { status, statusText } = response;
      const bodySnippet = (await response.text()).slice(0, 500);

      if (status === 429 || status >= 500) {
        lastFailure = { status, statusText, bodySnippet };
        attempt += 1;
        if (attempt > this.maxRetries) break;
        const retryAfter = Number(response.headers.get("retry-after"));
        const waitMs = status === 429 ? (retryAfter > 0 ? retryAfter * 1000 : backoff * 2) : backoff;
        this.logger.warn(`SEC responded ${status} for ${url}; retry ${attempt}/${this.maxRetries} in ${waitMs}ms`);
        await this.sleep(waitMs);
        backoff *= 2;
        continue;
      }

      throw new SecHttpError({
        message: `SEC request failed: ${status} ${statusText}`,
        url,
        status,
        statusText,
        bodySnippet,
      });
    }

    throw new SecHttpError({
      message: `SEC request failed after ${this.maxRetries} retries${lastFailure ? `: ${lastFailure.status} ${lastFailure.statusText}` : ""}`,
      url,
      ...lastFailure,
    });
  }
}
