import { TransportError, UpstreamRejectedError, UpstreamUnavailableError } from "../errors.js";
import { sleep as defaultSleep } from "../utils/sleep.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RetryingFetcherOptions {
  userAgent: string;
  sessionCookie: string;
  /** Additional attempts after the first one, only for 5xx responses. */
  retries?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * GET with a constant-delay retry on 5xx responses.
 *
 * Client errors and transport failures are not retried. Nothing is logged here;
 * failures are thrown as typed errors for the caller to report.
 */
export class RetryingFetcher {
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: RetryingFetcherOptions) {
    this.retries = options.retries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetch(url: string): Promise<Buffer> {
    const headers: Record<string, string> = {
      "User-Agent": this.options.userAgent,
      Cookie: `SMSESS=${this.options.sessionCookie}`
    };

    let attempt = 0;
    for (;;) {
      attempt += 1;

      let response: Response;
      try {
        response = await this.fetchImpl(url, { method: "GET", headers });
      } catch (error) {
        throw new TransportError(url, error);
      }

      if (response.ok) {
        try {
          return Buffer.from(await response.arrayBuffer());
        } catch (error) {
          throw new TransportError(url, error);
        }
      }

      await response.body?.cancel();

      if (response.status >= 500 && response.status < 600) {
        if (attempt > this.retries) {
          throw new UpstreamUnavailableError(url, response.status, attempt);
        }
        await this.sleep(this.retryDelayMs);
        continue;
      }

      throw new UpstreamRejectedError(url, response.status);
    }
  }
}
