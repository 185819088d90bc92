import type { AdoptionConfigClient } from "../../ports/MistClient";
import { FetchError, type FetchErrorCode } from "../../core/errors";
import { retry, type RetryOptions } from "../../shared/retry/retry";

type MistRequestError = Error & {
  status?: number;
  isTimeout?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;
};

export type MistHttpClientOptions = {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  retries?: number;
  retryTiming?: Partial<Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "jitterRatio" | "sleep">>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const statusOf = (err: unknown): number | undefined => {
  if (!isRecord(err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
};

const nonRetryableCode = (status: number): FetchErrorCode => {
  if (status === 401 || status === 403) return "unauthorized";
  if (status === 404) return "not_found";
  return "request_rejected";
};

/**
 * Mist API client for the outbound-SSH adoption command of an org/site.
 * Transient failures (network, timeout, 5xx, 429) are retried with
 * backoff; auth and not-found answers fail on the first attempt.
 */
export class MistHttpClient implements AdoptionConfigClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryTiming: MistHttpClientOptions["retryTiming"];

  constructor(opts: MistHttpClientOptions) {
    this.baseUrl = opts.baseUrl;
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? 10000;
    this.retries = opts.retries ?? 2;
    this.retryTiming = opts.retryTiming;
  }

  buildRequestUrl(orgId: string, siteId: string): URL {
    const url = new URL(this.baseUrl);
    const basePath = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${basePath}/orgs/${encodeURIComponent(orgId)}/ocdevices/outbound_ssh_cmd`;
    url.searchParams.set("site_id", siteId);
    return url;
  }

  async fetchAdoptionConfig(orgId: string, siteId: string): Promise<string> {
    const url = this.buildRequestUrl(orgId, siteId);
    const safeRequestUrl = `${url.origin}${url.pathname}${url.search}`;

    const doFetch = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          headers: {
            "Content-Type": "application/json",
            Authorization: `Token ${this.apiKey}`
          },
          signal: controller.signal
        });
      } catch (err) {
        if (controller.signal.aborted) {
          const timeoutError: MistRequestError = new Error(`Mist request timeout after ${this.timeoutMs}ms`);
          timeoutError.isTimeout = true;
          timeoutError.requestUrl = safeRequestUrl;
          throw timeoutError;
        }
        throw err;
      } finally {
        clearTimeout(timeout);
      }

      if (!res.ok) {
        // drain the body without keeping it: it may echo tokens or org data
        await res.text().catch(() => "");
        const err: MistRequestError = new Error(`Mist request failed: ${res.status}`);
        err.status = res.status;
        err.requestUrl = safeRequestUrl;
        if (res.status === 429) {
          const retryAfter = res.headers.get("retry-after");
          if (retryAfter && /^\d+$/.test(retryAfter)) {
            err.retryDelayMs = Number(retryAfter) * 1000;
          }
        }
        throw err;
      }

      return res.json().catch((cause: unknown) => {
        throw new FetchError({
          code: "invalid_response",
          message: `Mist response for org=${orgId} site=${siteId} is not valid JSON`,
          status: res.status,
          requestUrl: safeRequestUrl,
          cause
        });
      });
    };

    let body: unknown;
    try {
      body = await retry(doFetch, {
        retries: this.retries,
        minDelayMs: 250,
        maxDelayMs: 5000,
        ...this.retryTiming,
        onRetry: ({ attempt, maxAttempts, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "mist.retry",
            status: statusOf(error) ?? null,
            url: safeRequestUrl,
            attempt,
            maxAttempts
          }));
        },
        onGiveUp: ({ attempt, maxAttempts, error, retryable }) => {
          if (!retryable) return;
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "mist.give_up",
            status: statusOf(error) ?? null,
            url: safeRequestUrl,
            attempt,
            maxAttempts
          }));
        },
        shouldRetry: (err) => {
          if (err instanceof FetchError) return false;
          if (!isRecord(err)) return true;
          if (err.isTimeout === true) return true;

          const status = statusOf(err);
          if (status === 429) {
            return { retry: true, delayMs: typeof err.retryDelayMs === "number" ? err.retryDelayMs : undefined };
          }
          if (typeof status === "number") return status >= 500;
          return true;
        }
      });
    } catch (err) {
      throw this.toFetchError(err, orgId, siteId, safeRequestUrl);
    }

    if (!isRecord(body) || typeof body.cmd !== "string") {
      throw new FetchError({
        code: "invalid_response",
        message: `Mist response for org=${orgId} site=${siteId} has no adoption command`,
        status: 200,
        requestUrl: safeRequestUrl
      });
    }

    return body.cmd;
  }

  private toFetchError(err: unknown, orgId: string, siteId: string, requestUrl: string): FetchError {
    if (err instanceof FetchError) return err;

    const status = statusOf(err);
    if (typeof status === "number" && status < 500 && status !== 429) {
      return new FetchError({
        code: nonRetryableCode(status),
        message: `Mist rejected adoption config request for org=${orgId} site=${siteId}: HTTP ${status}`,
        status,
        requestUrl,
        cause: err
      });
    }

    const reason = err instanceof Error ? err.message : String(err);
    return new FetchError({
      code: "retries_exhausted",
      message: `Failed to fetch adoption config for org=${orgId} site=${siteId} after ${this.retries + 1} attempts: ${reason}`,
      status,
      requestUrl,
      cause: err
    });
  }
}
