import {
  type GatewayError,
  isGatewayError,
  NormalizationError,
  UpstreamAbortedError,
  UpstreamHttpError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
} from "@stamp-gateway/stamp-primitives";
import type { Logger } from "pino";

export interface BeeClientOptions {
  /**
   * Root of the Bee node's HTTP API, e.g. `http://localhost:1633`.
   */
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

export interface RequestOptions {
  /**
   * Aborts the upstream call, typically when the client disconnects.
   */
  signal?: AbortSignal;
}

export const BEE_PATHS = {
  batches: "/batches",
  wallet: "/wallet",
  chequebookAddress: "/chequebook/address",
  chequebookBalance: "/chequebook/balance",
} as const;

/**
 * Read-only client for the Bee node API. One attempt per call: no retries,
 * no circuit breaking. Every failure surfaces as a {@link GatewayError}.
 */
export class BeeClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: BeeClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  urlFor(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  /**
   * Raw JSON from `GET /batches`, in whatever envelope the node uses.
   */
  async fetchAllStamps(options: RequestOptions = {}): Promise<unknown> {
    return this.getJson(BEE_PATHS.batches, options);
  }

  async fetchWallet(options: RequestOptions = {}): Promise<unknown> {
    return this.getJson(BEE_PATHS.wallet, options);
  }

  async fetchChequebookAddress(options: RequestOptions = {}): Promise<unknown> {
    return this.getJson(BEE_PATHS.chequebookAddress, options);
  }

  async fetchChequebookBalance(options: RequestOptions = {}): Promise<unknown> {
    return this.getJson(BEE_PATHS.chequebookBalance, options);
  }

  private async getJson(
    path: string,
    { signal }: RequestOptions,
  ): Promise<unknown> {
    const url = this.urlFor(path);
    if (signal?.aborted) {
      throw this.fail(new UpstreamAbortedError(url), url);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    let body: string;
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      if (!response.ok) {
        await this.discardBody(response, url);
        throw new UpstreamHttpError(url, response.status);
      }
      // The timeout keeps running until the body is fully read.
      body = await response.text();
    } catch (error) {
      if (isGatewayError(error)) {
        throw this.fail(error, url);
      }
      if (timedOut) {
        throw this.fail(new UpstreamTimeoutError(url, this.timeoutMs), url);
      }
      if (signal?.aborted) {
        throw this.fail(new UpstreamAbortedError(url), url);
      }
      throw this.fail(new UpstreamUnreachableError(url, { cause: error }), url);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw this.fail(
        new NormalizationError(
          "malformed-body",
          `upstream body from ${url} is not valid JSON`,
          { cause: error },
        ),
        url,
      );
    }
  }

  // An unread body keeps the upstream socket checked out.
  private async discardBody(response: Response, url: string): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug({ url, err: error }, "failed to discard Bee response body");
    }
  }

  private fail(error: GatewayError, url: string): GatewayError {
    const context = { kind: error.kind, url, error: error.message };

    if (error instanceof UpstreamHttpError) {
      this.logger.warn(
        { ...context, upstreamStatus: error.upstreamStatus },
        "Bee node rejected request",
      );
    } else if (error instanceof UpstreamAbortedError) {
      this.logger.info(context, "Bee request aborted by caller");
    } else if (error instanceof UpstreamTimeoutError) {
      this.logger.error(
        { ...context, timeoutMs: error.timeoutMs },
        "Bee node timed out",
      );
    } else if (error instanceof UpstreamUnreachableError) {
      this.logger.error(
        { ...context, cause: String(error.cause) },
        "Bee node unreachable",
      );
    } else {
      this.logger.error(context, "Bee node returned an unreadable body");
    }

    return error;
  }
}
