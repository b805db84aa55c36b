import crypto from "node:crypto";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { CancelledError, TransportError, errorMessage } from "../provenance/errors.js";
import { DEFAULT_TIMEOUT_MS } from "../config/settings.js";

export interface FetchInit {
  readonly method: "GET";
  readonly headers: Record<string, string>;
  readonly signal: AbortSignal;
  readonly redirect: "follow";
}

export type FetchLike = (url: string, init: FetchInit) => Promise<Response>;

export type DigestAlgorithm = "sha256" | "sha512";

export interface HttpClientOptions {
  readonly fetch?: FetchLike;
  readonly timeoutMs?: number;
  readonly userAgent?: string;
  readonly logger?: Logger;
}

export interface RequestOptions {
  readonly accept?: string;
  readonly signal?: AbortSignal;
}

const ERROR_BODY_LIMIT = 200;

/**
 * Thin wrapper over fetch that applies a per-request timeout, honours the
 * caller's abort signal and maps every failure onto TransportError or
 * CancelledError.
 */
export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? "mcp-provenance";
    this.logger = options.logger ?? silentLogger();
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    return await this.request(url, options, async (response) => {
      const text = await response.text();
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (error) {
        throw new TransportError(url, `invalid JSON from ${url}`, {
          status: response.status,
          cause: error,
        });
      }
    });
  }

  /** Stream a resource through the hash and return the raw digest bytes. */
  async digest(
    url: string,
    algorithm: DigestAlgorithm,
    options: RequestOptions = {},
  ): Promise<Buffer> {
    return await this.request(url, options, async (response) => {
      const hash = crypto.createHash(algorithm);
      if (response.body) {
        for await (const chunk of response.body) {
          hash.update(chunk);
        }
      }
      return hash.digest();
    });
  }

  private async request<T>(
    url: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    if (options.signal?.aborted) {
      throw new CancelledError(`request to ${url} cancelled`, {
        cause: options.signal.reason,
      });
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, timeout])
      : timeout;
    const headers: Record<string, string> = { "User-Agent": this.userAgent };
    if (options.accept) {
      headers.Accept = options.accept;
    }

    this.logger.debug({ url }, "http request");
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers,
        signal,
        redirect: "follow",
      });
      if (!response.ok) {
        const excerpt = await readExcerpt(response);
        throw new TransportError(
          url,
          `unexpected status code ${response.status} from ${url}${excerpt ? `: ${excerpt}` : ""}`,
          { status: response.status },
        );
      }
      return await read(response);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw new CancelledError(`request to ${url} cancelled`, {
          cause: error,
        });
      }
      if (timeout.aborted) {
        throw new TransportError(
          url,
          `request to ${url} timed out after ${this.timeoutMs}ms`,
          { cause: error },
        );
      }
      throw new TransportError(
        url,
        `request to ${url} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

async function readExcerpt(response: Response): Promise<string> {
  try {
    const text = (await response.text()).trim();
    return text.length > ERROR_BODY_LIMIT
      ? `${text.slice(0, ERROR_BODY_LIMIT)}...`
      : text;
  } catch {
    return "";
  }
}
