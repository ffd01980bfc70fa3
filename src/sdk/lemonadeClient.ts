import { errorMessage } from "./errors.js";
import {
  describeHost,
  normalizeBaseUrl,
  resolveBaseCandidates,
} from "./hosts.js";
import type {
  CandidateStatus,
  EndpointRequest,
  LemonadeClientOptions,
  RequestLogger,
} from "./types.js";

/** Prefix of the versioned Lemonade API. */
export const API_PREFIX = "/api/v1";

/** Liveness probe, served at the bare base URL. */
export const LIVE_PATH = "/live";

/**
 * Build a path under the versioned API prefix.
 */
export function apiPath(endpoint: string): string {
  return `${API_PREFIX}/${endpoint.replace(/^\/+/, "")}`;
}

/**
 * LemonadeClient sends requests to a Lemonade server, trying each
 * candidate base URL in order until one answers.
 *
 * @example
 * ```ts
 * const client = new LemonadeClient({
 *   baseUrl: "http://localhost:8000",
 *   timeoutMs: 20_000,
 *   hostFallback: true,
 * });
 *
 * const response = await client.get(apiPath("health"));
 * ```
 */
export class LemonadeClient {
  private readonly candidates: CandidateStatus[];
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: RequestLogger;
  private lastUsedBase?: string;

  constructor(options: LemonadeClientOptions) {
    if (!normalizeBaseUrl(options.baseUrl)) {
      throw new Error("LemonadeClient requires a base URL.");
    }
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new Error("Timeout must be a positive number of milliseconds.");
    }

    const urls = options.hostFallback
      ? resolveBaseCandidates(options.baseUrl)
      : [normalizeBaseUrl(options.baseUrl)];

    this.candidates = urls.map((url) => ({ url, attempts: 0, failures: 0 }));
    this.timeoutMs = options.timeoutMs;
    this.headers = options.headers ?? {};
    this.logger = options.logger ?? console;
  }

  /**
   * Base URLs this client tries, in order.
   */
  getCandidates(): string[] {
    return this.candidates.map((candidate) => candidate.url);
  }

  /**
   * Get counters for every candidate base URL.
   */
  getStatus(): CandidateStatus[] {
    return this.candidates.map((candidate) => ({ ...candidate }));
  }

  /**
   * Get the base URL that produced the last returned response.
   */
  getLastUsedBase(): string | undefined {
    return this.lastUsedBase;
  }

  async get(
    path: string,
    options?: Pick<EndpointRequest, "timeoutMs">,
  ): Promise<Response> {
    return this.request({ method: "GET", path, ...options });
  }

  async post(
    path: string,
    body: unknown,
    options?: Pick<EndpointRequest, "timeoutMs">,
  ): Promise<Response> {
    return this.request({ method: "POST", path, body, ...options });
  }

  /**
   * Send a request, falling through the candidate list.
   *
   * Transport errors and HTTP error statuses from every candidate but the
   * last move on to the next one. The last candidate's response is returned
   * whatever its status, and its transport error is re-thrown.
   */
  async request(req: EndpointRequest): Promise<Response> {
    for (const [index, candidate] of this.candidates.entries()) {
      const isLast = index === this.candidates.length - 1;
      const start = Date.now();
      candidate.attempts += 1;

      try {
        const response = await fetch(
          `${candidate.url}${req.path}`,
          this.buildInit(req),
        );
        candidate.lastLatencyMs = Date.now() - start;
        this.logRequest(req, candidate.url, response.status, candidate.lastLatencyMs);

        if (response.status >= 400) {
          candidate.failures += 1;
          candidate.lastError = `HTTP ${response.status}`;
          if (!isLast) {
            await response.body?.cancel();
            continue;
          }
        } else {
          candidate.lastError = undefined;
        }

        this.lastUsedBase = candidate.url;
        return response;
      } catch (error) {
        candidate.failures += 1;
        candidate.lastLatencyMs = Date.now() - start;
        candidate.lastError = errorMessage(error);
        this.logRequest(req, candidate.url, undefined, candidate.lastLatencyMs);

        if (isLast) {
          throw error;
        }
        this.logger.warn(
          `Lemonade request to ${candidate.url} failed (${candidate.lastError}), trying next host.`,
        );
      }
    }

    throw new Error("No base URLs available.");
  }

  private buildInit(req: EndpointRequest): RequestInit {
    const headers = new Headers({ accept: "application/json" });
    const hasBody = req.body !== undefined;

    if (hasBody) {
      headers.set("content-type", "application/json");
    }

    for (const [key, value] of Object.entries(this.headers)) {
      headers.set(key, value);
    }

    return {
      method: req.method,
      headers,
      body: hasBody ? JSON.stringify(req.body) : undefined,
      signal: AbortSignal.timeout(req.timeoutMs ?? this.timeoutMs),
    };
  }

  private logRequest(
    req: EndpointRequest,
    baseUrl: string,
    status: number | undefined,
    durationMs: number,
  ): void {
    const timestamp = new Date().toISOString();
    const ok = status !== undefined && status < 400;
    const statusIcon = ok ? "✓" : "✗";
    const host = describeHost(baseUrl);

    this.logger.log(
      `[${timestamp}] ${statusIcon} ${req.method} ${req.path} → ${host} ${status ?? "ERROR"} ${durationMs}ms`,
    );
  }
}
