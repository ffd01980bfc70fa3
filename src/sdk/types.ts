/**
 * HTTP methods used against the Lemonade REST surface.
 */
export type HttpMethod = "GET" | "POST";

/**
 * A single request against the Lemonade server.
 */
export interface EndpointRequest {
  method: HttpMethod;
  /** Path relative to the base URL, e.g. `/api/v1/health` or `/live` */
  path: string;
  /** Optional JSON body (sent with content-type application/json) */
  body?: unknown;
  /** Optional timeout override in milliseconds */
  timeoutMs?: number;
}

/**
 * Minimal logger contract. `console` satisfies it.
 */
export type RequestLogger = Pick<Console, "log" | "warn">;

/**
 * Options for the LemonadeClient.
 */
export interface LemonadeClientOptions {
  /** Lemonade server base URL, without the `/api/v1` prefix */
  baseUrl: string;
  /** Default timeout in milliseconds */
  timeoutMs: number;
  /** Also try the docker-internal alias when the host is localhost (default: false) */
  hostFallback?: boolean;
  /** Optional headers to include with every request */
  headers?: Record<string, string>;
  /** Where request lines are written (default: console) */
  logger?: RequestLogger;
}

/**
 * Per-candidate counters collected by the client.
 */
export interface CandidateStatus {
  url: string;
  attempts: number;
  failures: number;
  lastLatencyMs?: number;
  lastError?: string;
}

/**
 * One probe of the telemetry fan-out.
 */
export interface TelemetryProbe {
  label: string;
  path: string;
}

/**
 * Outcome of one settled task.
 */
export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Classified outcome of one telemetry probe.
 */
export type TelemetryResult =
  | { kind: "ok"; label: string; status: number; payload: unknown }
  | { kind: "http-error"; label: string; status: number; body: string }
  | { kind: "exception"; label: string; message: string };
