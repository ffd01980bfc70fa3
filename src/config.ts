/**
 * User-adjustable settings of the action ("valves" in the chat host).
 */
export interface ActionConfig {
  /** Lemonade server base URL, without `/api/v1` */
  readonly baseUrl: string;
  /** Default timeout for standard requests (health, stats, listing) */
  readonly timeoutSeconds: number;
}

export const DEFAULT_CONFIG: ActionConfig = Object.freeze({
  baseUrl: "http://localhost:8000",
  timeoutSeconds: 20,
});

/**
 * Build a validated, frozen configuration.
 */
export function createConfig(overrides: Partial<ActionConfig> = {}): ActionConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };

  let protocol: string;
  try {
    protocol = new URL(config.baseUrl).protocol;
  } catch {
    throw new Error(`Invalid base URL: ${config.baseUrl}`);
  }
  if (protocol !== "http:" && protocol !== "https:") {
    throw new Error(`Base URL must use http or https: ${config.baseUrl}`);
  }

  if (!Number.isFinite(config.timeoutSeconds) || config.timeoutSeconds <= 0) {
    throw new Error("Timeout must be a positive number of seconds.");
  }

  return Object.freeze(config);
}

/**
 * Read the configuration from environment variables.
 *
 * - `LEMONADE_BASE_URL` (default: http://localhost:8000)
 * - `LEMONADE_TIMEOUT_SECONDS` (default: 20)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ActionConfig {
  return createConfig({
    baseUrl: env.LEMONADE_BASE_URL || DEFAULT_CONFIG.baseUrl,
    timeoutSeconds: parseInt(
      env.LEMONADE_TIMEOUT_SECONDS || String(DEFAULT_CONFIG.timeoutSeconds),
      10,
    ),
  });
}
