import { LIVE_PATH, apiPath } from "../sdk/lemonadeClient.js";

/** Model downloads can take a long time. */
export const PULL_TIMEOUT_MS = 30 * 60 * 1000;
export const DELETE_TIMEOUT_MS = 3 * 60 * 1000;

/**
 * Command names with a fixed target. Anything else is sent verbatim under
 * `/api/v1/`.
 */
export const ROUTES: Readonly<Record<string, string>> = Object.freeze({
  models: apiPath("models"),
  health: apiPath("health"),
  stats: apiPath("stats"),
  system: apiPath("system-info"),
  live: LIVE_PATH,
});

export type Command =
  | { kind: "overview" }
  | { kind: "pull" | "delete"; key: string; timeoutMs: number }
  | { kind: "direct"; key: string; path: string; timeoutMs: number };

/**
 * Map the text typed into the command prompt to what should run.
 */
export function parseCommand(
  input: string | null | undefined,
  defaultTimeoutMs: number,
): Command {
  const key = (input ?? "").trim().toLowerCase();

  if (!key) {
    return { kind: "overview" };
  }
  if (key === "pull") {
    return { kind: "pull", key, timeoutMs: PULL_TIMEOUT_MS };
  }
  if (key === "delete") {
    return { kind: "delete", key, timeoutMs: DELETE_TIMEOUT_MS };
  }

  const path = Object.hasOwn(ROUTES, key) ? ROUTES[key] : apiPath(key);
  return { kind: "direct", key, path, timeoutMs: defaultTimeoutMs };
}
