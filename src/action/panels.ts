import { DEFAULT_CONFIG } from "../config.js";
import type { ActionConfig } from "../config.js";
import { LIVE_PATH, apiPath } from "../sdk/lemonadeClient.js";
import { LemonadeAction } from "./lemonadeAction.js";
import type { ActionOptions, OverviewProbe } from "./types.js";

const HEALTH: OverviewProbe = { key: "health", label: "Health", path: apiPath("health") };
const STATS: OverviewProbe = { key: "stats", label: "Stats", path: apiPath("stats") };
const SYSTEM: OverviewProbe = {
  key: "systemInfo",
  label: "System",
  path: apiPath("system-info"),
};
const LIVE: OverviewProbe = { label: "Live", path: LIVE_PATH };
const MODELS: OverviewProbe = { key: "models", label: "Models", path: apiPath("models") };

export const CONTROL_PANEL_PROBES: readonly OverviewProbe[] = Object.freeze([
  HEALTH,
  STATS,
  SYSTEM,
  LIVE,
  MODELS,
]);

export const ADMIN_PANEL_PROBES: readonly OverviewProbe[] = Object.freeze([
  HEALTH,
  STATS,
  SYSTEM,
  MODELS,
]);

/**
 * Panel for anyone: talks to the configured URL only and includes the
 * liveness probe in the overview.
 */
export function createControlPanel(
  config: ActionConfig = DEFAULT_CONFIG,
  options: Partial<ActionOptions> = {},
): LemonadeAction {
  return new LemonadeAction(config, {
    hostFallback: false,
    requireAdmin: false,
    probes: CONTROL_PANEL_PROBES,
    showMetrics: false,
    ...options,
  });
}

/**
 * Admin-only panel. Falls back to the docker host alias when the server is
 * configured as localhost, and adds summary and connection cards to the
 * overview.
 */
export function createAdminPanel(
  config: ActionConfig = DEFAULT_CONFIG,
  options: Partial<ActionOptions> = {},
): LemonadeAction {
  return new LemonadeAction(config, {
    hostFallback: true,
    requireAdmin: true,
    probes: ADMIN_PANEL_PROBES,
    showMetrics: true,
    ...options,
  });
}
