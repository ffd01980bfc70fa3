// SDK - Lemonade REST client with host fallback and telemetry fan-out
export {
  LemonadeClient,
  apiPath,
  fetchTelemetry,
  readPayload,
  resolveBaseCandidates,
  settleAll,
} from "./sdk/index.js";
export type {
  CandidateStatus,
  EndpointRequest,
  LemonadeClientOptions,
  TelemetryProbe,
  TelemetryResult,
} from "./sdk/index.js";

// Action - chat plugin entry points
export {
  LemonadeAction,
  createAdminPanel,
  createControlPanel,
  fromEventCallbacks,
  parseCommand,
} from "./action/index.js";
export type {
  ActionContext,
  ActionOptions,
  ChatBody,
  HostCapabilities,
} from "./action/index.js";

export { createConfig, loadConfigFromEnv, DEFAULT_CONFIG } from "./config.js";
export type { ActionConfig } from "./config.js";
