export { LemonadeClient, API_PREFIX, LIVE_PATH, apiPath } from "./lemonadeClient.js";
export {
  DOCKER_HOST_ALIAS,
  describeHost,
  normalizeBaseUrl,
  resolveBaseCandidates,
} from "./hosts.js";
export { fetchTelemetry, readPayload, settleAll } from "./fanOut.js";
export { errorMessage } from "./errors.js";
export type {
  CandidateStatus,
  EndpointRequest,
  HttpMethod,
  LemonadeClientOptions,
  RequestLogger,
  Settled,
  TelemetryProbe,
  TelemetryResult,
} from "./types.js";
