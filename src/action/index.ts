export { LemonadeAction, ADMIN_ROLE } from "./lemonadeAction.js";
export {
  ADMIN_PANEL_PROBES,
  CONTROL_PANEL_PROBES,
  createAdminPanel,
  createControlPanel,
} from "./panels.js";
export {
  DELETE_TIMEOUT_MS,
  PULL_TIMEOUT_MS,
  ROUTES,
  parseCommand,
} from "./commands.js";
export type { Command } from "./commands.js";
export { HostBridge, appendToChat, fromEventCallbacks } from "./host.js";
export type { EventCall, EventEmitter, HostEvent, InputEvent } from "./host.js";
export type {
  ActionContext,
  ActionOptions,
  ActionUser,
  ChatBody,
  ChatMessage,
  HostCapabilities,
  InputPrompt,
  NotificationLevel,
  OverviewProbe,
} from "./types.js";
