import type { TelemetrySnapshot } from "../render/metrics.js";
import type { RequestLogger, TelemetryProbe } from "../sdk/types.js";

export type NotificationLevel = "info" | "success" | "warning" | "error";

/**
 * Text-input dialog shown by the chat host.
 */
export interface InputPrompt {
  title: string;
  message: string;
  placeholder?: string;
}

/**
 * What the chat host lets the action do. Every member is optional; a missing
 * one is treated as a no-op (or, for prompts, as a cancelled dialog).
 */
export interface HostCapabilities {
  reportStatus?(description: string, done: boolean): void | Promise<void>;
  notify?(content: string, level: NotificationLevel): void | Promise<void>;
  /** Resolves to the entered text, or null/undefined when cancelled */
  promptForText?(prompt: InputPrompt): Promise<string | null | undefined>;
}

export interface ChatMessage {
  role?: string;
  content: string;
  [key: string]: unknown;
}

/**
 * Request body handed to the action by the chat host. The action mutates
 * `messages` in place and returns the same object.
 */
export interface ChatBody {
  messages?: ChatMessage[];
  [key: string]: unknown;
}

export interface ActionUser {
  id?: string;
  name?: string;
  role?: string;
}

export interface ActionContext {
  host?: HostCapabilities;
  user?: ActionUser;
}

/**
 * An overview probe. `key` names the slot of the derived metrics it feeds.
 */
export interface OverviewProbe extends TelemetryProbe {
  key?: keyof TelemetrySnapshot;
}

export interface ActionOptions {
  /** Retry localhost requests against the docker host alias */
  hostFallback: boolean;
  /** Only run for users whose role is `admin` */
  requireAdmin: boolean;
  /** Endpoints fetched for the overview, in display order */
  probes: readonly OverviewProbe[];
  /** Add the summary and connection cards to the overview */
  showMetrics: boolean;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  logger?: RequestLogger;
}
