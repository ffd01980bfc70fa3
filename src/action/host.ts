import { errorMessage } from "../sdk/errors.js";
import type { RequestLogger } from "../sdk/types.js";
import type {
  ChatBody,
  HostCapabilities,
  InputPrompt,
  NotificationLevel,
} from "./types.js";

/**
 * Events the chat host's emitter accepts.
 */
export type HostEvent =
  | { type: "status"; data: { description: string; done: boolean } }
  | { type: "notification"; data: { type: NotificationLevel; content: string } };

export interface InputEvent {
  type: "input";
  data: InputPrompt;
}

export type EventEmitter = (event: HostEvent) => Promise<void>;
export type EventCall = (event: InputEvent) => Promise<unknown>;

/**
 * Adapt the chat host's raw callbacks (`__event_emitter__`,
 * `__event_call__`) to {@link HostCapabilities}.
 */
export function fromEventCallbacks(
  emitter?: EventEmitter,
  eventCall?: EventCall,
): HostCapabilities {
  return {
    reportStatus: emitter
      ? (description, done) => emitter({ type: "status", data: { description, done } })
      : undefined,
    notify: emitter
      ? (content, level) =>
          emitter({ type: "notification", data: { type: level, content } })
      : undefined,
    promptForText: eventCall
      ? async (prompt) => {
          const reply = await eventCall({ type: "input", data: prompt });
          return typeof reply === "string" ? reply : undefined;
        }
      : undefined,
  };
}

/**
 * Append a rendered fragment to the last chat message. Bodies without
 * messages are left alone.
 */
export function appendToChat(body: ChatBody, html: string): void {
  const messages = body.messages;
  if (!Array.isArray(messages) || !messages.length) {
    return;
  }
  const last = messages[messages.length - 1];
  last.content += `\n\n${html}`;
}

/**
 * Null-safe wrapper over the host capabilities.
 *
 * Status and notification failures are logged and do not interrupt the
 * action; prompt failures propagate so the caller can report them.
 */
export class HostBridge {
  constructor(
    private readonly host: HostCapabilities = {},
    private readonly logger: RequestLogger = console,
  ) {}

  async status(description: string, done = false): Promise<void> {
    try {
      await this.host.reportStatus?.(description, done);
    } catch (error) {
      this.logger.warn(`Status update failed: ${errorMessage(error)}`);
    }
  }

  async notify(content: string, level: NotificationLevel = "info"): Promise<void> {
    try {
      await this.host.notify?.(content, level);
    } catch (error) {
      this.logger.warn(`Notification failed: ${errorMessage(error)}`);
    }
  }

  async prompt(prompt: InputPrompt): Promise<string | undefined> {
    if (!this.host.promptForText) {
      return undefined;
    }
    const reply = await this.host.promptForText(prompt);
    return reply ?? undefined;
  }
}
