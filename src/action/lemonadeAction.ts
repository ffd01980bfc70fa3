import type { ActionConfig } from "../config.js";
import { renderErrorPanel, renderResponsePanel, renderTelemetryCard } from "../render/cards.js";
import { renderPanel } from "../render/html.js";
import {
  deriveMetrics,
  renderConnectionCard,
  renderMetricsCard,
} from "../render/metrics.js";
import type { TelemetrySnapshot } from "../render/metrics.js";
import { formatModelList } from "../render/models.js";
import { errorMessage } from "../sdk/errors.js";
import { fetchTelemetry, readPayload } from "../sdk/fanOut.js";
import { LemonadeClient, apiPath } from "../sdk/lemonadeClient.js";
import type { EndpointRequest, TelemetryResult } from "../sdk/types.js";
import { parseCommand } from "./commands.js";
import type { Command } from "./commands.js";
import { HostBridge, appendToChat } from "./host.js";
import type { ActionContext, ActionOptions, ChatBody, OverviewProbe } from "./types.js";

export const ADMIN_ROLE = "admin";

const MODEL_PLACEHOLDER = "Qwen3-14B-GGUF";

/** The model inventory could not be fetched before a pull or delete. */
class ModelListError extends Error {
  constructor(reason: unknown) {
    super(`Failed to list models: ${errorMessage(reason)}`);
    this.name = "ModelListError";
  }
}

/**
 * Chat action that queries and manages a Lemonade server.
 *
 * Each {@link run} asks for a command, performs it and appends the rendered
 * result to the last chat message. Errors end up in the chat as an error
 * panel; `run` itself never rejects.
 */
export class LemonadeAction {
  private readonly config: ActionConfig;
  private readonly options: ActionOptions;

  constructor(config: ActionConfig, options: ActionOptions) {
    if (!options.probes.length) {
      throw new Error("LemonadeAction requires at least one overview probe.");
    }

    this.config = config;
    this.options = options;
  }

  /**
   * Run the action once against the given chat body.
   */
  async run(body: ChatBody, context: ActionContext = {}): Promise<ChatBody> {
    const host = new HostBridge(context.host, this.options.logger);

    if (this.options.requireAdmin && context.user?.role !== ADMIN_ROLE) {
      await host.notify("Only administrators can use the Lemonade panel.", "error");
      return body;
    }

    await host.status("Waiting for input...");

    let input: string | undefined;
    try {
      input = await host.prompt({
        title: "Lemonade Control",
        message:
          "Enter command (pull, delete, health, stats, models, system, live) or leave EMPTY for Overview:",
        placeholder: "Leave empty for full system report",
      });
    } catch (error) {
      await host.notify(`Input error: ${errorMessage(error)}`, "error");
      await host.status("Cancelled", true);
      return body;
    }

    const command = parseCommand(input, this.timeoutMs);
    let finalStatus = "Done";

    try {
      const client = this.createClient();

      if (command.kind === "overview") {
        await this.runOverview(body, client, host);
        finalStatus = "Overview Ready";
      } else {
        const request =
          command.kind === "direct"
            ? { method: "GET" as const, path: command.path, timeoutMs: command.timeoutMs }
            : await this.chooseModel(command, client, host);

        if (request) {
          await this.execute(body, command.key, request, client, host);
        } else {
          finalStatus = "Cancelled";
        }
      }
    } catch (error) {
      appendToChat(body, renderErrorPanel(errorMessage(error)));
      await host.notify(
        error instanceof ModelListError ? error.message : "Connection Failed",
        "error",
      );
    } finally {
      await host.status(finalStatus, true);
    }

    return body;
  }

  private get timeoutMs(): number {
    return this.config.timeoutSeconds * 1000;
  }

  private createClient(): LemonadeClient {
    return new LemonadeClient({
      baseUrl: this.config.baseUrl,
      timeoutMs: this.timeoutMs,
      hostFallback: this.options.hostFallback,
      headers: this.options.headers,
      logger: this.options.logger,
    });
  }

  private async runOverview(
    body: ChatBody,
    client: LemonadeClient,
    host: HostBridge,
  ): Promise<void> {
    await host.status("Fetching System Overview...");

    const { probes } = this.options;
    const results = await fetchTelemetry(client, probes);
    const cards = results.map(renderTelemetryCard);

    if (this.options.showMetrics) {
      cards.unshift(renderMetricsCard(deriveMetrics(toSnapshot(probes, results))));
      cards.push(renderConnectionCard(client.getStatus()));
    }

    appendToChat(
      body,
      renderPanel({
        title: "System Overview",
        badge: "Report",
        content: cards.join(""),
        grid: true,
      }),
    );
  }

  /**
   * Show the model inventory and ask which model to pull or delete.
   * Resolves to undefined when the user cancels.
   */
  private async chooseModel(
    command: Extract<Command, { kind: "pull" | "delete" }>,
    client: LemonadeClient,
    host: HostBridge,
  ): Promise<EndpointRequest | undefined> {
    const pull = command.kind === "pull";

    await host.status(pull ? "Fetching available models..." : "Fetching installed models...");

    let listResponse: Response;
    try {
      listResponse = await client.get(
        pull ? `${apiPath("models")}?show_all=true` : apiPath("models"),
      );
    } catch (error) {
      throw new ModelListError(error);
    }

    let modelList: string;
    if (listResponse.status === 200) {
      modelList = formatModelList(await readPayload(listResponse));
    } else {
      await listResponse.body?.cancel();
      modelList = `Error fetching list: ${listResponse.status}`;
    }

    const heading = pull ? "Available Models to Download" : "Installed Models";
    const answer = await host.prompt({
      title: pull ? "Pull Model" : "Delete Model",
      message: `${heading}:\n\n${modelList}\n\nEnter ID to ${command.kind}:`,
      placeholder: MODEL_PLACEHOLDER,
    });

    const modelName = answer?.trim();
    if (!modelName) {
      return undefined;
    }

    return {
      method: "POST",
      path: apiPath(command.kind),
      body: { model_name: modelName },
      timeoutMs: command.timeoutMs,
    };
  }

  private async execute(
    body: ChatBody,
    key: string,
    request: EndpointRequest,
    client: LemonadeClient,
    host: HostBridge,
  ): Promise<void> {
    await host.status(`Executing ${key}...`);

    const response = await client.request(request);
    const payload = await readPayload(response);
    const servedBy = this.options.hostFallback ? client.getLastUsedBase() : undefined;

    appendToChat(body, renderResponsePanel(key, response.status, payload, servedBy));
    await host.notify(
      `Request completed (${response.status})`,
      response.status < 400 ? "success" : "warning",
    );
  }
}

function toSnapshot(
  probes: readonly OverviewProbe[],
  results: readonly TelemetryResult[],
): TelemetrySnapshot {
  const snapshot: TelemetrySnapshot = {};
  results.forEach((result, index) => {
    const key = probes[index].key;
    if (key && result.kind === "ok") {
      snapshot[key] = result.payload;
    }
  });
  return snapshot;
}
