import type { TelemetryResult } from "../sdk/types.js";
import { formatPayload, renderCard, renderPanel } from "./html.js";

/**
 * Card for one overview probe, with a status indicator.
 */
export function renderTelemetryCard(result: TelemetryResult): string {
  switch (result.kind) {
    case "exception":
      return renderCard({
        title: result.label,
        body: `Error: ${result.message}`,
        indicator: "error",
      });
    case "http-error":
      return renderCard({
        title: result.label,
        body: `Error ${result.status}: ${result.body}`,
        indicator: "error",
      });
    case "ok":
      return renderCard({
        title: result.label,
        body: formatPayload(result.payload),
        indicator: "ok",
      });
  }
}

/**
 * Panel for the response of a single command.
 */
export function renderResponsePanel(
  command: string,
  status: number,
  payload: unknown,
  servedBy?: string,
): string {
  const via = servedBy ? ` via ${servedBy}` : "";

  return renderPanel({
    title: "Lemonade Panel",
    badge: command,
    content: renderCard({
      title: `Response · Status: ${status}${via}`,
      body: formatPayload(payload),
      indicator: status < 400 ? "ok" : "error",
    }),
  });
}

export function renderErrorPanel(message: string): string {
  return renderPanel({
    title: "Error",
    badge: "Fail",
    content: renderCard({ title: "Request failed", body: message, tone: "error" }),
  });
}
