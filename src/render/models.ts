import { isRecord } from "./guards.js";

const MODEL_LIST_LIMIT = 30;

/**
 * Format a `/models` payload as the bullet list shown in the selection
 * prompt: `• <id> (<size>GB) [DL]`, capped at 30 entries.
 */
export function formatModelList(payload: unknown): string {
  if (!isRecord(payload)) {
    return "Could not parse model list.";
  }

  const models = payload.data ?? [];
  if (!Array.isArray(models) || !models.every(isRecord)) {
    return "Could not parse model list.";
  }
  if (!models.length) {
    return "No models found.";
  }

  const lines = models.map((model) => {
    const id = model.id ?? "Unknown";
    const size = model.size ?? "?";
    const downloaded = model.downloaded ? " [DL]" : "";
    return `• ${String(id)} (${String(size)}GB)${downloaded}`;
  });

  const more = lines.length > MODEL_LIST_LIMIT ? "\n... (and more)" : "";
  return lines.slice(0, MODEL_LIST_LIMIT).join("\n") + more;
}
