import type { CandidateStatus } from "../sdk/types.js";
import { isRecord } from "./guards.js";
import { escapeHtml } from "./html.js";

export interface MetricRow {
  label: string;
  value: string;
}

/**
 * Parsed payloads of the overview probes, keyed by endpoint. A key is absent
 * when its probe failed.
 */
export interface TelemetrySnapshot {
  health?: unknown;
  stats?: unknown;
  systemInfo?: unknown;
  models?: unknown;
}

const SYSTEM_FIELDS = ["OS Version", "Processor", "Physical Memory"] as const;

/**
 * Summarise the overview payloads into a few headline numbers.
 * Rows whose source field is missing are left out.
 */
export function deriveMetrics(snapshot: TelemetrySnapshot): MetricRow[] {
  const rows: MetricRow[] = [];
  const { health, stats, systemInfo, models } = snapshot;

  if (isRecord(health)) {
    if (typeof health.status === "string") {
      rows.push({ label: "Server status", value: health.status });
    }
    if ("model_loaded" in health) {
      const loaded = health.model_loaded;
      rows.push({
        label: "Loaded model",
        value: typeof loaded === "string" && loaded ? loaded : "none",
      });
    }
  }

  if (isRecord(stats)) {
    const { tokens_per_second, time_to_first_token, input_tokens, output_tokens } = stats;
    if (typeof tokens_per_second === "number") {
      rows.push({ label: "Tokens/s", value: tokens_per_second.toFixed(2) });
    }
    if (typeof time_to_first_token === "number") {
      rows.push({
        label: "Time to first token",
        value: `${time_to_first_token.toFixed(3)} s`,
      });
    }
    if (typeof input_tokens === "number" && typeof output_tokens === "number") {
      rows.push({ label: "Tokens in / out", value: `${input_tokens} / ${output_tokens}` });
    }
  }

  if (isRecord(models) && Array.isArray(models.data)) {
    const listed = models.data.filter(isRecord);
    const downloaded = listed.filter((model) => Boolean(model.downloaded)).length;
    rows.push({
      label: "Models",
      value: `${listed.length} listed, ${downloaded} downloaded`,
    });
  }

  if (isRecord(systemInfo)) {
    for (const field of SYSTEM_FIELDS) {
      const value = systemInfo[field];
      if (typeof value === "string" && value) {
        rows.push({ label: field, value });
      }
    }
  }

  return rows;
}

export function renderMetricsCard(rows: readonly MetricRow[]): string {
  const body = rows.length
    ? rows
        .map(
          (row) =>
            `<dt>${escapeHtml(row.label)}</dt><dd>${escapeHtml(row.value)}</dd>`,
        )
        .join("")
    : "<dt>No data</dt><dd>-</dd>";

  return `
            <div class="card">
                <div class="card-header">
                    <span class="card-title">Summary</span>
                </div>
                <dl class="metrics">${body}</dl>
            </div>`;
}

/**
 * Which base URLs were tried and how they fared.
 */
export function renderConnectionCard(statuses: readonly CandidateStatus[]): string {
  const body = statuses
    .map((status) => {
      const outcome =
        status.failures < status.attempts ? "answered" : status.attempts ? "failed" : "unused";
      const detail = status.lastError ? `, last error: ${status.lastError}` : "";
      return (
        `<dt>${escapeHtml(status.url)}</dt>` +
        `<dd>${outcome} (${status.attempts} attempts, ${status.failures} failures${escapeHtml(detail)})</dd>`
      );
    })
    .join("");

  return `
            <div class="card">
                <div class="card-header">
                    <span class="card-title">Connection</span>
                </div>
                <dl class="metrics">${body}</dl>
            </div>`;
}
