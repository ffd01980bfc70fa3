export { escapeHtml, formatPayload, renderCard, renderPanel } from "./html.js";
export type { CardOptions, Indicator, PanelOptions } from "./html.js";
export { renderErrorPanel, renderResponsePanel, renderTelemetryCard } from "./cards.js";
export { deriveMetrics, renderConnectionCard, renderMetricsCard } from "./metrics.js";
export type { MetricRow, TelemetrySnapshot } from "./metrics.js";
export { formatModelList } from "./models.js";
