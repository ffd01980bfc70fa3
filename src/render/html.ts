export type Indicator = "ok" | "error";

export interface PanelOptions {
  title: string;
  badge: string;
  /** Pre-rendered card markup */
  content: string;
  /** Lay cards out in a responsive grid instead of a single column */
  grid?: boolean;
}

export interface CardOptions {
  title: string;
  body: string;
  indicator?: Indicator;
  /** Render the body in the error colour */
  tone?: "error";
}

const GRID_LAYOUT =
  ".layout { display: grid; grid-template-columns: repeat(auto-fit, minmax(250px, 1fr)); gap: 10px; }";
const COLUMN_LAYOUT =
  ".layout { display: flex; flex-direction: column; gap: 10px; }";

const STYLESHEET = `
        body { font-family: sans-serif; background: transparent; margin: 0; color: #e2e8f0; }
        .panel { background: #0f172a; border: 1px solid #1f2937; border-radius: 8px; padding: 12px; }
        .header { display: flex; justify-content: space-between; align-items: center; margin-bottom: 12px; border-bottom: 1px solid #1f2937; padding-bottom: 8px; }
        .title { font-weight: 600; }
        .badge { font-size: 0.75rem; background: #1e293b; padding: 2px 8px; border-radius: 99px; color: #94a3b8; text-transform: uppercase; }
        .card { background: #1e293b50; border: 1px solid #334155; border-radius: 6px; overflow: hidden; }
        .card-header { background: #1e293b; padding: 6px 10px; display: flex; justify-content: space-between; align-items: center; }
        .card-title { font-size: 0.75rem; color: #94a3b8; font-weight: bold; text-transform: uppercase; }
        .indicator { width: 8px; height: 8px; border-radius: 50%; background: #64748b; }
        .indicator.ok { background: #22c55e; box-shadow: 0 0 5px #22c55e40; }
        .indicator.error { background: #ef4444; }
        .metrics { margin: 0; padding: 10px; display: grid; grid-template-columns: auto 1fr; gap: 4px 12px; font-size: 0.75rem; }
        .metrics dt { color: #94a3b8; }
        .metrics dd { margin: 0; color: #e2e8f0; font-family: monospace; }
        pre { margin: 0; padding: 10px; font-family: monospace; font-size: 0.7rem; white-space: pre-wrap; word-wrap: break-word; color: #cbd5e1; max-height: 300px; overflow-y: auto; }
        pre.error { color: #ef4444; }
        pre::-webkit-scrollbar { width: 6px; height: 6px; }
        pre::-webkit-scrollbar-thumb { background: #475569; border-radius: 3px; }
        pre::-webkit-scrollbar-track { background: #0f172a; }`;

/**
 * Escape text for use inside HTML element content or attribute values.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/**
 * Pretty-print a payload; strings are passed through untouched.
 */
export function formatPayload(payload: unknown): string {
  if (typeof payload === "string") {
    return payload;
  }
  return JSON.stringify(payload, null, 2) ?? String(payload);
}

/**
 * A single card. Title and body are escaped here.
 */
export function renderCard(options: CardOptions): string {
  const indicator = options.indicator
    ? `<span class="indicator ${options.indicator}"></span>`
    : "";
  const preClass = options.tone === "error" ? ' class="error"' : "";

  return `
            <div class="card">
                <div class="card-header">
                    <span class="card-title">${escapeHtml(options.title)}</span>
                    ${indicator}
                </div>
                <pre${preClass}>${escapeHtml(options.body)}</pre>
            </div>`;
}

/**
 * Wrap cards into a self-contained, fenced HTML document that the chat
 * front end renders as an artifact.
 */
export function renderPanel(options: PanelOptions): string {
  const layout = options.grid ? GRID_LAYOUT : COLUMN_LAYOUT;

  return `\`\`\`html
<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <style>${STYLESHEET}
        ${layout}
    </style>
</head>
<body>
    <div class="panel">
        <div class="header">
            <span class="title">🍋 ${escapeHtml(options.title)}</span>
            <span class="badge">${escapeHtml(options.badge)}</span>
        </div>
        <div class="layout">${options.content}
        </div>
    </div>
</body>
</html>
\`\`\``;
}
