import { errorMessage } from "./errors.js";
import type { LemonadeClient } from "./lemonadeClient.js";
import type { Settled, TelemetryProbe, TelemetryResult } from "./types.js";

/**
 * Run every task concurrently and wait for all of them.
 *
 * Results are positional: `result[i]` belongs to `tasks[i]` whatever the
 * completion order, and a rejected task never affects its siblings.
 */
export async function settleAll<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
): Promise<Settled<T>[]> {
  const outcomes = await Promise.allSettled(
    // Thunks may throw synchronously; wrap so that lands in the rejection slot.
    tasks.map(async (task) => task()),
  );

  return outcomes.map((outcome) =>
    outcome.status === "fulfilled"
      ? { ok: true, value: outcome.value }
      : { ok: false, error: outcome.reason },
  );
}

/**
 * Read a response body as JSON, falling back to the raw text.
 */
export async function readPayload(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * GET every probe through the client at once and classify each outcome.
 */
export async function fetchTelemetry(
  client: LemonadeClient,
  probes: readonly TelemetryProbe[],
): Promise<TelemetryResult[]> {
  const settled = await settleAll(
    probes.map((probe) => async (): Promise<TelemetryResult> => {
      const response = await client.get(probe.path);
      if (response.status >= 400) {
        return {
          kind: "http-error",
          label: probe.label,
          status: response.status,
          body: await response.text(),
        };
      }
      return {
        kind: "ok",
        label: probe.label,
        status: response.status,
        payload: await readPayload(response),
      };
    }),
  );

  return settled.map((outcome, index): TelemetryResult =>
    outcome.ok
      ? outcome.value
      : {
          kind: "exception",
          label: probes[index].label,
          message: errorMessage(outcome.error),
        },
  );
}
