import { jest, describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { createConfig } from "../config.js";
import { LemonadeAction } from "./lemonadeAction.js";
import { createAdminPanel, createControlPanel } from "./panels.js";
import type { ChatBody, HostCapabilities, InputPrompt } from "./types.js";

type MockFetch = jest.Mock<typeof fetch>;
type Handler = (init?: RequestInit) => Response;

const BASE = "http://lemonade.test:8000";

const MODELS = {
  object: "list",
  data: [
    { id: "Qwen3-0.6B-GGUF", size: 0.38, downloaded: true },
    { id: "Llama-3.2-1B-Instruct-Hybrid", size: 1.2, downloaded: false },
  ],
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function createHost(answers: Array<string | null | undefined>) {
  const prompts: InputPrompt[] = [];
  const reportStatus = jest.fn<NonNullable<HostCapabilities["reportStatus"]>>();
  const notify = jest.fn<NonNullable<HostCapabilities["notify"]>>();
  const host: HostCapabilities = {
    reportStatus,
    notify,
    promptForText: async (prompt) => {
      prompts.push(prompt);
      return answers.shift();
    },
  };
  return { host, prompts, reportStatus, notify };
}

function chatBody(content = "original"): ChatBody {
  return { messages: [{ role: "assistant", content }] };
}

function lastContent(body: ChatBody): string {
  const messages = body.messages ?? [];
  return messages[messages.length - 1]?.content ?? "";
}

describe("LemonadeAction", () => {
  let originalFetch: typeof globalThis.fetch;
  let mockFetch: MockFetch;
  const logger = { log: jest.fn(), warn: jest.fn() };
  const config = createConfig({ baseUrl: BASE, timeoutSeconds: 5 });

  function serve(routes: Record<string, Handler>): void {
    mockFetch.mockImplementation(async (input, init) => {
      const handler = routes[String(input)];
      if (!handler) {
        throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED") });
      }
      return handler(init);
    });
  }

  function requestedUrls(): string[] {
    return mockFetch.mock.calls.map(([url]) => String(url));
  }

  function requestedMethods(): Array<string | undefined> {
    return mockFetch.mock.calls.map(([, init]) => init?.method);
  }

  beforeEach(() => {
    originalFetch = globalThis.fetch;
    mockFetch = jest.fn() as MockFetch;
    globalThis.fetch = mockFetch as typeof fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    jest.restoreAllMocks();
  });

  describe("constructor", () => {
    it("should throw if no overview probes provided", () => {
      expect(
        () =>
          new LemonadeAction(config, {
            hostFallback: false,
            requireAdmin: false,
            probes: [],
            showMetrics: false,
          }),
      ).toThrow("LemonadeAction requires at least one overview probe.");
    });
  });

  describe("overview", () => {
    const overviewRoutes: Record<string, Handler> = {
      [`${BASE}/api/v1/health`]: () => json({ status: "ok", model_loaded: "Qwen3-0.6B-GGUF" }),
      [`${BASE}/api/v1/stats`]: () => json({ tokens_per_second: 10 }),
      [`${BASE}/api/v1/system-info`]: () => json({ Processor: "Test CPU" }),
      [`${BASE}/live`]: () => new Response("OK"),
      [`${BASE}/api/v1/models`]: () => json(MODELS),
    };

    it("should fetch all five endpoints on empty input", async () => {
      serve(overviewRoutes);
      const { host, reportStatus } = createHost([""]);
      const body = chatBody();

      const result = await createControlPanel(config, { logger }).run(body, { host });

      expect(result).toBe(body);
      expect(requestedUrls()).toEqual([
        `${BASE}/api/v1/health`,
        `${BASE}/api/v1/stats`,
        `${BASE}/api/v1/system-info`,
        `${BASE}/live`,
        `${BASE}/api/v1/models`,
      ]);
      expect(requestedMethods()).toEqual(["GET", "GET", "GET", "GET", "GET"]);

      const content = lastContent(body);
      expect(content.startsWith("original\n\n```html")).toBe(true);
      expect(content).toContain('<span class="badge">Report</span>');
      for (const label of ["Health", "Stats", "System", "Live", "Models"]) {
        expect(content).toContain(`<span class="card-title">${label}</span>`);
      }
      expect(content).toContain("<pre>OK</pre>");
      expect(reportStatus.mock.calls).toEqual([
        ["Waiting for input...", false],
        ["Fetching System Overview...", false],
        ["Overview Ready", true],
      ]);
    });

    it("should keep the other cards when one endpoint fails", async () => {
      const { [`${BASE}/api/v1/stats`]: _stats, ...rest } = overviewRoutes;
      serve(rest);
      const { host } = createHost([""]);
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body, { host });

      const content = lastContent(body);
      expect(mockFetch).toHaveBeenCalledTimes(5);
      expect(content).toContain("<pre>Error: fetch failed (connect ECONNREFUSED)</pre>");
      expect(content.match(/indicator ok/g)).toHaveLength(4);
      expect(content.match(/indicator error/g)).toHaveLength(1);
    });

    it("should run the overview when the host cannot prompt", async () => {
      serve(overviewRoutes);
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body);

      expect(mockFetch).toHaveBeenCalledTimes(5);
      expect(lastContent(body)).toContain("System Overview");
    });

    it("should leave a body without messages untouched", async () => {
      serve(overviewRoutes);
      const body: ChatBody = { model: "lemonade" };

      await createControlPanel(config, { logger }).run(body, { host: createHost([""]).host });

      expect(body).toEqual({ model: "lemonade" });
    });
  });

  describe("pull", () => {
    it("should list all models, then post the chosen one with a long timeout", async () => {
      const timeout = jest.spyOn(AbortSignal, "timeout");
      serve({
        [`${BASE}/api/v1/models?show_all=true`]: () => json(MODELS),
        [`${BASE}/api/v1/pull`]: () => json({ status: "success" }),
      });
      const { host, prompts, notify } = createHost(["pull", "  Qwen3-0.6B-GGUF "]);
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body, { host });

      expect(requestedUrls()).toEqual([
        `${BASE}/api/v1/models?show_all=true`,
        `${BASE}/api/v1/pull`,
      ]);
      expect(requestedMethods()).toEqual(["GET", "POST"]);
      expect(mockFetch.mock.calls[1][1]?.body).toBe('{"model_name":"Qwen3-0.6B-GGUF"}');
      expect(timeout.mock.calls).toEqual([[5000], [1_800_000]]);

      expect(prompts[1]).toEqual({
        title: "Pull Model",
        message:
          "Available Models to Download:\n\n" +
          "• Qwen3-0.6B-GGUF (0.38GB) [DL]\n" +
          "• Llama-3.2-1B-Instruct-Hybrid (1.2GB)\n\n" +
          "Enter ID to pull:",
        placeholder: "Qwen3-14B-GGUF",
      });
      expect(lastContent(body)).toContain('<span class="badge">pull</span>');
      expect(lastContent(body)).toContain("Response · Status: 200");
      expect(notify).toHaveBeenCalledWith("Request completed (200)", "success");
    });

    it("should make no request after the model prompt is cancelled", async () => {
      serve({ [`${BASE}/api/v1/models?show_all=true`]: () => json(MODELS) });
      const { host, reportStatus } = createHost(["pull", null]);
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body, { host });

      expect(requestedMethods()).toEqual(["GET"]);
      expect(body).toEqual(chatBody());
      expect(reportStatus).toHaveBeenLastCalledWith("Cancelled", true);
    });

    it("should still prompt when the model list cannot be fetched", async () => {
      serve({
        [`${BASE}/api/v1/models?show_all=true`]: () => new Response("down", { status: 500 }),
      });
      const { host, prompts } = createHost(["pull", ""]);

      await createControlPanel(config, { logger }).run(chatBody(), { host });

      expect(prompts[1].message).toBe(
        "Available Models to Download:\n\nError fetching list: 500\n\nEnter ID to pull:",
      );
    });
    it("should report an unreachable model list without prompting", async () => {
      serve({});
      const { host, prompts, notify, reportStatus } = createHost(["pull"]);
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body, { host });

      expect(requestedMethods()).toEqual(["GET"]);
      expect(prompts).toHaveLength(1);
      expect(lastContent(body)).toContain(
        '<pre class="error">Failed to list models: fetch failed (connect ECONNREFUSED)</pre>',
      );
      expect(notify).toHaveBeenCalledWith(
        "Failed to list models: fetch failed (connect ECONNREFUSED)",
        "error",
      );
      expect(notify).not.toHaveBeenCalledWith("Connection Failed", "error");
      expect(reportStatus).toHaveBeenLastCalledWith("Done", true);
    });
  });

  describe("delete", () => {
    it("should list installed models and post with the delete timeout", async () => {
      const timeout = jest.spyOn(AbortSignal, "timeout");
      serve({
        [`${BASE}/api/v1/models`]: () => json(MODELS),
        [`${BASE}/api/v1/delete`]: () => json({ status: "success" }),
      });
      const { host, prompts } = createHost(["delete", "Qwen3-0.6B-GGUF"]);

      await createControlPanel(config, { logger }).run(chatBody(), { host });

      expect(requestedUrls()).toEqual([`${BASE}/api/v1/models`, `${BASE}/api/v1/delete`]);
      expect(prompts[1].title).toBe("Delete Model");
      expect(prompts[1].message.startsWith("Installed Models:\n\n")).toBe(true);
      expect(timeout.mock.calls).toEqual([[5000], [180_000]]);
    });
  });

  describe("direct commands", () => {
    it("should GET a routed endpoint and render the response", async () => {
      serve({ [`${BASE}/api/v1/system-info`]: () => json({ Processor: "Test CPU" }) });
      const { host, notify, reportStatus } = createHost(["System"]);
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body, { host });

      expect(requestedUrls()).toEqual([`${BASE}/api/v1/system-info`]);
      const content = lastContent(body);
      expect(content).toContain('<span class="badge">system</span>');
      expect(content).toContain('<span class="card-title">Response · Status: 200</span>');
      expect(content).toContain("&quot;Processor&quot;: &quot;Test CPU&quot;");
      expect(notify).toHaveBeenCalledWith("Request completed (200)", "success");
      expect(reportStatus).toHaveBeenCalledWith("Executing system...", false);
      expect(reportStatus).toHaveBeenLastCalledWith("Done", true);
    });

    it("should pass unknown commands through and report error statuses", async () => {
      serve({ [`${BASE}/api/v1/load`]: () => json({ detail: "Not Found" }, 404) });
      const { host, notify } = createHost(["load"]);
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body, { host });

      expect(lastContent(body)).toContain("Response · Status: 404");
      expect(notify).toHaveBeenCalledWith("Request completed (404)", "warning");
    });

    it("should render an error panel when the server is unreachable", async () => {
      serve({});
      const { host, notify, reportStatus } = createHost(["health"]);
      const body = chatBody();

      await expect(
        createControlPanel(config, { logger }).run(body, { host }),
      ).resolves.toBe(body);

      const content = lastContent(body);
      expect(content).toContain('<span class="badge">Fail</span>');
      expect(content).toContain(
        '<pre class="error">fetch failed (connect ECONNREFUSED)</pre>',
      );
      expect(notify).toHaveBeenCalledWith("Connection Failed", "error");
      expect(reportStatus).toHaveBeenLastCalledWith("Done", true);
    });
  });

  describe("invalid config", () => {
    it("should resolve with an error panel when the client cannot be built", async () => {
      const { host, notify, reportStatus } = createHost(["health"]);
      const body = chatBody();

      await expect(
        createControlPanel({ baseUrl: BASE, timeoutSeconds: 0 }, { logger }).run(body, {
          host,
        }),
      ).resolves.toBe(body);

      expect(mockFetch).not.toHaveBeenCalled();
      expect(lastContent(body)).toContain(
        '<pre class="error">Timeout must be a positive number of milliseconds.</pre>',
      );
      expect(notify).toHaveBeenCalledWith("Connection Failed", "error");
      expect(reportStatus).toHaveBeenLastCalledWith("Done", true);
    });
  });

  describe("input errors", () => {
    it("should notify and stop when the command prompt fails", async () => {
      const notify = jest.fn<NonNullable<HostCapabilities["notify"]>>();
      const host: HostCapabilities = {
        notify,
        promptForText: async () => {
          throw new Error("dialog closed");
        },
      };
      const body = chatBody();

      await createControlPanel(config, { logger }).run(body, { host });

      expect(mockFetch).not.toHaveBeenCalled();
      expect(notify).toHaveBeenCalledWith("Input error: dialog closed", "error");
      expect(body).toEqual(chatBody());
    });
  });

  describe("admin panel", () => {
    const localConfig = createConfig({ baseUrl: "http://localhost:8000", timeoutSeconds: 5 });
    const DOCKER = "http://host.docker.internal:8000";

    it("should refuse users without the admin role", async () => {
      const { host, notify } = createHost([""]);
      const body = chatBody();

      await createAdminPanel(localConfig, { logger }).run(body, {
        host,
        user: { role: "user" },
      });

      expect(mockFetch).not.toHaveBeenCalled();
      expect(notify).toHaveBeenCalledWith(
        "Only administrators can use the Lemonade panel.",
        "error",
      );
      expect(body).toEqual(chatBody());
    });

    it("should refuse callers without a user", async () => {
      const { host, notify, reportStatus } = createHost([""]);
      const body = chatBody();

      await createAdminPanel(localConfig, { logger }).run(body, { host });

      expect(mockFetch).not.toHaveBeenCalled();
      expect(notify).toHaveBeenCalledWith(
        "Only administrators can use the Lemonade panel.",
        "error",
      );
      expect(reportStatus).not.toHaveBeenCalled();
      expect(body).toEqual(chatBody());
    });

    it("should fall back to the docker host for the overview", async () => {
      serve({
        [`${DOCKER}/api/v1/health`]: () => json({ status: "ok", model_loaded: null }),
        [`${DOCKER}/api/v1/stats`]: () => json({ tokens_per_second: 12.5 }),
        [`${DOCKER}/api/v1/system-info`]: () => json({ Processor: "Test CPU" }),
        [`${DOCKER}/api/v1/models`]: () => json(MODELS),
      });
      const { host } = createHost([""]);
      const body = chatBody();

      await createAdminPanel(localConfig, { logger }).run(body, {
        host,
        user: { role: "admin" },
      });

      expect(mockFetch).toHaveBeenCalledTimes(8);
      expect(requestedUrls().filter((url) => url.includes("/live"))).toEqual([]);

      const content = lastContent(body);
      expect(content.match(/indicator ok/g)).toHaveLength(4);
      expect(content).toContain("<dt>Loaded model</dt><dd>none</dd>");
      expect(content).toContain("<dt>Tokens/s</dt><dd>12.50</dd>");
      expect(content).toContain("<dt>Models</dt><dd>2 listed, 1 downloaded</dd>");
      expect(content).toContain(
        "<dt>http://localhost:8000</dt><dd>failed (4 attempts, 4 failures, last error: fetch failed (connect ECONNREFUSED))</dd>",
      );
      expect(content).toContain(
        `<dt>${DOCKER}</dt><dd>answered (4 attempts, 0 failures)</dd>`,
      );
    });

    it("should name the host that served a direct command", async () => {
      serve({
        "http://localhost:8000/api/v1/health": () => new Response("bad gateway", { status: 502 }),
        [`${DOCKER}/api/v1/health`]: () => json({ status: "ok" }),
      });
      const { host } = createHost(["health"]);
      const body = chatBody();

      await createAdminPanel(localConfig, { logger }).run(body, {
        host,
        user: { role: "admin" },
      });

      expect(lastContent(body)).toContain(`Response · Status: 200 via ${DOCKER}`);
    });
  });
});
