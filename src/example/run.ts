import { createInterface } from "node:readline/promises";
import { createAdminPanel, createControlPanel } from "../action/panels.js";
import type { ChatBody, HostCapabilities } from "../action/types.js";
import { loadConfigFromEnv } from "../config.js";

// Usage: node dist/example/run.js [control|admin]
const variant = process.argv[2] === "admin" ? "admin" : "control";

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  const host: HostCapabilities = {
    reportStatus: (description, done) => {
      console.log(`${done ? "■" : "…"} ${description}`);
    },
    notify: (content, level) => {
      console.log(`[${level}] ${content}`);
    },
    promptForText: async (prompt) => {
      console.log(`\n${prompt.title}\n${prompt.message}`);
      return rl.question(`${prompt.placeholder ?? ""}> `);
    },
  };

  const action =
    variant === "admin" ? createAdminPanel(config) : createControlPanel(config);
  const body: ChatBody = { messages: [{ role: "assistant", content: "" }] };

  console.log(`Lemonade ${variant} panel → ${config.baseUrl}`);

  try {
    await action.run(body, { host, user: { role: "admin" } });
  } finally {
    rl.close();
  }

  console.log(body.messages?.[0]?.content ?? "");
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
