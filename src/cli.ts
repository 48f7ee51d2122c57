#!/usr/bin/env node
/**
 * Interactive chat with the tasks agent.
 *
 *   tasks-agent [--user <id>] [--stream]
 *
 * Reads configuration from the environment and a .env file.
 */

import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import { createTaskAgent, messageText } from "./agent.js";
import { isTaskAgentError } from "./errors.js";
import { loadConfig } from "./lib/config.js";

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      user: { type: "string", short: "u", default: "local-user" },
      stream: { type: "boolean", short: "s", default: false },
    },
  });
  const externalUserId = values.user ?? "local-user";

  const agent = createTaskAgent(loadConfig());
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  console.log(`Chatting as "${externalUserId}". Type "exit" to quit.`);
  try {
    for (;;) {
      const line = (await rl.question("> ")).trim();
      if (line === "exit" || line === "quit") break;
      if (!line) continue;

      if (values.stream) {
        for await (const delta of agent.stream(line, externalUserId)) {
          for (const message of delta.messages) {
            console.log(`[${delta.node}] ${messageText(message)}`);
          }
        }
      } else {
        console.log(await agent.invoke(line, externalUserId));
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  if (isTaskAgentError(error)) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
