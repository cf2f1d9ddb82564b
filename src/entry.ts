#!/usr/bin/env node
/**
 * modelhub entry point
 */

import { program } from "commander";
import { join, dirname } from "node:path";
import { readFileSync } from "node:fs";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { loadConfig, defaultConfigPath } from "./config/loader.js";
import { createHub, type Hub } from "./bootstrap.js";
import { registerBuiltinBackends } from "./backends/index.js";
import { InstanceRegistry } from "./hub/registry.js";
import { createDefaultIO, runAsk, runChat, runInstances, runTypes } from "./cli/commands.js";
import { logger } from "./utils/logger.js";

const log = logger;

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")) as {
  name: string;
  version: string;
};

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  log.error(
    `Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`
  );
  process.exit(1);
}

async function loadHub(configPath: string): Promise<Hub> {
  return createHub(await loadConfig(configPath));
}

/** Run a command body, turning thrown errors into a logged exit code 1. */
async function run(body: () => Promise<number> | number): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

const configOption = [
  "-c, --config <path>",
  "Config file path (default: $MODELHUB_CONFIG_PATH or ./modelhub.yaml)",
  defaultConfigPath(),
] as const;

program
  .name("modelhub")
  .description("Send prompts to several chat-model backends at once")
  .version(pkg.version);

program
  .command("types")
  .description("List the backend types that instances can use")
  .action(async () => {
    await run(() => {
      const registry = new InstanceRegistry();
      registerBuiltinBackends(registry);
      return runTypes(registry, createDefaultIO());
    });
  });

program
  .command("instances")
  .description("List configured instances")
  .option(...configOption)
  .action(async (options: { config: string }) => {
    await run(async () => runInstances(await loadHub(options.config), createDefaultIO()));
  });

program
  .command("ask")
  .description("Send one prompt to the selected instances concurrently")
  .argument("<prompt...>", "Prompt text")
  .option(...configOption)
  .option("-i, --instance <ids...>", "Instance ids to target (default: all)")
  .option("-r, --role <role>", "Role of the prompt message")
  .option("--save-context", "Record the round in each instance's history")
  .option("--no-save-context", "Do not record the round, whatever the config default")
  .option("--append-prompt", "Send the prompt as the last message of the request")
  .option("--no-append-prompt", "Do not send the prompt, whatever the config default")
  .option("--history", "Print the transcripts after the round")
  .action(
    async (
      words: string[],
      options: {
        config: string;
        instance?: string[];
        role?: string;
        saveContext?: boolean;
        appendPrompt?: boolean;
        history?: boolean;
      },
    ) => {
      await run(async () => {
        const hub = await loadHub(options.config);
        return runAsk(
          hub,
          words.join(" "),
          {
            instances: options.instance,
            role: options.role,
            saveContext: options.saveContext,
            appendPrompt: options.appendPrompt,
            history: options.history,
          },
          createDefaultIO(),
        );
      });
    },
  );

program
  .command("chat")
  .description("Converse with the selected instances line by line")
  .option(...configOption)
  .option("-i, --instance <ids...>", "Instance ids to target (default: all)")
  .option("-r, --role <role>", "Role of the prompt messages")
  .action(async (options: { config: string; instance?: string[]; role?: string }) => {
    await run(async () => {
      const hub = await loadHub(options.config);
      const rl = createInterface({ input: process.stdin, terminal: false });
      try {
        return await runChat(
          hub,
          rl,
          { instances: options.instance, role: options.role },
          createDefaultIO(),
        );
      } finally {
        rl.close();
      }
    });
  });

await program.parseAsync();
