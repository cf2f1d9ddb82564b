/**
 * Command bodies behind the `modelhub` CLI.
 *
 * Each takes a built Hub (or registry) plus an IO sink and returns an exit
 * code, so they run the same under commander and in tests.
 */

import type { Hub } from "../bootstrap.js";
import type { InstanceRegistry } from "../hub/registry.js";
import { formatOutcome, type DispatchOptions, type DispatchOutcome } from "../hub/dispatcher.js";

export interface CliIO {
  print: (msg: string) => void;
  error: (msg: string) => void;
}

export function createDefaultIO(): CliIO {
  return {
    print: (msg) => console.log(msg),
    error: (msg) => console.error(msg),
  };
}

export interface AskOptions {
  /** Target instance ids; all configured instances when empty. */
  instances?: string[];
  role?: string;
  /** Overrides `defaults.saveContext` when set, including to false. */
  saveContext?: boolean;
  /** Overrides `defaults.appendPromptBeforeCall` when set, including to false. */
  appendPrompt?: boolean;
  /** Print the targets' transcripts after the round. */
  history?: boolean;
}

export function runTypes(registry: InstanceRegistry, io: CliIO): number {
  for (const name of registry.listTypes()) {
    io.print(name);
  }
  return 0;
}

export function runInstances(hub: Hub, io: CliIO): number {
  const ids = hub.registry.listInstances();
  if (ids.length === 0) {
    io.error("No instances configured");
    return 1;
  }
  for (const id of ids) {
    io.print(`${id} (${hub.registry.resolve(id).type})`);
  }
  return 0;
}

function selectTargets(hub: Hub, requested: string[] | undefined): string[] {
  return requested && requested.length > 0 ? requested : hub.registry.listInstances();
}

function printOutcomes(outcomes: Iterable<DispatchOutcome>, io: CliIO): boolean {
  let failed = false;
  for (const outcome of outcomes) {
    io.print(`[${outcome.id}] ${formatOutcome(outcome)}`);
    if (!outcome.ok) failed = true;
  }
  return failed;
}

function printTranscripts(hub: Hub, ids: string[], io: CliIO): void {
  const live = [...new Set(ids)].filter((id) => hub.registry.has(id));
  live.forEach((id, index) => {
    if (index > 0) io.print("");
    for (const line of hub.reporter.formatTranscript(id)) {
      io.print(line);
    }
  });
}

export async function runAsk(
  hub: Hub,
  prompt: string,
  options: AskOptions,
  io: CliIO,
): Promise<number> {
  const targets = selectTargets(hub, options.instances);
  if (targets.length === 0) {
    io.error("No instances configured");
    return 1;
  }

  const dispatchOptions: DispatchOptions = {
    role: options.role ?? hub.defaults.role,
    saveContext: options.saveContext ?? hub.defaults.saveContext,
    appendPromptBeforeCall: options.appendPrompt ?? hub.defaults.appendPromptBeforeCall,
  };

  const results = await hub.dispatcher.dispatchMany(targets, prompt, dispatchOptions);
  const failed = printOutcomes(results.values(), io);

  if (options.history) {
    io.print("");
    printTranscripts(hub, targets, io);
  }

  return failed ? 1 : 0;
}

/**
 * Line-oriented conversation with every target at once. Rounds always
 * record both the prompt and the replies.
 *
 * Commands: /history, /reset, /exit
 */
export async function runChat(
  hub: Hub,
  lines: AsyncIterable<string>,
  options: Pick<AskOptions, "instances" | "role">,
  io: CliIO,
): Promise<number> {
  const targets = selectTargets(hub, options.instances);
  if (targets.length === 0) {
    io.error("No instances configured");
    return 1;
  }

  const dispatchOptions: DispatchOptions = {
    role: options.role ?? hub.defaults.role,
    saveContext: true,
    appendPromptBeforeCall: true,
  };

  io.print(`Chatting with ${targets.join(", ")}. Type /exit to quit.`);

  for await (const line of lines) {
    const input = line.trim();
    if (input === "") continue;

    if (input === "/exit") break;
    if (input === "/history") {
      printTranscripts(hub, targets, io);
      continue;
    }
    if (input === "/reset") {
      for (const id of new Set(targets)) {
        if (hub.registry.has(id)) hub.registry.resetContext(id);
      }
      io.print("History cleared");
      continue;
    }

    const results = await hub.dispatcher.dispatchMany(targets, input, dispatchOptions);
    printOutcomes(results.values(), io);
  }

  return 0;
}
