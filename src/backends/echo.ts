/**
 * Offline backend: replies with a prefix plus the last message's content.
 * Useful for trying a config without network access.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Backend } from "../hub/backend.js";
import type { BackendConfig } from "../hub/backend-config.js";
import type { Message } from "../hub/message.js";

export const DEFAULT_ECHO_PREFIX = "ECHO:";

export class EchoBackend implements Backend {
  constructor(private config: BackendConfig) {}

  async generate(messages: readonly Message[]): Promise<string> {
    const delayMs = this.config.getNumber("delayMs", 0);
    if (delayMs > 0) {
      await sleep(delayMs);
    }
    const last = messages[messages.length - 1];
    return `${this.config.getString("prefix", DEFAULT_ECHO_PREFIX)}${last?.content ?? ""}`;
  }
}
