/**
 * Prompt dispatch against one or many instances
 *
 * A round is: resolve -> snapshot context -> generate -> record. The backend
 * call is the only await; everything around it runs synchronously, so each
 * round's appends to a live context land together.
 *
 * Two rounds in flight against the same instance append in completion order.
 * An instance removed mid-round still finishes the call, but its appends go
 * to the detached instance and are not visible through the registry.
 */

import { createLogger } from "../utils/logger.js";
import { createMessage } from "./message.js";
import { HubError, HubErrorCode, toBackendError } from "./errors.js";
import type { InstanceRegistry } from "./registry.js";

const log = createLogger("dispatcher");

export interface DispatchOptions {
  /** Role of the prompt message. Default "user". */
  role?: string;
  /** Record the round in the live history. Default false. */
  saveContext?: boolean;
  /**
   * Send the prompt as the last message of the request. Default false.
   * The prompt is only recorded when this and `saveContext` are both set.
   */
  appendPromptBeforeCall?: boolean;
}

export type DispatchOutcome =
  | { id: string; ok: true; response: string }
  | { id: string; ok: false; error: string; code: HubErrorCode };

export class Dispatcher {
  constructor(private registry: InstanceRegistry) {}

  async dispatchOne(id: string, prompt: string, options: DispatchOptions = {}): Promise<string> {
    const { role = "user", saveContext = false, appendPromptBeforeCall = false } = options;

    const instance = this.registry.resolve(id);

    const working = [...instance.context];
    if (appendPromptBeforeCall) {
      working.push(createMessage(role, prompt));
    }

    log.debug(`Dispatching to '${id}' with ${working.length} message(s)`);

    let response: string;
    try {
      response = await instance.backend.generate(working);
    } catch (err) {
      throw toBackendError(err, id);
    }

    if (saveContext) {
      if (appendPromptBeforeCall) {
        this.registry.appendToContext(
          instance,
          createMessage(role, prompt),
          createMessage("assistant", response),
        );
      } else {
        this.registry.appendToContext(instance, createMessage("assistant", response));
      }
    }

    return response;
  }

  /**
   * Send the same prompt to every id concurrently and wait for all of them.
   *
   * Never rejects because of a target: each failure (backend error or unknown
   * id) is reported as an `ok: false` outcome. Duplicate ids are dispatched
   * once per occurrence; the map keeps the last occurrence's outcome.
   */
  async dispatchMany(
    ids: readonly string[],
    prompt: string,
    options: DispatchOptions = {},
  ): Promise<Map<string, DispatchOutcome>> {
    log.info(`Fanning out to ${ids.length} instance(s): ${ids.join(", ")}`);

    const settled = await Promise.allSettled(
      ids.map((id) => this.dispatchOne(id, prompt, options)),
    );

    const results = new Map<string, DispatchOutcome>();
    settled.forEach((result, index) => {
      const id = ids[index];
      if (id === undefined) return;
      if (result.status === "fulfilled") {
        results.set(id, { id, ok: true, response: result.value });
        return;
      }
      const err: unknown = result.reason;
      const code = err instanceof HubError ? err.code : HubErrorCode.BACKEND_FAILED;
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Instance '${id}' failed: ${message}`);
      results.set(id, { id, ok: false, error: message, code });
    });

    return results;
  }
}

/** One-line rendering of an outcome: the reply, or `ERROR: <message>`. */
export function formatOutcome(outcome: DispatchOutcome): string {
  return outcome.ok ? outcome.response : `ERROR: ${outcome.error}`;
}
