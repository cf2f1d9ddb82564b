/**
 * Backend capability contract
 */

import type { Message } from "./message.js";
import type { BackendConfig } from "./backend-config.js";

/**
 * A concrete integration with one conversational-model provider.
 *
 * `generate` receives the full ordered context for a single request and
 * resolves with the reply text. It may reject for any external reason
 * (network, non-2xx status, malformed payload); callers normalize the
 * rejection to a BackendError.
 */
export interface Backend {
  generate(messages: readonly Message[]): Promise<string>;
}

/** Builds a backend bound to its instance's configuration. */
export type BackendFactory = (config: BackendConfig) => Backend;
