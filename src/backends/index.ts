import type { InstanceRegistry } from "../hub/registry.js";
import { EchoBackend } from "./echo.js";
import {
  createOpenAICompatibleBackend,
  createOpenRouterBackend,
  createTogetherBackend,
} from "./presets.js";

export { EchoBackend, DEFAULT_ECHO_PREFIX } from "./echo.js";
export {
  OpenAICompatibleBackend,
  openAICompatibleComplete,
  readEndpointConfig,
  type OpenAICompatibleConfig,
} from "./openai-compatible.js";
export { OPENROUTER_DEFAULTS, TOGETHER_DEFAULTS } from "./presets.js";

export function registerBuiltinBackends(registry: InstanceRegistry): void {
  registry.registerBackendType("openai-compatible", createOpenAICompatibleBackend);
  registry.registerBackendType("openrouter", createOpenRouterBackend);
  registry.registerBackendType("together", createTogetherBackend);
  registry.registerBackendType("echo", (config) => new EchoBackend(config));
}
