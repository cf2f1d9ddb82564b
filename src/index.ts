export * from "./hub/index.js";
export {
  registerBuiltinBackends,
  EchoBackend,
  OpenAICompatibleBackend,
  openAICompatibleComplete,
  readEndpointConfig,
  OPENROUTER_DEFAULTS,
  TOGETHER_DEFAULTS,
  type OpenAICompatibleConfig,
} from "./backends/index.js";
export { createHub, type Hub, type CreateHubOptions } from "./bootstrap.js";
export { loadConfig, defaultConfigPath, API_KEY_ENV_VARS } from "./config/loader.js";
export type { Config, InstanceConfig, DispatchDefaults } from "./config/schema.js";
