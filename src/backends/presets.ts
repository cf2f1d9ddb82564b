/**
 * Hosted OpenAI-compatible providers with their endpoint defaults.
 */

import type { BackendFactory } from "../hub/backend.js";
import { OpenAICompatibleBackend, type EndpointDefaults } from "./openai-compatible.js";

export const OPENROUTER_DEFAULTS: EndpointDefaults = {
  baseUrl: "https://openrouter.ai/api/v1",
  model: "openai/gpt-4o-mini",
};

export const TOGETHER_DEFAULTS: EndpointDefaults = {
  baseUrl: "https://api.together.xyz/v1",
  model: "mistralai/Mixtral-8x7B-Instruct-v0.1",
};

export const createOpenRouterBackend: BackendFactory = (config) =>
  new OpenAICompatibleBackend(config, OPENROUTER_DEFAULTS);

export const createTogetherBackend: BackendFactory = (config) =>
  new OpenAICompatibleBackend(config, TOGETHER_DEFAULTS);

export const createOpenAICompatibleBackend: BackendFactory = (config) =>
  new OpenAICompatibleBackend(config);
