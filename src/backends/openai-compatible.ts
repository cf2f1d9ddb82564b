/**
 * OpenAI v1 API Compatible Backend
 *
 * Supports any OpenAI-compatible chat completions endpoint (OpenRouter,
 * Together, Ollama, LM Studio, vLLM, Groq, etc.)
 */

import { createLogger } from "../utils/logger.js";
import type { Backend } from "../hub/backend.js";
import type { BackendConfig } from "../hub/backend-config.js";
import type { Message } from "../hub/message.js";
import { BackendError, HTTPError, TimeoutError } from "../hub/errors.js";

const log = createLogger("openai-compatible");

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type AuthType = "bearer" | "api-key" | "header" | "none";

export interface OpenAICompatibleConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  authType?: AuthType;
  authHeader?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/** Defaults a preset (OpenRouter, Together, ...) supplies for missing keys. */
export interface EndpointDefaults {
  baseUrl?: string;
  model?: string;
}

interface OpenAIMessage {
  role: string;
  content: string;
}

interface OpenAIRequest {
  model: string;
  messages: OpenAIMessage[];
  max_tokens: number;
  temperature?: number;
  stream: false;
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 512;
export const DEFAULT_TIMEOUT_MS = 120_000;

const AUTH_TYPES: readonly AuthType[] = ["bearer", "api-key", "header", "none"];

function isAuthType(value: string): value is AuthType {
  return AUTH_TYPES.some((t) => t === value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Request / Response shaping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolve the endpoint settings from an instance's configuration
 */
export function readEndpointConfig(
  config: BackendConfig,
  defaults: EndpointDefaults = {},
): OpenAICompatibleConfig {
  const baseUrl = config.getString("baseUrl") ?? defaults.baseUrl;
  const model = config.getString("model") ?? defaults.model;
  if (!baseUrl) {
    throw new BackendError("openai-compatible backend requires 'baseUrl' in its config");
  }
  if (!model) {
    throw new BackendError("openai-compatible backend requires 'model' in its config");
  }

  const authType = config.getString("authType", "bearer");
  if (!isAuthType(authType)) {
    throw new BackendError(`Unsupported authType '${authType}'`);
  }

  return {
    baseUrl,
    model,
    apiKey: config.getString("apiKey"),
    authType,
    authHeader: config.getString("authHeader"),
    temperature: config.getNumber("temperature", DEFAULT_TEMPERATURE),
    maxTokens: config.getNumber("maxTokens", DEFAULT_MAX_TOKENS),
    timeoutMs: config.getNumber("timeoutMs", DEFAULT_TIMEOUT_MS),
  };
}

export function chatCompletionsUrl(baseUrl: string): string {
  const normalized = baseUrl.replace(/\/+$/, "");
  return normalized.endsWith("/chat/completions")
    ? normalized
    : `${normalized}/chat/completions`;
}

export function buildHeaders(config: OpenAICompatibleConfig): Record<string, string> {
  const { apiKey, authType, authHeader } = config;
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  // Warn on suspicious auth configurations
  if (authType === "none" && apiKey && apiKey.trim() !== "") {
    log.warn("authType is 'none' but apiKey is set; apiKey will be ignored");
  }
  if (authType === "header" && (!authHeader || authHeader.trim() === "")) {
    log.warn("authType is 'header' but authHeader is empty");
  }

  if (apiKey && apiKey.trim() !== "") {
    switch (authType ?? "bearer") {
      case "bearer":
        headers["Authorization"] = `Bearer ${apiKey}`;
        break;
      case "api-key":
        headers["Authorization"] = `ApiKey ${apiKey}`;
        break;
      case "header":
        if (authHeader) headers[authHeader] = apiKey;
        break;
      case "none":
        break;
    }
  }

  return headers;
}

/**
 * Pull the reply text out of a chat completions payload
 */
export function extractContent(payload: unknown): string {
  if (typeof payload === "object" && payload !== null && "choices" in payload) {
    const { choices } = payload;
    if (Array.isArray(choices) && choices.length > 0) {
      const first: unknown = choices[0];
      if (typeof first === "object" && first !== null && "message" in first) {
        const { message } = first;
        if (typeof message === "object" && message !== null && "content" in message) {
          const { content } = message;
          if (typeof content === "string") return content;
          if (content === null) return "";
        }
      }
    }
  }
  throw new BackendError("Malformed response: missing choices[0].message.content");
}

async function readErrorMessage(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status}: ${response.statusText}`;
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    // Non-JSON error body, keep the status line
    return fallback;
  }
  if (typeof body === "object" && body !== null && "error" in body) {
    const { error } = body;
    if (
      typeof error === "object" &&
      error !== null &&
      "message" in error &&
      typeof error.message === "string" &&
      error.message !== ""
    ) {
      return `HTTP ${response.status}: ${error.message}`;
    }
  }
  return fallback;
}

// ─────────────────────────────────────────────────────────────────────────────
// API Client
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Make a request to an OpenAI-compatible chat completions endpoint
 */
export async function openAICompatibleComplete(
  config: OpenAICompatibleConfig,
  messages: readonly Message[],
): Promise<string> {
  const { model, timeoutMs = DEFAULT_TIMEOUT_MS } = config;
  const url = chatCompletionsUrl(config.baseUrl);

  const requestBody: OpenAIRequest = {
    model,
    messages: messages.map((m) => ({ role: m.role, content: m.content })),
    max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
    stream: false,
  };
  if (config.temperature !== undefined) {
    requestBody.temperature = config.temperature;
  }

  log.info(`Calling OpenAI-compatible endpoint: ${url} (model: ${model})`);
  log.debug(`Request body: ${JSON.stringify(requestBody, null, 2)}`);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: buildHeaders(config),
      body: JSON.stringify(requestBody),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorMessage = await readErrorMessage(response);
      log.error(`OpenAI-compatible API error: ${errorMessage}`);
      throw new HTTPError(response.status, errorMessage);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new BackendError("Malformed response: body is not JSON", { cause: err });
    }
    log.debug(`Response: ${JSON.stringify(data, null, 2)}`);

    return extractContent(data);
  } catch (err) {
    if (err instanceof BackendError) {
      throw err;
    }
    if (err instanceof Error && err.name === "AbortError") {
      log.error(`Request timeout after ${timeoutMs}ms`);
      throw new TimeoutError(`Request timed out after ${timeoutMs}ms`);
    }
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Network error: ${message}`);
    throw new BackendError(`Network error: ${message}`, { cause: err });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Backend over an OpenAI-compatible endpoint. Settings are read from the
 * instance config on every call, so config updates apply to the next request.
 */
export class OpenAICompatibleBackend implements Backend {
  constructor(
    private config: BackendConfig,
    private defaults: EndpointDefaults = {},
  ) {}

  async generate(messages: readonly Message[]): Promise<string> {
    return openAICompatibleComplete(readEndpointConfig(this.config, this.defaults), messages);
  }
}
