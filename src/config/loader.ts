/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { resolve, dirname, join } from "node:path";
import { ZodError } from "zod";
import { configSchema, secretsSchema, type Config, type Secrets } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { expandEnvVarsDeep } from "./expand-env.js";

const log = createLogger("config");

export type Env = Record<string, string | undefined>;

/** Env var consulted for `apiKey: secrets` / `apiKey: env`, per backend type. */
export const API_KEY_ENV_VARS: Record<string, string> = {
  "openai-compatible": "OPENAI_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
  together: "TOGETHER_API_KEY",
};

export function defaultConfigPath(env: Env = process.env): string {
  return env.MODELHUB_CONFIG_PATH ?? "modelhub.yaml";
}

function expandHome(path: string, env: Env): string {
  // - "~/x" => "$HOME/x"
  // - "~"   => "$HOME"
  const home = env.HOME ?? env.USERPROFILE ?? ".";
  if (path === "~") return home;
  return path.startsWith("~/") ? resolve(home, path.slice(2)) : path;
}

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

export async function loadConfig(path: string, env: Env = process.env): Promise<Config> {
  const expandedPath = expandHome(path, env);
  log.info(`Loading config from ${expandedPath}`);

  const content = await readOptionalFile(expandedPath);
  if (content === null) {
    throw new Error(`Config file not found: ${expandedPath}`);
  }
  const raw: unknown = parse(content);

  // Optional secrets beside the config: <configDir>/secrets.yaml
  const secretsPath = join(dirname(resolve(expandedPath)), "secrets.yaml");
  const secretsContent = await readOptionalFile(secretsPath);
  const secrets = secretsContent === null ? {} : parseSecrets(secretsContent, env);

  let config: Config;
  try {
    config = configSchema.parse(expandEnvVarsDeep(raw ?? {}, env));
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(formatZodError(err, "Config"));
    }
    throw err;
  }

  resolveApiKeys(config, secrets, env);

  log.info(`Config loaded: ${config.instances.length} instance(s)`);
  return config;
}

function parseSecrets(content: string, env: Env): Secrets {
  const raw: unknown = parse(content);
  try {
    return secretsSchema.parse(expandEnvVarsDeep(raw ?? {}, env));
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(formatZodError(err, "Secrets"));
    }
    throw err;
  }
}

/**
 * Resolve `apiKey` placeholders in each instance config.
 * - "secrets": secrets[id].apiKey, then secrets[type].apiKey, then the type's env var
 * - "env": the type's env var only
 * Any other value is kept as given.
 */
export function resolveApiKeys(config: Config, secrets: Secrets, env: Env): void {
  for (const instance of config.instances) {
    const mode = instance.config.apiKey;
    if (mode !== "secrets" && mode !== "env") continue;

    const envVar = API_KEY_ENV_VARS[instance.type];
    const fromEnv = envVar ? env[envVar] : undefined;
    const resolved =
      mode === "secrets"
        ? (secrets[instance.id]?.apiKey ?? secrets[instance.type]?.apiKey ?? fromEnv)
        : fromEnv;

    if (resolved === undefined) {
      log.warn(
        `No API key found for '${instance.id}' (apiKey: ${mode})` +
          (envVar ? `; set ${envVar}` : ""),
      );
      delete instance.config.apiKey;
    } else {
      instance.config.apiKey = resolved;
    }
  }
}

export function formatZodError(error: ZodError, label: string): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `${label} validation failed:\n${lines.join("\n")}`;
}
