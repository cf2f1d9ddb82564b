/**
 * Wire a loaded config into a ready-to-use registry, dispatcher and reporter.
 */

import { registerBuiltinBackends } from "./backends/index.js";
import { Dispatcher } from "./hub/dispatcher.js";
import { HistoryReporter } from "./hub/history.js";
import { InstanceRegistry } from "./hub/registry.js";
import type { Config, DispatchDefaults } from "./config/schema.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("bootstrap");

export interface Hub {
  registry: InstanceRegistry;
  dispatcher: Dispatcher;
  reporter: HistoryReporter;
  defaults: DispatchDefaults;
}

export interface CreateHubOptions {
  /** Register extra backend types before instances are created. */
  setup?: (registry: InstanceRegistry) => void;
}

export function createHub(config: Config, options: CreateHubOptions = {}): Hub {
  const registry = new InstanceRegistry();
  registerBuiltinBackends(registry);
  options.setup?.(registry);

  for (const instance of config.instances) {
    registry.instantiate(instance.id, instance.type, instance.config);
  }
  log.info(`Hub ready with ${config.instances.length} instance(s)`);

  return {
    registry,
    dispatcher: new Dispatcher(registry),
    reporter: new HistoryReporter(registry),
    defaults: config.defaults,
  };
}
