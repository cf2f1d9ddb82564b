/**
 * Instance registry: catalog of backend types plus the live named instances.
 */

import { createLogger } from "../utils/logger.js";
import type { Backend, BackendFactory } from "./backend.js";
import { BackendConfig, type ConfigValues } from "./backend-config.js";
import type { Message } from "./message.js";
import {
  DuplicateInstanceError,
  DuplicateTypeError,
  InstanceNotFoundError,
  UnknownTypeError,
} from "./errors.js";

const log = createLogger("registry");

/** A live, named binding of a backend, its configuration and its history. */
export interface ModelInstance {
  readonly id: string;
  readonly type: string;
  readonly backend: Backend;
  readonly config: BackendConfig;
  /** Frozen snapshot of the history; read again to see later rounds. */
  readonly context: readonly Message[];
}

/**
 * Manages backend types and their instances
 *
 * @example
 * ```typescript
 * const registry = new InstanceRegistry();
 * registry.registerBackendType("echo", (config) => new EchoBackend(config));
 * registry.instantiate("a", "echo", { prefix: "ECHO:" });
 *
 * registry.listInstances(); // ["a"]
 * registry.remove("a");
 * ```
 */
export class InstanceRegistry {
  private catalog = new Map<string, BackendFactory>();
  private instances = new Map<string, ModelInstance>();
  /** Keyed by instance so removed instances keep a (cleared) history. */
  private histories = new WeakMap<ModelInstance, Message[]>();

  registerBackendType(name: string, factory: BackendFactory): void {
    if (this.catalog.has(name)) {
      throw new DuplicateTypeError(name);
    }
    this.catalog.set(name, factory);
    log.debug(`Registered backend type: ${name}`);
  }

  /**
   * Create a new instance of a registered backend type.
   *
   * @throws UnknownTypeError if the type is not registered
   * @throws DuplicateInstanceError if `id` is already live
   */
  instantiate(
    id: string,
    typeName: string,
    config: BackendConfig | ConfigValues = {},
  ): ModelInstance {
    const factory = this.catalog.get(typeName);
    if (!factory) {
      throw new UnknownTypeError(typeName);
    }
    if (this.instances.has(id)) {
      throw new DuplicateInstanceError(id);
    }

    const backendConfig = new BackendConfig(
      config instanceof BackendConfig ? config.toDict() : config,
    );
    const history: Message[] = [];
    const instance: ModelInstance = {
      id,
      type: typeName,
      backend: factory(backendConfig),
      config: backendConfig,
      get context() {
        return Object.freeze([...history]);
      },
    };
    this.histories.set(instance, history);
    this.instances.set(id, instance);
    log.info(`Instantiated ${typeName} as '${id}'`);
    return instance;
  }

  /** Clear the instance's history and drop it. Absent ids are ignored. */
  remove(id: string): boolean {
    const instance = this.instances.get(id);
    if (!instance) {
      return false;
    }
    this.historyOf(instance).length = 0;
    this.instances.delete(id);
    log.info(`Removed instance '${id}'`);
    return true;
  }

  resolve(id: string): ModelInstance {
    const instance = this.instances.get(id);
    if (!instance) {
      throw new InstanceNotFoundError(id);
    }
    return instance;
  }

  has(id: string): boolean {
    return this.instances.has(id);
  }

  listTypes(): string[] {
    return Array.from(this.catalog.keys());
  }

  listInstances(): string[] {
    return Array.from(this.instances.keys());
  }

  /** Copy of the instance's history. */
  getContext(id: string): Message[] {
    return [...this.historyOf(this.resolve(id))];
  }

  /**
   * Append messages to an instance's history in one step. Takes the instance
   * rather than its id so a round that outlives `remove` still has a target.
   */
  appendToContext(instance: ModelInstance, ...messages: Message[]): void {
    this.historyOf(instance).push(...messages);
  }

  resetContext(id: string): void {
    this.historyOf(this.resolve(id)).length = 0;
    log.debug(`Reset context of '${id}'`);
  }

  /** Merge values into the instance's configuration; backends see them on their next call. */
  updateConfig(id: string, patch: ConfigValues): void {
    this.resolve(id).config.update(patch);
    log.debug(`Updated config of '${id}': ${Object.keys(patch).join(", ")}`);
  }

  private historyOf(instance: ModelInstance): Message[] {
    const history = this.histories.get(instance);
    if (!history) {
      throw new InstanceNotFoundError(instance.id);
    }
    return history;
  }
}
