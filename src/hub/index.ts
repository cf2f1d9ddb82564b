export { InstanceRegistry, type ModelInstance } from "./registry.js";
export { Dispatcher, formatOutcome, type DispatchOptions, type DispatchOutcome } from "./dispatcher.js";
export { HistoryReporter, type HistoryEntry, type InstanceHistory } from "./history.js";
export { BackendConfig, type ConfigValues } from "./backend-config.js";
export { createMessage, type Message } from "./message.js";
export type { Backend, BackendFactory } from "./backend.js";
export {
  HubError,
  HubErrorCode,
  DuplicateTypeError,
  UnknownTypeError,
  DuplicateInstanceError,
  InstanceNotFoundError,
  BackendError,
  HTTPError,
  TimeoutError,
  toBackendError,
} from "./errors.js";
