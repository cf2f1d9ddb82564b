/**
 * Error taxonomy for the instance registry and dispatcher.
 *
 * Caller-input errors (duplicate/unknown type, duplicate/missing instance) are
 * thrown by the operation that detected them and are never retried.
 * BackendError covers every failure of a backend's `generate` call.
 */

export enum HubErrorCode {
  DUPLICATE_TYPE = "DUPLICATE_TYPE",
  UNKNOWN_TYPE = "UNKNOWN_TYPE",
  DUPLICATE_INSTANCE = "DUPLICATE_INSTANCE",
  INSTANCE_NOT_FOUND = "INSTANCE_NOT_FOUND",
  BACKEND_FAILED = "BACKEND_FAILED",
}

export class HubError extends Error {
  constructor(
    message: string,
    public code: HubErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HubError";
  }
}

export class DuplicateTypeError extends HubError {
  constructor(public typeName: string) {
    super(`Backend type '${typeName}' is already registered`, HubErrorCode.DUPLICATE_TYPE);
    this.name = "DuplicateTypeError";
  }
}

export class UnknownTypeError extends HubError {
  constructor(public typeName: string) {
    super(`Backend type '${typeName}' is not registered`, HubErrorCode.UNKNOWN_TYPE);
    this.name = "UnknownTypeError";
  }
}

export class DuplicateInstanceError extends HubError {
  constructor(public instanceId: string) {
    super(`Instance '${instanceId}' already exists`, HubErrorCode.DUPLICATE_INSTANCE);
    this.name = "DuplicateInstanceError";
  }
}

export class InstanceNotFoundError extends HubError {
  constructor(public instanceId: string) {
    super(`Instance '${instanceId}' not found`, HubErrorCode.INSTANCE_NOT_FOUND);
    this.name = "InstanceNotFoundError";
  }
}

export class BackendError extends HubError {
  /** Set by the dispatcher once the failing instance is known. */
  instanceId?: string;

  constructor(message: string, options?: { instanceId?: string; cause?: unknown }) {
    super(message, HubErrorCode.BACKEND_FAILED, { cause: options?.cause });
    this.name = "BackendError";
    this.instanceId = options?.instanceId;
  }
}

export class HTTPError extends BackendError {
  constructor(
    public status: number,
    message: string,
  ) {
    super(message);
    this.name = "HTTPError";
  }
}

export class TimeoutError extends BackendError {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Normalize anything a backend rejected with into a BackendError.
 *
 * An untagged BackendError is tagged with the instance id and returned as is.
 * One already tagged for another instance (a shared or cached error) is left
 * alone and wrapped, with the original as `cause`.
 */
export function toBackendError(err: unknown, instanceId: string): BackendError {
  if (err instanceof BackendError) {
    if (err.instanceId === undefined) {
      err.instanceId = instanceId;
    }
    if (err.instanceId === instanceId) {
      return err;
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return new BackendError(message, { instanceId, cause: err });
}
