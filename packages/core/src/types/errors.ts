// Error types and Result monad for explicit error handling

export type Result<T, E = CrawlwiseError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export class CrawlwiseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "CrawlwiseError";
  }
}

export class ConfigError extends CrawlwiseError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export class ModelServiceError extends CrawlwiseError {
  constructor(
    message: string,
    public readonly providerCode?: string,
    cause?: unknown,
  ) {
    super(message, "MODEL_SERVICE_ERROR", cause);
    this.name = "ModelServiceError";
  }
}

export class InvalidDescriptorError extends CrawlwiseError {
  constructor(message: string) {
    super(message, "INVALID_DESCRIPTOR");
    this.name = "InvalidDescriptorError";
  }
}

export class DuplicateCapabilityError extends CrawlwiseError {
  constructor(public readonly capability: string) {
    super(`Capability "${capability}" is already registered`, "DUPLICATE_CAPABILITY");
    this.name = "DuplicateCapabilityError";
  }
}

export class UnknownCapabilityError extends CrawlwiseError {
  constructor(
    public readonly capability: string,
    available: readonly string[],
  ) {
    super(
      `Unknown capability "${capability}". Available capabilities: ${available.join(", ") || "(none)"}`,
      "UNKNOWN_CAPABILITY",
    );
    this.name = "UnknownCapabilityError";
  }
}

/** A payload that does not match the capability's declared parameters. */
export class ArgumentShapeError extends CrawlwiseError {
  constructor(
    public readonly capability: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid arguments for "${capability}": ${issues.join("; ")}`, "ARGUMENT_SHAPE");
    this.name = "ArgumentShapeError";
  }
}

/** The capability's implementation raised while running. */
export class InvocationFailure extends CrawlwiseError {
  constructor(
    public readonly capability: string,
    cause: unknown,
  ) {
    super(
      `Capability "${capability}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      "INVOCATION_FAILURE",
      cause,
    );
    this.name = "InvocationFailure";
  }
}

/** The model broke the tool-calling protocol (orphan or repeated invocation ids, calls mid-answer). */
export class ProtocolError extends CrawlwiseError {
  constructor(message: string) {
    super(message, "PROTOCOL_ERROR");
    this.name = "ProtocolError";
  }
}

export class SessionBusyError extends CrawlwiseError {
  constructor() {
    super("A turn is already in progress for this session", "SESSION_BUSY");
    this.name = "SessionBusyError";
  }
}

/** Normalize anything thrown into a CrawlwiseError, keeping the original as cause. */
export function toCrawlwiseError(error: unknown): CrawlwiseError {
  if (error instanceof CrawlwiseError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CrawlwiseError(message, "UNEXPECTED", error);
}
