export type SengledErrorKind =
  | "transport"
  | "authentication"
  | "serialization"
  | "invalid-identifier"
  | "directory-parse"
  | "publish"
  | "invalid-command-value";

/**
 * Base for every error the client raises. `kind` lets callers branch without
 * instanceof chains; `cause` keeps the underlying library error.
 */
export abstract class SengledError extends Error {
  abstract readonly kind: SengledErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** HTTP, DNS, TLS, non-2xx, non-JSON bodies and MQTT connect failures. */
export class TransportError extends SengledError {
  readonly kind = "transport" as const;
}

/** Credentials rejected, or a login response we do not recognise. */
export class AuthenticationError extends SengledError {
  readonly kind = "authentication" as const;

  constructor(message = "Sengled authentication failed", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SerializationError extends SengledError {
  readonly kind = "serialization" as const;
}

export class InvalidIdentifierError extends SengledError {
  readonly kind = "invalid-identifier" as const;

  constructor(readonly input: string, reason: string) {
    super(`Invalid device identifier "${input}": ${reason}`);
  }
}

/** The device list did not match the expected shape; no partial list is returned. */
export class DirectoryParseError extends SengledError {
  readonly kind = "directory-parse" as const;
}

export class PublishError extends SengledError {
  readonly kind = "publish" as const;

  constructor(readonly topic: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidCommandValueError extends SengledError {
  readonly kind = "invalid-command-value" as const;
}

export function isSengledError(value: unknown): value is SengledError {
  return value instanceof SengledError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
