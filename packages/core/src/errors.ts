// Error taxonomy for command binding, dispatch, endpoint registry and options.
//
// Binding, registry and configuration errors are raised synchronously to the
// caller. Dispatch errors never leave a connection: they are handed to the
// endpoint's error hook.

/** Error raised while turning command specs into a binding table. */
export class BindingError extends Error {
  constructor(
    public kind:
      | "missingMember"
      | "duplicatePattern"
      | "argumentArity"
      | "emptyProperty"
      | "readOnlyProperty"
      | "invalidPattern",
    message: string,
  ) {
    super(message);
    this.name = "BindingError";
  }

  static missingMember(member: string): BindingError {
    return new BindingError(
      "missingMember",
      `Unable to produce callable object for non-existing member '${member}' of device or interface.`,
    );
  }

  static duplicatePattern(pattern: string): BindingError {
    return new BindingError(
      "duplicatePattern",
      `The regular expression ${pattern} is associated with multiple commands.`,
    );
  }

  static argumentArity(pattern: string, expected: number, got: number): BindingError {
    return new BindingError(
      "argumentArity",
      `Expected ${expected} argument mapping(s) for ${pattern}, got ${got}`,
    );
  }

  static emptyProperty(member: string): BindingError {
    return new BindingError(
      "emptyProperty",
      `Property command for '${member}' has neither a read nor a write pattern.`,
    );
  }

  static writeWithoutValue(member: string, pattern: string): BindingError {
    return new BindingError(
      "argumentArity",
      `Write pattern ${pattern} for property '${member}' has no capture group for the new value.`,
    );
  }

  static invalidPattern(pattern: string, reason: string): BindingError {
    return new BindingError("invalidPattern", `Invalid regular expression '${pattern}': ${reason}`);
  }

  static readOnlyProperty(member: string): BindingError {
    return new BindingError(
      "readOnlyProperty",
      `Property '${member}' has a write pattern but no setter.`,
    );
  }
}

/** Per-request failure, routed to the endpoint's error hook. */
export class DispatchError extends Error {
  constructor(
    public kind: "unmatched" | "invocation",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DispatchError";
  }

  static unmatched(): DispatchError {
    return new DispatchError("unmatched", "no command matched the request");
  }

  static invocation(pattern: string, cause: Error): DispatchError {
    return new DispatchError("invocation", `command ${pattern} failed: ${cause.message}`, {
      cause,
    });
  }
}

/** Misuse of the endpoint registry, such as an unknown or duplicate protocol name. */
export class RegistryError extends Error {
  constructor(
    public kind: "duplicate" | "unknown" | "running",
    public protocol: string,
    message: string,
  ) {
    super(message);
    this.name = "RegistryError";
  }

  static duplicate(protocol: string): RegistryError {
    return new RegistryError(
      "duplicate",
      protocol,
      `Endpoint for protocol '${protocol}' is already registered.`,
    );
  }

  static unknown(protocol: string): RegistryError {
    return new RegistryError(
      "unknown",
      protocol,
      `No endpoint registered for protocol '${protocol}'.`,
    );
  }

  static running(protocol: string): RegistryError {
    return new RegistryError(
      "running",
      protocol,
      `Endpoint for protocol '${protocol}' is still running; stop it before removing it.`,
    );
  }
}

/** Invalid or unrecognised endpoint option. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Normalise a thrown value into an Error instance. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * The member's own failure behind an invocation DispatchError, or the error
 * itself for anything else. Lets error hooks reply without the pattern text.
 */
export function rootCause(error: Error): Error {
  if (error instanceof DispatchError && error.kind === "invocation" && error.cause instanceof Error) {
    return error.cause;
  }
  return error;
}
