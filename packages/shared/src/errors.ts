/**
 * Switchyard Error Hierarchy
 *
 * Structured error classes for consistent error handling across the packages.
 * All errors extend SwitchyardError which provides:
 * - Unique error codes for programmatic handling
 * - Rich metadata for debugging
 * - Serialization support for logging and transport
 * - Type guards for catching specific error types
 *
 * @example Throwing errors
 * ```typescript
 * throw StateError.alreadyJoined('room:1');
 * throw TransportError.connection('socket reset');
 * ```
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   channel.push('shout', { body: 'hi' });
 * } catch (error) {
 *   if (isStateError(error)) {
 *     // join() was never called
 *   } else if (isSwitchyardError(error)) {
 *     console.log(error.code, error.toJSON());
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., STATE_NOT_JOINED, TRANSPORT_CLOSED)
 */
export type SwitchyardErrorCode =
  // State/Lifecycle
  | "STATE_ALREADY_JOINED"
  | "STATE_NOT_JOINED"
  | "STATE_CLOSED"
  | "STATE_WAITER_REPLACED"
  // Transport/Network
  | "TRANSPORT_CONNECTION"
  | "TRANSPORT_CLOSED"
  | "TRANSPORT_SEND"
  // Validation
  | "VALIDATION_FRAME"
  // Context
  | "CONTEXT_NOT_FOUND";

/**
 * Serialized error format for logs and transport
 */
export interface SerializedSwitchyardError {
  name: string;
  code: SwitchyardErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedSwitchyardError | { message: string; name?: string };
  stack?: string;
}

/**
 * Base class for all Switchyard errors.
 * Provides consistent structure, serialization, and type identification.
 */
export class SwitchyardError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: SwitchyardErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: SwitchyardErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "SwitchyardError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Serialize error (JSON-safe)
   */
  toJSON(): SerializedSwitchyardError {
    const serialized: SerializedSwitchyardError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause) {
      if (this.cause instanceof SwitchyardError) {
        serialized.cause = this.cause.toJSON();
      } else if (this.cause instanceof Error) {
        serialized.cause = {
          message: this.cause.message,
          name: this.cause.name,
        };
      }
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedSwitchyardError): SwitchyardError {
    let cause: Error | undefined;
    if (json.cause) {
      cause =
        "code" in json.cause
          ? SwitchyardError.fromJSON(json.cause)
          : new Error(json.cause.message);
    }

    return new SwitchyardError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// State Errors
// =============================================================================

/**
 * Error thrown when an operation is called in the wrong lifecycle state.
 * These are programming errors: they fail fast and synchronously.
 *
 * @example
 * ```typescript
 * throw StateError.alreadyJoined('room:1');
 * throw StateError.notJoined('room:1');
 * ```
 */
export class StateError extends SwitchyardError {
  constructor(
    code: "STATE_ALREADY_JOINED" | "STATE_NOT_JOINED" | "STATE_CLOSED" | "STATE_WAITER_REPLACED",
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(code, message, details);
    this.name = "StateError";
  }

  /** join() was already called on this channel instance */
  static alreadyJoined(topic: string): StateError {
    return new StateError(
      "STATE_ALREADY_JOINED",
      `Tried to join channel "${topic}" more than once; create a new channel instead`,
      { topic },
    );
  }

  /** push() was called before join() */
  static notJoined(topic: string): StateError {
    return new StateError(
      "STATE_NOT_JOINED",
      `Tried to push on channel "${topic}" before joining it`,
      { topic },
    );
  }

  static closed(topic: string): StateError {
    return new StateError("STATE_CLOSED", `Channel "${topic}" is closed`, { topic });
  }

  /** A reply waiter was replaced by a newer one for the same event */
  static waiterReplaced(topic: string, event: string): StateError {
    return new StateError(
      "STATE_WAITER_REPLACED",
      `Waiter for "${event}" on channel "${topic}" was replaced`,
      { topic, event },
    );
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * Error for connection-level failures.
 *
 * @example
 * ```typescript
 * throw TransportError.connection('socket reset');
 * throw TransportError.closed('server went away');
 * ```
 */
export class TransportError extends SwitchyardError {
  constructor(
    code: "TRANSPORT_CONNECTION" | "TRANSPORT_CLOSED" | "TRANSPORT_SEND",
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "TransportError";
  }

  static connection(reason: string, cause?: Error): TransportError {
    return new TransportError(
      "TRANSPORT_CONNECTION",
      `Connection error: ${reason}`,
      { reason },
      cause,
    );
  }

  static closed(reason: string): TransportError {
    return new TransportError("TRANSPORT_CLOSED", `Connection closed: ${reason}`, { reason });
  }

  static send(cause: Error): TransportError {
    return new TransportError(
      "TRANSPORT_SEND",
      `Failed to send message: ${cause.message}`,
      {},
      cause,
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error for inbound data that does not have the message shape.
 */
export class ValidationError extends SwitchyardError {
  /** Human-readable issues found while validating */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION_FRAME", message, { issues });
    this.name = "ValidationError";
    this.issues = issues;
  }

  static frame(issues: string[]): ValidationError {
    return new ValidationError(`Invalid message frame: ${issues.join("; ")}`, issues);
  }
}

// =============================================================================
// Context Errors
// =============================================================================

export class ContextError extends SwitchyardError {
  constructor(message: string = "Scope context not found") {
    super("CONTEXT_NOT_FOUND", message);
    this.name = "ContextError";
  }

  static notFound(): ContextError {
    return new ContextError(
      "Scope context not found. Ensure you are running inside Context.run() or a SerialScope.",
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if error is any Switchyard error
 */
export function isSwitchyardError(error: unknown): error is SwitchyardError {
  return error instanceof SwitchyardError;
}

export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

/**
 * Normalize any thrown value into an Error instance.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === "string") {
    return new Error(value);
  }
  return new Error(String(value));
}
