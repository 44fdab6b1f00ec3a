/**
 * Error taxonomy
 *
 * Every error raised by the runtime carries a stable `code` so transports
 * and tests can branch on it without parsing messages.
 */

import { logger } from '../dev/logger';

export class VarTypeError extends TypeError {
  readonly code = 'VAR_TYPE';
  constructor(message: string) {
    super(message);
    this.name = 'VarTypeError';
    Object.setPrototypeOf(this, VarTypeError.prototype);
  }
}

export class VarAttributeError extends Error {
  readonly code = 'VAR_ATTRIBUTE';
  constructor(message: string) {
    super(message);
    this.name = 'VarAttributeError';
    Object.setPrototypeOf(this, VarAttributeError.prototype);
  }
}

export class StateDefinitionError extends Error {
  readonly code = 'STATE_DEFINITION';
  constructor(message: string) {
    super(message);
    this.name = 'StateDefinitionError';
    Object.setPrototypeOf(this, StateDefinitionError.prototype);
  }
}

export class UnknownVarError extends Error {
  readonly code = 'UNKNOWN_VAR';
  constructor(
    readonly stateName: string,
    readonly varName: string,
    reason = 'is not a plain var'
  ) {
    super(`'${varName}' ${reason} of state '${stateName}'`);
    this.name = 'UnknownVarError';
    Object.setPrototypeOf(this, UnknownVarError.prototype);
  }
}

export class StateNotFoundError extends Error {
  readonly code = 'STATE_NOT_FOUND';
  constructor(readonly path: string) {
    super(`No state found at path '${path}'`);
    this.name = 'StateNotFoundError';
    Object.setPrototypeOf(this, StateNotFoundError.prototype);
  }
}

export class HandlerNotFoundError extends Error {
  readonly code = 'HANDLER_NOT_FOUND';
  constructor(readonly handlerName: string) {
    super(`No event handler named '${handlerName}'`);
    this.name = 'HandlerNotFoundError';
    Object.setPrototypeOf(this, HandlerNotFoundError.prototype);
  }
}

export class EventPayloadError extends Error {
  readonly code = 'EVENT_PAYLOAD';
  constructor(
    readonly handlerName: string,
    message: string
  ) {
    super(`Invalid payload for '${handlerName}': ${message}`);
    this.name = 'EventPayloadError';
    Object.setPrototypeOf(this, EventPayloadError.prototype);
  }
}

export class ComputedVarError extends Error {
  readonly code = 'COMPUTED_VAR';
  constructor(
    readonly stateName: string,
    readonly varName: string,
    readonly cause: unknown
  ) {
    super(
      `Computed var '${stateName}.${varName}' failed: ${describeError(cause)}`
    );
    this.name = 'ComputedVarError';
    Object.setPrototypeOf(this, ComputedVarError.prototype);
  }
}

export class HandlerExecutionError extends Error {
  readonly code = 'HANDLER_EXECUTION';
  constructor(
    readonly handlerName: string,
    readonly cause: unknown
  ) {
    super(`Event handler '${handlerName}' failed: ${describeError(cause)}`);
    this.name = 'HandlerExecutionError';
    Object.setPrototypeOf(this, HandlerExecutionError.prototype);
  }
}

export class SerializationError extends Error {
  readonly code = 'SERIALIZATION';
  constructor(
    readonly typeName: string,
    readonly path?: string,
    detail?: string
  ) {
    super(
      (detail ?? `No serializer registered for values of type '${typeName}'`) +
        (path ? ` (at ${path})` : '')
    );
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

export class ImmutableStateError extends Error {
  readonly code = 'IMMUTABLE_STATE';
  constructor(message: string) {
    super(message);
    this.name = 'ImmutableStateError';
    Object.setPrototypeOf(this, ImmutableStateError.prototype);
  }
}

export class ConcurrentAccessError extends Error {
  readonly code = 'CONCURRENT_ACCESS';
  constructor(readonly token: string) {
    super(
      `State for token '${token}' was torn down; the exclusive section was dropped`
    );
    this.name = 'ConcurrentAccessError';
    Object.setPrototypeOf(this, ConcurrentAccessError.prototype);
  }
}

export class InvalidMessageError extends Error {
  readonly code = 'INVALID_MESSAGE';
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMessageError';
    Object.setPrototypeOf(this, InvalidMessageError.prototype);
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG';
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Structured form of an error as sent to the client.
 */
export interface ErrorInfo {
  type: string;
  code: string | null;
  message: string;
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof Error) {
    const code =
      'code' in error && typeof error.code === 'string' ? error.code : null;
    return { type: error.name, code, message: error.message };
  }
  return { type: 'Error', code: null, message: String(error) };
}

/**
 * Try/catch helper with logging
 * Useful for: work whose failure must not escape (background tasks)
 *
 * @example
 * ```ts
 * const result = await tryWithLogging(
 *   () => runTask(),
 *   { message: 'Background task failed' }
 * );
 * ```
 */
export async function tryWithLogging<T>(
  fn: () => Promise<T>,
  errorInfo?: {
    message?: string;
    level?: (error: unknown) => 'warn' | 'error';
  }
): Promise<T | null> {
  try {
    return await fn();
  } catch (error) {
    const message = errorInfo?.message || 'Operation failed';
    const level = errorInfo?.level?.(error) ?? 'error';
    logger[level](message, error);
    return null;
  }
}
