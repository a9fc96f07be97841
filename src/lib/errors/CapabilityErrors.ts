/**
 * Base error class for capability resolution errors
 */
export abstract class CapabilityError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;

  constructor(message: string, code: string, category: ErrorCategory) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Bad input from the caller; fixing the request resolves it
   */
  PERMANENT = 'permanent',

  /**
   * The bundled GPU table itself is inconsistent
   */
  FATAL = 'fatal'
}

/**
 * The GPU table breaks one of its own invariants (duplicate capability,
 * malformed entry or version)
 */
export class ConfigInvariantViolationError extends CapabilityError {
  public readonly detail: string;

  constructor(detail: string) {
    super(`GPU table invariant violated: ${detail}`, 'CONFIG_INVARIANT_VIOLATION', ErrorCategory.FATAL);
    this.detail = detail;
  }
}

/**
 * Caller supplied an argument the resolver cannot work with
 */
export class InvalidArgumentError extends CapabilityError {
  public readonly argument: string;
  public readonly value: unknown;

  constructor(argument: string, value: unknown, reason: string) {
    super(`Invalid ${argument}: ${reason} (value: ${JSON.stringify(value)})`, 'INVALID_ARGUMENT', ErrorCategory.PERMANENT);
    this.argument = argument;
    this.value = value;
  }
}

/**
 * Why a requested capability has no lookup entry
 */
export type NotFoundReason = 'unknown' | 'unsupported';

/**
 * Requested capability is not in the supported lookup for the toolkit version
 */
export class NotFoundError extends CapabilityError {
  public readonly capability: string;
  public readonly cudaVersion: string;
  public readonly reason: NotFoundReason;

  constructor(capability: string, cudaVersion: string, reason: NotFoundReason, hint?: string) {
    const message = reason === 'unknown'
      ? `Compute capability ${capability} is not defined in the GPU table (CUDA ${cudaVersion})`
      : `Compute capability ${capability} is not supported by CUDA ${cudaVersion}${hint ? ` (${hint})` : ''}`;
    super(message, 'CAPABILITY_NOT_FOUND', ErrorCategory.PERMANENT);
    this.capability = capability;
    this.cudaVersion = cudaVersion;
    this.reason = reason;
  }
}

/**
 * Configuration validation error
 */
export class ConfigError extends CapabilityError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    const message = `Invalid configuration for '${field}': ${reason} (value: ${JSON.stringify(value)})`;
    super(message, 'CONFIG_ERROR', ErrorCategory.PERMANENT);
    this.field = field;
    this.value = value;
  }
}

/**
 * Check if error is a capability error
 */
export function isCapabilityError(error: unknown): error is CapabilityError {
  return error instanceof CapabilityError;
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  category?: ErrorCategory;
}

/**
 * Serializes an error for structured logs and JSON output
 */
export function serializeError(error: unknown): SerializedError {
  if (isCapabilityError(error)) {
    return { name: error.name, message: error.message, code: error.code, category: error.category };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}
