/**
 * Engine Errors
 *
 * Domain error classes carrying an ErrorCode, and the Result type the engine
 * returns instead of throwing or exiting. Only the command dispatcher turns
 * an error into stderr output and an exit status.
 */

import type { ErrorCode } from "@decouvertes/shared";

/**
 * Base error for every expected failure of a command.
 */
export class LeitnerError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = "LeitnerError";
    this.code = code;
  }
}

/**
 * Missing config directory or catalog file.
 */
export class ConfigurationError extends LeitnerError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

/**
 * Unknown player id or card id.
 */
export class NotFoundError extends LeitnerError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * A data file that does not parse into the expected structure.
 */
export class MalformedDataError extends LeitnerError {
  constructor(message: string) {
    super(message, "MALFORMED_DATA");
    this.name = "MalformedDataError";
  }
}

/**
 * Missing or invalid command arguments.
 */
export class ValidationError extends LeitnerError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

// =============================================================================
// Result Types
// =============================================================================

/** Result type for operations that can fail */
export type Result<T> = { success: true; data: T } | { success: false; error: LeitnerError };

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail<T>(error: LeitnerError): Result<T> {
  return { success: false, error };
}

// =============================================================================
// Exit Status
// =============================================================================

/**
 * Maps an error code to the process exit status.
 *
 * - VALIDATION_ERROR: 2 (usage error)
 * - everything else: 1
 */
export function exitCodeFor(code: ErrorCode): number {
  switch (code) {
    case "VALIDATION_ERROR":
      return 2;
    case "CONFIGURATION_ERROR":
    case "NOT_FOUND":
    case "MALFORMED_DATA":
    case "INTERNAL_ERROR":
    default:
      return 1;
  }
}
