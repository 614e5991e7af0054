/**
 * Service error definitions with JSON serialization for structured logging.
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

/**
 * Error codes for platform initialization.
 */
export type PlatformInitErrorCode =
  | "ADDRESS_WIDTH_UNKNOWN" // No address-model hint and the CPU has no known width
  | "ALREADY_INITIALIZED"; // initializePlatform() called after the identity exists

/**
 * Serialized error format.
 */
export interface SerializedError {
  readonly type: "platform" | "filesystem";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error, e.g. for a log line or a diagnostics dump.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * Error raised while establishing the process-wide platform identity.
 *
 * `ADDRESS_WIDTH_UNKNOWN` is fatal: every later computation assumes a
 * 32 or 64 bit address model, so no identity is produced without one.
 */
export class PlatformInitError extends ServiceError {
  readonly type = "platform" as const;

  constructor(
    message: string,
    readonly errorCode: PlatformInitErrorCode
  ) {
    super(message, errorCode);
    this.name = "PlatformInitError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ELOOP") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Type guard to check if an error is a PlatformInitError with a specific code.
 */
export function isPlatformInitErrorWithCode(
  error: unknown,
  code: PlatformInitErrorCode
): error is PlatformInitError {
  return error instanceof PlatformInitError && error.errorCode === code;
}

export { getErrorMessage } from "../shared/error-utils";
