/**
 * Error taxonomy shared by every module.
 *
 * Setup errors (paths, contexts, overrides) are raised before anything is
 * spawned. Launch and timeout errors are raised after the partial output of
 * the run has been stored on the EProcess instance.
 */

export const ERROR_CODES = {
  INVALID_PATH: "INVALID_PATH",
  INVALID_OVERRIDE: "INVALID_OVERRIDE",
  UNKNOWN_CONTEXT: "UNKNOWN_CONTEXT",
  MISSING_CONTEXT: "MISSING_CONTEXT",
  LAUNCH_FAILED: "LAUNCH_FAILED",
  TIMEOUT: "TIMEOUT",
  INVALID_STATE: "INVALID_STATE",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class WineBridgeError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "WineBridgeError";
    this.code = code;
    this.details = details;
  }
}

/** A distribution or prefix path that cannot be resolved to a usable directory. */
export class InvalidPathError extends WineBridgeError {
  constructor(message: string, public readonly path: string) {
    super(message, ERROR_CODES.INVALID_PATH, { path });
    this.name = "InvalidPathError";
  }
}

/** An override that targets a variable the context derives from its paths. */
export class InvalidOverrideError extends WineBridgeError {
  constructor(message: string, public readonly variable: string) {
    super(message, ERROR_CODES.INVALID_OVERRIDE, { variable });
    this.name = "InvalidOverrideError";
  }
}

export class UnknownContextError extends WineBridgeError {
  constructor(message: string, public readonly contextName: string | null) {
    super(message, ERROR_CODES.UNKNOWN_CONTEXT, { contextName });
    this.name = "UnknownContextError";
  }
}

export class MissingContextError extends WineBridgeError {
  constructor(message: string, public readonly executable: string) {
    super(message, ERROR_CODES.MISSING_CONTEXT, { executable });
    this.name = "MissingContextError";
  }
}

export class LaunchError extends WineBridgeError {
  /** errno code reported by the OS (ENOENT, EACCES, ...), when there is one. */
  public readonly osCode: string | null;

  constructor(message: string, command: readonly string[], osCode: string | null = null) {
    super(message, ERROR_CODES.LAUNCH_FAILED, { command, osCode });
    this.name = "LaunchError";
    this.osCode = osCode;
  }
}

export class TimeoutError extends WineBridgeError {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message, ERROR_CODES.TIMEOUT, { timeoutMs });
    this.name = "TimeoutError";
  }
}

export class ProcessStateError extends WineBridgeError {
  constructor(message: string, state: string) {
    super(message, ERROR_CODES.INVALID_STATE, { state });
    this.name = "ProcessStateError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unknown error occurred";
}

/** Reads the errno-style `code` from a Node system error, if present. */
export function getOsErrorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}
