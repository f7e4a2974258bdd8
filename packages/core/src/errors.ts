/**
 * Error taxonomy shared by the engine, the adapters and the CLI.
 */

export enum SyncErrorCode {
  AUTH_INVALID = "AUTH_INVALID",
  DATABASE_NOT_FOUND = "DATABASE_NOT_FOUND",
  INPUT_UNREADABLE = "INPUT_UNREADABLE",
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT = "TIMEOUT",
  RATE_LIMITED = "RATE_LIMITED",
  REMOTE_REJECTED = "REMOTE_REJECTED",
  CONFIG_INVALID = "CONFIG_INVALID",
  UNKNOWN = "UNKNOWN",
}

/**
 * Extra information attached to a SyncError.
 */
export interface SyncErrorData {
  /** HTTP status of the remote response, when there was one. */
  status?: number;
  /** Raw body returned by the remote, used as the "reason" of a failed push. */
  detail?: string;
  cause?: unknown;
}

export class SyncError extends Error {
  public readonly code: SyncErrorCode;
  public readonly context: string;
  public readonly status?: number;
  public readonly detail?: string;

  constructor(
    code: SyncErrorCode,
    context: string,
    message: string,
    data: SyncErrorData = {}
  ) {
    super(message, { cause: data.cause });
    this.name = "SyncError";
    this.code = code;
    this.context = context;
    this.status = data.status;
    this.detail = data.detail;

    Object.setPrototypeOf(this, SyncError.prototype);
  }

  /**
   * Determine if an arbitrary value is a SyncError.
   */
  static isSyncError(error: unknown): error is SyncError {
    return error instanceof SyncError;
  }

  /**
   * Wrap an arbitrary error into a SyncError.
   * SyncErrors pass through untouched so the original code survives.
   */
  static wrap(
    error: unknown,
    code: SyncErrorCode,
    context: string,
    message: string
  ): SyncError {
    if (error instanceof SyncError) {
      return error;
    }

    return new SyncError(code, context, `${message}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
