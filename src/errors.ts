/**
 * Error taxonomy shared across the gateway.
 *
 * Only configuration errors are fatal; everything else is scoped to a
 * single task (or a single file within a task) and is reported to the chat.
 */

/** Missing or malformed startup configuration. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The agent executable could not be started (usually ENOENT). */
export class ProcessLaunchError extends Error {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    super(`Failed to run agent: executable "${command}" not found`, options);
    this.name = "ProcessLaunchError";
    this.command = command;
  }
}

/** The agent process did not finish within its time budget. */
export class ExecutionTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Agent execution timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "ExecutionTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** A queue operation failed inside SQLite or violated a status transition. */
export class StoreTransactionError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = "StoreTransactionError";
    this.operation = operation;
  }
}

/** One requested outbound file could not be resolved or delivered. */
export class FileTransferError extends Error {
  readonly requestedPath: string;

  constructor(requestedPath: string, reason: string, options?: { cause?: unknown }) {
    super(`${requestedPath}: ${reason}`, options);
    this.name = "FileTransferError";
    this.requestedPath = requestedPath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Read `code` off a Node system error without trusting its shape. */
export function errorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" && code ? code : undefined;
}
