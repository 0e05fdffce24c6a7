/**
 * Deployment Errors
 *
 * Failures raised by the deployment CLI. Command actions catch these at the
 * top level, log them and exit with code 1.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A resource event that ended in a *_FAILED status */
export interface FailedEvent {
  logicalId: string;
  resourceType: string;
  status: string;
  reason: string;
  timestamp: string;
}

export type StackOperation = 'create' | 'update' | 'delete' | 'validate';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * A stack operation was rejected or reached a failed terminal state.
 */
export class StackOperationError extends Error {
  readonly stackName: string;
  readonly operation: StackOperation;
  /** Last known stack status (undefined when the API call itself failed) */
  readonly status: string | undefined;
  readonly failedEvents: FailedEvent[];

  constructor(
    stackName: string,
    operation: StackOperation,
    message: string,
    options: { status?: string; failedEvents?: FailedEvent[]; cause?: unknown } = {}
  ) {
    super(`${operation} ${stackName} failed: ${message}`, { cause: options.cause });
    this.name = 'StackOperationError';
    this.stackName = stackName;
    this.operation = operation;
    this.status = options.status;
    this.failedEvents = options.failedEvents ?? [];
  }
}

/**
 * Credentials or prerequisites are missing.
 */
export class PreflightError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PreflightError';
  }
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
