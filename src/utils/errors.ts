/**
 * Error handling utilities for worktree-warden.
 *
 * Every failure surfaced by the lifecycle core is a WardenError naming the
 * agent, the attempted operation and the failure kind.
 */

/**
 * Failure kinds raised by the lifecycle core.
 */
export type ErrorKind =
  | 'path-collision' // Allocated path already held by another worktree
  | 'branch-collision' // Allocated branch already held by another worktree
  | 'dirty-worktree' // Destructive operation refused on uncommitted changes
  | 'gateway-failure' // Repository primitive failed
  | 'timeout' // Repository primitive exceeded its time budget
  | 'orphan-detected' // Record is orphaned and awaits reconciliation
  | 'registry-corruption' // Registry violates a uniqueness invariant or cannot be read
  | 'validation' // Invalid input or arguments
  | 'not-found' // No record for the agent
  | 'invalid-state' // Record state does not allow the operation
  | 'base-ref-mismatch' // Spawn retried with a different base ref
  | 'config' // Configuration errors
  | 'internal'; // Unexpected internal errors

/**
 * Operations that can fail.
 */
export type Operation =
  | 'spawn'
  | 'nuke'
  | 'status'
  | 'sync'
  | 'reconcile'
  | 'list'
  | 'open'
  | 'load'
  | 'config';

export interface WardenErrorOptions {
  agentId?: string;
  operation?: Operation;
  context?: Record<string, unknown>;
  /** Only meaningful for gateway failures: whether a retry may succeed */
  retryable?: boolean;
  cause?: Error;
}

/**
 * Structured error with kind, agent, operation and context
 */
export class WardenError extends Error {
  readonly kind: ErrorKind;
  readonly agentId?: string;
  readonly operation?: Operation;
  readonly context?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(message: string, kind: ErrorKind, options: WardenErrorOptions = {}) {
    super(formatMessage(message, kind, options));
    this.name = 'WardenError';
    this.kind = kind;
    this.agentId = options.agentId;
    this.operation = options.operation;
    this.context = options.context;
    this.retryable = options.retryable ?? false;
    if (options.cause) {
      this.cause = options.cause;
      // Preserve original stack if available
      if (options.cause.stack) {
        this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
      }
    }
  }
}

function formatMessage(message: string, kind: ErrorKind, options: WardenErrorOptions): string {
  const scope = [options.operation, options.agentId].filter(Boolean).join(' ');
  return scope ? `${scope}: ${message} (${kind})` : `${message} (${kind})`;
}

/**
 * Failure reported by a RepositoryGateway primitive.
 * `retryable` separates transient failures (lock contention) from fatal ones (invalid ref).
 */
export class GatewayError extends Error {
  readonly retryable: boolean;
  readonly primitive: string;
  /** The primitive was killed after exceeding its time budget */
  readonly timedOut: boolean;
  /** The primitive refused because the path or branch is already taken */
  readonly collision?: 'path' | 'branch';

  constructor(
    message: string,
    primitive: string,
    options: { retryable: boolean; timedOut?: boolean; collision?: 'path' | 'branch'; cause?: Error }
  ) {
    super(message);
    this.name = 'GatewayError';
    this.primitive = primitive;
    this.retryable = options.retryable;
    this.timedOut = options.timedOut ?? false;
    this.collision = options.collision;
    if (options.cause) {
      this.cause = options.cause;
    }
  }
}

export function isWardenError(error: unknown, kind?: ErrorKind): error is WardenError {
  return error instanceof WardenError && (kind === undefined || error.kind === kind);
}

/**
 * Process exit codes of the CLI.
 */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  dirty: 2,
  timeout: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error to the CLI exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof WardenError) {
    if (error.kind === 'dirty-worktree') return EXIT_CODES.dirty;
    if (error.kind === 'timeout') return EXIT_CODES.timeout;
  }
  return EXIT_CODES.failure;
}

/**
 * Check if debug mode is enabled via environment variable
 */
export function isDebugMode(): boolean {
  return process.env.WARDEN_DEBUG === '1' || process.env.WARDEN_DEBUG === 'true';
}

/**
 * Log an error to stderr with full context.
 */
export function logError(error: unknown, source?: string): void {
  const prefix = source ? `[warden] [${source}]` : '[warden]';

  if (error instanceof WardenError) {
    console.error(`${prefix} Error: ${error.message}`);
    if (error.context) {
      console.error(`${prefix} Context:`, JSON.stringify(error.context, null, 2));
    }
    if (error.stack) {
      console.error(`${prefix} Stack trace:\n${error.stack}`);
    }
  } else if (error instanceof Error) {
    console.error(`${prefix} Error: ${error.message}`);
    if (error.stack) {
      console.error(`${prefix} Stack trace:\n${error.stack}`);
    }
  } else {
    console.error(`${prefix} Unknown error:`, error);
  }
}

/**
 * Format an error for a user-facing response.
 * In debug mode, includes context and stack traces. Otherwise, just the message.
 */
export function formatErrorResponse(error: unknown): string {
  const debug = isDebugMode();

  if (error instanceof WardenError) {
    let response = `Error: ${error.message}`;
    const summary = error.context?.summary;
    if (error.kind === 'dirty-worktree' && typeof summary === 'string') {
      response += `\n\nUncommitted changes:\n${summary}`;
    }
    if (debug) {
      if (error.context) {
        response += `\n\nContext: ${JSON.stringify(error.context, null, 2)}`;
      }
      if (error.stack) {
        response += `\n\nStack trace:\n${error.stack}`;
      }
    }
    return response;
  }

  if (error instanceof Error) {
    let response = `Error: ${error.message}`;
    if (debug && error.stack) {
      response += `\n\nStack trace:\n${error.stack}`;
    }
    return response;
  }

  return `Error: ${String(error)}`;
}

/**
 * Wrap an error with additional context, preserving the original error.
 * Gateway failures keep their transient/fatal classification.
 */
export function wrapError(
  message: string,
  kind: ErrorKind,
  cause: unknown,
  options: Omit<WardenErrorOptions, 'cause'> = {}
): WardenError {
  const causeError = cause instanceof Error ? cause : new Error(String(cause));
  const retryable = options.retryable ?? (cause instanceof GatewayError ? cause.retryable : undefined);
  return new WardenError(message, kind, { ...options, retryable, cause: causeError });
}
