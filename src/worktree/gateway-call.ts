import { GatewayError, WardenError, isWardenError, wrapError, type Operation } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import type { LifecycleContext } from './types.js';

export interface CallScope {
  operation: Operation;
  agentId?: string;
  primitive: string;
}

/**
 * Await a gateway primitive under the configured time budget. On expiry the call
 * is aborted through its signal and awaited until it has actually stopped.
 * Failures come back as WardenErrors of kind `timeout`, `path-collision`,
 * `branch-collision` or `gateway-failure`.
 */
export async function callGateway<T>(
  context: Pick<LifecycleContext, 'timeoutMs'>,
  scope: CallScope,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  try {
    return await withTimeout(call, context.timeoutMs, scope);
  } catch (error) {
    if (isWardenError(error)) {
      throw error;
    }
    if (error instanceof GatewayError && error.timedOut) {
      throw wrapError(error.message, 'timeout', error, {
        agentId: scope.agentId,
        operation: scope.operation,
        context: { primitive: scope.primitive },
      });
    }
    if (error instanceof GatewayError && error.collision) {
      throw wrapError(error.message, error.collision === 'path' ? 'path-collision' : 'branch-collision', error, {
        agentId: scope.agentId,
        operation: scope.operation,
        context: { primitive: scope.primitive },
        retryable: false,
      });
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw wrapError(detail, 'gateway-failure', error, {
      agentId: scope.agentId,
      operation: scope.operation,
      context: { primitive: scope.primitive },
    });
  }
}

/**
 * Whether a failure leaves the outcome of the gateway call unknown or retryable,
 * in which case the record stays in its in-progress state for reconciliation.
 */
export function isDeferrable(error: unknown): error is WardenError {
  return isWardenError(error) && (error.kind === 'timeout' || (error.kind === 'gateway-failure' && error.retryable));
}
