import { WardenError, type Operation } from './errors.js';

export interface TimeoutScope {
  operation: Operation;
  agentId?: string;
  /** Name of the gateway primitive being awaited */
  primitive: string;
}

/**
 * Run `work` under a deadline. On expiry its signal is aborted and the returned
 * promise settles only once the work itself has: with the value if it still
 * completed, otherwise with a `timeout` WardenError.
 */
export function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  scope: TimeoutScope
): Promise<T> {
  const controller = new AbortController();
  let expired = false;

  const timeoutError = (cause: unknown): WardenError =>
    new WardenError(`${scope.primitive} did not finish within ${timeoutMs}ms`, 'timeout', {
      agentId: scope.agentId,
      operation: scope.operation,
      context: { primitive: scope.primitive, timeoutMs },
      cause: cause instanceof Error ? cause : undefined,
    });

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      expired = true;
      controller.abort();
    }, timeoutMs);

    work(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(expired ? timeoutError(error) : error);
      }
    );
  });
}
