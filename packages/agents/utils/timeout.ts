// Bounded waits for injected capabilities

import { DecisionTimeoutError } from './errors.js';

/**
 * Race `task` against a timer. On timeout the controller is aborted so the
 * callee can stop work, and the returned promise rejects with DecisionTimeoutError.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T> | T,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DecisionTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve().then(() => task(controller.signal)), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
