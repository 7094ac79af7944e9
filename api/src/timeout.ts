import { TimeoutError } from "./errors.js";

/**
 * Runs an external call with a deadline. The call receives an AbortSignal that
 * fires when the deadline passes, so vendor SDKs can cancel the request.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first: a callee that rejects on abort must not win the race.
      reject(new TimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
