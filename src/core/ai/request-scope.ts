import { TransientServiceError } from "../errors.js";

/**
 * Runs `run` with an abort signal that fires after `timeoutMs`. The timer and
 * the controller are released on every exit path, and a timeout is reported
 * as a transient failure whatever the underlying client throws on abort.
 */
export async function withRequestScope<T>(timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    return await run(controller.signal);
  } catch (error) {
    if (timedOut) {
      throw new TransientServiceError(`Model request timed out after ${timeoutMs} ms.`, {
        cause: error
      });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    if (!controller.signal.aborted) {
      controller.abort();
    }
  }
}
