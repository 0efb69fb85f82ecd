import type { TrialHandle } from './launcher.js';
import { TrialTimeoutError } from './errors.js';

/**
 * Runs `body` (reading output, waiting for exit) under a one-shot wall-clock
 * deadline. When the deadline passes the process is killed outright and the
 * call rejects with {@link TrialTimeoutError}, whatever `body` produced.
 */
export const withDeadline = async <T>(
  handle: Pick<TrialHandle, 'terminate'>,
  timeoutSeconds: number,
  body: () => Promise<T>,
): Promise<T> => {
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    handle.terminate('hard');
  }, Math.max(0, timeoutSeconds * 1000));

  try {
    const result = await body();
    if (expired) {
      throw new TrialTimeoutError(timeoutSeconds);
    }
    return result;
  } catch (error) {
    if (expired && !(error instanceof TrialTimeoutError)) {
      throw new TrialTimeoutError(timeoutSeconds);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
};
