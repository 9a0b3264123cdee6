import { TimeoutError } from "../errors";

export const withTimeout = async <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export interface BoundedCallOptions {
  timeoutMs: number;
  label: string;
  /** Invoked once when the first attempt fails and the call is retried. */
  onRetry?: (error: unknown) => void;
}

/**
 * Runs `call` under a timeout and retries it exactly once on failure.
 * The second failure propagates to the caller.
 */
export const withSingleRetry = async <T>(call: () => Promise<T>, options: BoundedCallOptions): Promise<T> => {
  try {
    return await withTimeout(call(), options.timeoutMs, options.label);
  } catch (error: unknown) {
    options.onRetry?.(error);
    return withTimeout(call(), options.timeoutMs, `${options.label} (retry)`);
  }
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
