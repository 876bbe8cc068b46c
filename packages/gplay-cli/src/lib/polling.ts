import type { DelayFn } from "./ports/timer.js";
import { realDelay } from "./adapters/real-timers.js";

/**
 * Options for the generic polling function.
 */
export interface PollingOptions<T> {
  /** Function to fetch current status */
  fetchStatus: () => Promise<T>;
  /** Check if polling should complete successfully */
  isComplete: (result: T) => boolean;
  /** Wait between polls, also applied before the first one */
  intervalMs: number;
  /** Give up once this much waiting has accumulated */
  timeoutMs: number;
  /** Called after each poll that did not complete */
  onProgress?: (result: T) => void;
  /**
   * Called when fetchStatus throws. Polling continues when this is set;
   * without it the error propagates.
   */
  onError?: (error: unknown) => void;
  /** Error thrown on timeout */
  timeoutError?: () => Error;
  /** Optional delay function for testing */
  delay?: DelayFn;
}

/**
 * Poll until `isComplete` holds or the time budget runs out.
 */
export async function poll<T>(options: PollingOptions<T>): Promise<T> {
  const {
    fetchStatus,
    isComplete,
    intervalMs,
    timeoutMs,
    onProgress,
    onError,
    timeoutError = () => new Error("Polling timed out"),
    delay = realDelay,
  } = options;

  const maxAttempts = Math.max(1, Math.ceil(timeoutMs / Math.max(intervalMs, 1)));
  let attempts = 0;

  while (attempts < maxAttempts) {
    attempts++;
    await delay(intervalMs);

    let result: T;
    try {
      result = await fetchStatus();
    } catch (error) {
      if (!onError) throw error;
      onError(error);
      continue;
    }

    if (isComplete(result)) {
      return result;
    }
    onProgress?.(result);
  }

  throw timeoutError();
}
