/**
 * Retry and polling helpers shared by the managers.
 */

import { ProvisionError, ProvisionErrorType } from "./errors";

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async operation, retrying while `shouldRetry` accepts the error.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let delay = delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      onRetry?.(error, attempt, delay);
      await sleep(delay);
      delay *= backoffMultiplier;
    }
  }
}

/**
 * Poll `getState` until `isDesiredState` holds or the timeout elapses.
 */
export async function waitForState<T>(
  getState: () => Promise<T>,
  isDesiredState: (state: T) => boolean,
  options: {
    timeoutMs?: number;
    pollIntervalMs?: number;
    timeoutMessage?: string;
  } = {}
): Promise<T> {
  const {
    timeoutMs = 300_000,
    pollIntervalMs = 5_000,
    timeoutMessage = "Timeout waiting for resource to reach desired state",
  } = options;

  const start = Date.now();
  let state = await getState();

  while (!isDesiredState(state)) {
    if (Date.now() - start >= timeoutMs) {
      throw new ProvisionError(timeoutMessage, ProvisionErrorType.TIMEOUT);
    }
    await sleep(pollIntervalMs);
    state = await getState();
  }

  return state;
}
