/**
 * Timing Utilities
 *
 * Sleep, deadlines and the exponential backoff schedule used on failover.
 */

import { RpcTimeoutError } from '../rpc/errors.js';

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Backoff in time units after `failures` consecutive failures: min(2^failures, cap)
 */
export function backoffUnits(failures: number, cap: number): number {
  return Math.min(Math.pow(2, failures), cap);
}

/**
 * Reject with RpcTimeoutError if `promise` has not settled within `timeoutMs`
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RpcTimeoutError(label, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(String(error));
}
