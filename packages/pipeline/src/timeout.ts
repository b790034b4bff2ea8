/**
 * @txrelay/pipeline — Bounded timeouts for chain calls.
 */

import { RpcTimeoutError } from "./errors.js";

/**
 * Race `promise` against a timer. The timer is always cleared; the
 * underlying call is not cancelled.
 *
 * @throws RpcTimeoutError
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RpcTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
