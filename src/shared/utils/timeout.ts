/**
 * Timeout helpers
 */

export type WaitOutcome = 'completed' | 'timeout';

/**
 * Wait for a promise, giving up after timeoutMs. The timer is always cleared.
 * A rejection of the awaited promise counts as completion.
 */
export async function waitWithTimeout(promise: Promise<unknown>, timeoutMs: number): Promise<WaitOutcome> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<WaitOutcome>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
  });

  const completion = promise.then(
    (): WaitOutcome => 'completed',
    (): WaitOutcome => 'completed'
  );

  try {
    return await Promise.race([completion, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
