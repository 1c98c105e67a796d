/**
 * Runs `task` under a single deadline. On expiry the task's signal is aborted
 * with the error from `onExpire`, so in-flight calls are cancelled rather than
 * left running, and the returned promise rejects with that error.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  onExpire: () => Error,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onExpire();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
