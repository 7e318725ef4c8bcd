/**
 * Runs `task` with an AbortSignal that fires after `ms`. The returned promise
 * rejects with `onTimeout()` when the deadline passes first.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, ms);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
