/**
 * Race a promise against a timer. 0 (or less) disables the timeout.
 * The timer is always cleared so nothing keeps the process alive.
 */
export async function withTimeout<T>(
  work: Promise<T> | T,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  if (timeoutMs <= 0) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve(work), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
