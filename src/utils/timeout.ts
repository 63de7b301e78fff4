/**
 * Bound a collaborator call in time.
 *
 * The timer is cleared as soon as the call settles, so nothing is left
 * pending after the promise resolves.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
