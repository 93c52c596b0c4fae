/**
 * Deadline for calls into remote collaborators.
 *
 * A call that outlives its deadline is treated as failed; the underlying
 * promise keeps running but its outcome is ignored.
 */

export class DeadlineExceededError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

/**
 * Race `promise` against a timer.
 *
 * @throws DeadlineExceededError when the timer wins
 */
export async function withDeadline<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timer = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => reject(new DeadlineExceededError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timer]);
  } finally {
    clearTimeout(timeoutId);
  }
}
