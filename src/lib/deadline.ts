export type DeadlineOutcome<T> =
  | { kind: 'done'; value: T }
  | { kind: 'timeout'; afterMs: number };

/**
 * Race `work` against a timer. On expiry the signal is aborted and the work is
 * abandoned: its eventual result or rejection is ignored, and the caller gets
 * `timeout` right away.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<DeadlineOutcome<T>> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<DeadlineOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ kind: 'timeout', afterMs: timeoutMs });
    }, timeoutMs);
    timer.unref?.();
  });

  const run = work(controller.signal).then((value): DeadlineOutcome<T> => ({ kind: 'done', value }));

  try {
    return await Promise.race([run, expired]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
