/** Largest delay a Node.js timer honours. Longer delays fire after 1ms */
export const MAX_DEADLINE_MS = 2_147_483_647;

export type DeadlineResult<T> = { type: 'completed'; value: T } | { type: 'expired' };

/**
 * Races `execute` against a timer of `timeoutMs`.
 *
 * On expiry the controller is aborted and the execution is abandoned, not
 * awaited. Whatever it later settles with is handed to `onAbandonedSettle`
 * so that a late rejection never becomes an unhandled one. The timer is
 * always cleared, so a completed run leaves nothing scheduled.
 */
export const runWithDeadline = async <T>(param: {
  timeoutMs: number;
  controller: AbortController;
  execute: (signal: AbortSignal) => Promise<T>;
  onAbandonedSettle: (result: { type: 'resolved'; value: T } | { type: 'rejected'; error: unknown }) => void;
}): Promise<DeadlineResult<T>> => {
  let timer: NodeJS.Timeout | undefined;
  const execution = param.execute(param.controller.signal);
  const deadline = new Promise<DeadlineResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ type: 'expired' }), param.timeoutMs);
  });

  try {
    const result = await Promise.race([
      execution.then((value): DeadlineResult<T> => ({ type: 'completed', value })),
      deadline,
    ]);
    if (result.type === 'expired') {
      param.controller.abort(new Error(`Deadline of ${param.timeoutMs}ms expired`));
      void execution.then(
        (value) => param.onAbandonedSettle({ type: 'resolved', value }),
        (error: unknown) => param.onAbandonedSettle({ type: 'rejected', error }),
      );
    }
    return result;
  } finally {
    clearTimeout(timer);
  }
};
