/**
 * Maps `values` through `handler` with at most `limit` calls in flight.
 * Results keep input order; the first rejection rejects the whole map.
 * A limit below 1 or not finite runs the handlers one at a time.
 */
export const mapWithConcurrency = async <T, R>(
  values: readonly T[],
  limit: number,
  handler: (value: T, index: number) => Promise<R>,
): Promise<readonly R[]> => {
  // Non-finite limits fall back to sequential work; NaN would start no worker at all.
  const effectiveLimit = Number.isFinite(limit) ? Math.max(1, Math.floor(limit)) : 1;
  const workerCount = Math.min(effectiveLimit, values.length);
  const results: R[] = new Array<R>(values.length);
  let index = 0;
  let failed = false;

  const workers: Promise<void>[] = Array.from({ length: workerCount }, async () => {
    while (!failed) {
      const current = index;
      index += 1;
      if (current >= values.length) {
        return;
      }

      const value = values[current];
      if (value === undefined) {
        continue;
      }

      try {
        results[current] = await handler(value, current);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });

  await Promise.all(workers);
  return results;
};

export const foldSequentially = async <T, S>(
  values: readonly T[],
  initial: S,
  step: (state: S, value: T, index: number) => Promise<S>,
): Promise<S> => {
  let state = initial;
  for (const [index, value] of values.entries()) {
    state = await step(state, value, index);
  }

  return state;
};
