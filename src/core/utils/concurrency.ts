/**
 * Bounded-concurrency helpers for independent per-item work
 *
 * Both helpers preserve input order in their output regardless of the
 * order in which items complete.
 */

type Settled<R> =
  | { readonly ok: true; readonly value: R }
  | { readonly ok: false; readonly error: unknown };

function settle<R>(run: () => Promise<R>): Promise<Settled<R>> {
  return Promise.resolve()
    .then(run)
    .then(
      (value): Settled<R> => ({ ok: true, value }),
      (error: unknown): Settled<R> => ({ ok: false, error })
    );
}

function clampConcurrency(concurrency: number): number {
  return Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
}

/**
 * Map items through an async function with at most `concurrency` calls in
 * flight. Workers pull the next index from a shared cursor.
 *
 * Rejects with the first error after all workers have stopped.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.min(clampConcurrency(concurrency), items.length);
  const errors: unknown[] = [];
  let currentIndex = 0;

  const worker = async (): Promise<void> => {
    while (currentIndex < items.length && errors.length === 0) {
      const index = currentIndex++;
      const outcome = await settle(() => fn(items[index], index));
      if (outcome.ok) {
        results[index] = outcome.value;
      } else {
        errors.push(outcome.error);
      }
    }
  };

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  if (errors.length > 0) {
    throw errors[0];
  }
  return results;
}

/**
 * Ordered streaming variant of mapWithConcurrency.
 *
 * Keeps up to `concurrency` calls running ahead of the consumer and yields
 * results in input order. When the consumer stops iterating, no further
 * items are started; calls already in flight run to completion and their
 * results are dropped.
 */
export async function* mapOrderedStream<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): AsyncGenerator<R, void, undefined> {
  const limit = clampConcurrency(concurrency);
  const pending: Array<Promise<Settled<R>>> = [];
  let nextIndex = 0;

  const launch = (): void => {
    const index = nextIndex++;
    pending.push(settle(() => fn(items[index], index)));
  };

  while (nextIndex < items.length && pending.length < limit) {
    launch();
  }

  for (let head = pending.shift(); head !== undefined; head = pending.shift()) {
    const outcome = await head;
    if (nextIndex < items.length) {
      launch();
    }
    if (!outcome.ok) {
      throw outcome.error;
    }
    yield outcome.value;
  }
}
