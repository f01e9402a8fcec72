export interface PoolHalt<T, R> {
  /** Checked before each item is claimed. */
  when: () => boolean;
  /** Produces the result of every item left unclaimed once `when` holds. */
  skip: (item: T, index: number) => R;
}

export interface PoolOptions<T, R> {
  concurrency: number;
  halt?: PoolHalt<T, R>;
}

/** Runs `mapper` over `items` with at most `concurrency` in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  options: PoolOptions<T, R>,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const { concurrency, halt } = options;
  if (!Number.isFinite(concurrency) || concurrency <= 0) {
    throw new Error("Concurrency must be a positive number.");
  }

  const results: R[] = [];
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      const item = items[index];
      results[index] = halt?.when() ? halt.skip(item, index) : await mapper(item, index);
    }
  };

  await Promise.all(Array.from({ length: Math.min(Math.floor(concurrency), items.length) }, worker));
  return results;
}
