/**
 * Execution strategies for independent tasks.
 *
 * Results always come back in task order, so callers that combine them
 * (e.g. lowest-match-wins) see the same input whichever strategy ran.
 */

export type Task<T> = () => Promise<T>;

export interface ExecutionStrategy {
  readonly name: string;
  run<T>(tasks: Task<T>[]): Promise<T[]>;
}

export const sequential: ExecutionStrategy = {
  name: 'sequential',
  async run<T>(tasks: Task<T>[]): Promise<T[]> {
    const results: T[] = [];
    for (const task of tasks) {
      results.push(await task());
    }
    return results;
  },
};

/**
 * Bounded parallelism: slices of `batchSize` tasks run together with Promise.all
 */
export function batched(batchSize: number): ExecutionStrategy {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`batchSize must be a positive integer, got ${batchSize}`);
  }
  if (batchSize === 1) {
    return sequential;
  }

  return {
    name: `batched(${batchSize})`,
    async run<T>(tasks: Task<T>[]): Promise<T[]> {
      const results: T[] = [];
      for (let i = 0; i < tasks.length; i += batchSize) {
        const batch = tasks.slice(i, i + batchSize);
        results.push(...(await Promise.all(batch.map(task => task()))));
      }
      return results;
    },
  };
}
