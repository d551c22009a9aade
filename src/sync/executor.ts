import { errorMessage } from "../core/errors";
import { Logger } from "../observability";

export interface ExecutionFailure<T> {
  item: T;
  error: unknown;
}

export interface ExecutionOutcome<T, R> {
  results: R[];
  failures: ExecutionFailure<T>[];
}

export interface ConcurrentOptions<T> {
  concurrency: number;
  logger: Logger;
  label: string;
  describe?: (item: T) => Record<string, unknown>;
}

type WorkerResult<R> = R | R[] | undefined | null;

/**
 * Runs `worker` once per item with at most `concurrency` calls in flight and
 * flattens what they return. A failing item is logged and recorded in
 * `failures`; the others keep running. Result order is not stable.
 */
export async function runConcurrent<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<WorkerResult<R>>,
  options: ConcurrentOptions<T>,
): Promise<ExecutionOutcome<T, R>> {
  const results: R[] = [];
  const failures: ExecutionFailure<T>[] = [];
  let index = 0;

  const slots = new Array(Math.max(1, Math.min(options.concurrency, items.length))).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }

      const item = items[current];
      try {
        const value = await worker(item);
        if (value === undefined || value === null) {
          continue;
        }
        if (Array.isArray(value)) {
          results.push(...value);
        } else {
          results.push(value);
        }
      } catch (error) {
        failures.push({ item, error });
        options.logger.error(`${options.label}_item_failed`, {
          ...(options.describe ? options.describe(item) : {}),
          error: errorMessage(error),
        });
      }
    }
  });
  await Promise.all(slots);

  return { results, failures };
}
