/**
 * Bounded worker pool over lanes
 *
 * Items of one lane run strictly in order, one at a time. Lanes interleave:
 * a slot takes the next item of the lane at the head of the queue and, when
 * the lane has more, puts it back at the tail.
 */

export interface LanePoolOptions {
  concurrency: number;
  /** Once aborted, no further items are started */
  signal?: AbortSignal;
}

interface LaneCursor<T> {
  items: readonly T[];
  next: number;
}

/**
 * Run every item through `worker`
 *
 * A worker failure stops the pool from starting new items; the first failure
 * is rethrown once the running items have finished.
 */
export async function runLanes<T>(
  lanes: ReadonlyArray<readonly T[]>,
  options: LanePoolOptions,
  worker: (item: T) => Promise<void>
): Promise<void> {
  const queue: LaneCursor<T>[] = lanes
    .filter((items) => items.length > 0)
    .map((items) => ({ items, next: 0 }));

  let failure: { error: unknown } | undefined;
  const stopped = (): boolean => failure !== undefined || options.signal?.aborted === true;

  const slot = async (): Promise<void> => {
    while (!stopped()) {
      const lane = queue.shift();
      if (!lane) {
        return;
      }
      const item = lane.items[lane.next];
      lane.next++;
      if (item === undefined) {
        continue;
      }

      try {
        await worker(item);
      } catch (error) {
        failure ??= { error };
        return;
      }

      if (lane.next < lane.items.length) {
        queue.push(lane);
      }
    }
  };

  const slotCount = Math.max(1, Math.min(options.concurrency, queue.length));
  await Promise.all(Array.from({ length: slotCount }, () => slot()));

  if (failure) {
    throw failure.error;
  }
}
