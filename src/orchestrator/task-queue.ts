/**
 * Pending task queue
 *
 * Ordered by rank (higher first), then by sequence (lower first), so items
 * within one priority tier leave in submission order.
 */

export interface TaskQueue<T> {
  push(item: T, rank: number, seq: number): void;
  shift(): T | undefined;
  /** Remove the first item matching the predicate */
  remove(predicate: (item: T) => boolean): boolean;
  /** Empty the queue, returning items in dispatch order */
  drain(): T[];
  size(): number;
}

interface QueueEntry<T> {
  item: T;
  rank: number;
  seq: number;
}

function comesBefore<T>(a: QueueEntry<T>, b: QueueEntry<T>): boolean {
  return a.rank > b.rank || (a.rank === b.rank && a.seq < b.seq);
}

export function createTaskQueue<T>(): TaskQueue<T> {
  const entries: QueueEntry<T>[] = [];

  return {
    push(item: T, rank: number, seq: number): void {
      const entry = { item, rank, seq };
      // Binary search for the first entry the new one must precede
      let low = 0;
      let high = entries.length;
      while (low < high) {
        const mid = (low + high) >>> 1;
        const current = entries[mid];
        if (current !== undefined && comesBefore(current, entry)) {
          low = mid + 1;
        } else {
          high = mid;
        }
      }
      entries.splice(low, 0, entry);
    },

    shift(): T | undefined {
      return entries.shift()?.item;
    },

    remove(predicate: (item: T) => boolean): boolean {
      const index = entries.findIndex((entry) => predicate(entry.item));
      if (index === -1) {
        return false;
      }
      entries.splice(index, 1);
      return true;
    },

    drain(): T[] {
      return entries.splice(0, entries.length).map((entry) => entry.item);
    },

    size(): number {
      return entries.length;
    },
  };
}
