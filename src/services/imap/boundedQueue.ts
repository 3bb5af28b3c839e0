/**
 * Fixed-capacity async queue used between pipeline stages. `push` waits while
 * the queue is full, which is what throttles a fast producer behind a slow
 * consumer. Closing wakes everyone: pending pushes resolve `false`, readers
 * drain what is buffered and then finish.
 */
export type BoundedQueue<T> = AsyncIterable<T> & {
  push: (item: T) => Promise<boolean>;
  shift: () => Promise<IteratorResult<T, undefined>>;
  close: () => void;
  readonly closed: boolean;
  readonly size: number;
};

export const createBoundedQueue = <T>(capacity = 1): BoundedQueue<T> => {
  const limit = Number.isFinite(capacity) && capacity > 0 ? Math.floor(capacity) : 1;
  const items: T[] = [];
  const spaceWaiters: Array<() => void> = [];
  const itemWaiters: Array<() => void> = [];
  let closed = false;

  const wakeAll = (waiters: Array<() => void>) => {
    for (const wake of waiters.splice(0)) {
      wake();
    }
  };

  const push = async (item: T): Promise<boolean> => {
    while (!closed && items.length >= limit) {
      await new Promise<void>((resolve) => spaceWaiters.push(resolve));
    }
    if (closed) {
      return false;
    }
    items.push(item);
    itemWaiters.shift()?.();
    return true;
  };

  const shift = async (): Promise<IteratorResult<T, undefined>> => {
    while (items.length === 0 && !closed) {
      await new Promise<void>((resolve) => itemWaiters.push(resolve));
    }
    if (items.length === 0) {
      return { done: true, value: undefined };
    }
    const [value] = items.splice(0, 1);
    spaceWaiters.shift()?.();
    return { done: false, value };
  };

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    wakeAll(spaceWaiters);
    wakeAll(itemWaiters);
  };

  return {
    push,
    shift,
    close,
    get closed() {
      return closed;
    },
    get size() {
      return items.length;
    },
    [Symbol.asyncIterator]: () => ({ next: shift }),
  };
};
