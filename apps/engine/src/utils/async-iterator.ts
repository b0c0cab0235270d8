export type AsyncEventIteratorOptions<T> = {
  /** Aborting closes the iterator after already-queued events are yielded */
  signal?: AbortSignal;
  /** Close the iterator right after yielding an event that matches */
  until?: (event: T) => boolean;
};

export type AsyncEventIterator<T> = {
  iterator: AsyncIterable<T>;
  /** Stop accepting events; queued events are still yielded */
  close: () => void;
};

/**
 * Creates an async iterable from a subscription-based event source.
 *
 * Events are queued when the consumer isn't ready, and yielded immediately
 * when it is waiting. The subscription is taken eagerly, so events emitted
 * before the first `next()` are not lost.
 */
export function createAsyncEventIterator<T>(
  subscribe: (handler: (event: T) => void) => () => void,
  options: AsyncEventIteratorOptions<T> = {}
): AsyncEventIterator<T> {
  const { signal, until } = options;
  const queue: T[] = [];
  let wake: (() => void) | null = null;
  let closed = false;

  const notify = () => {
    const pending = wake;
    wake = null;
    pending?.();
  };

  const unsubscribe = subscribe((event) => {
    if (closed) {
      return;
    }
    queue.push(event);
    if (until?.(event)) {
      close();
      return;
    }
    notify();
  });

  function close() {
    if (closed) {
      return;
    }
    closed = true;
    unsubscribe();
    signal?.removeEventListener("abort", close);
    notify();
  }

  if (signal?.aborted) {
    close();
  } else {
    signal?.addEventListener("abort", close, { once: true });
  }

  const iterator = {
    async *[Symbol.asyncIterator]() {
      try {
        while (true) {
          const next = queue.shift();
          if (next !== undefined) {
            yield next;
            continue;
          }
          if (closed) {
            return;
          }
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
        }
      } finally {
        close();
      }
    },
  } satisfies AsyncIterable<T>;

  return { iterator, close };
}
