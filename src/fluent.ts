type Predicate<T> = (item: T, index: number) => boolean | Promise<boolean>;

/**
 * Chainable wrapper over an async iterable. `filter`, `map` and `take` are
 * lazy; `toArray` and `forEach` drive the chain one item per pull.
 */
export class FluentAsyncIterable<T> implements AsyncIterable<T> {
  constructor(private source: AsyncIterable<T>) {}

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.source[Symbol.asyncIterator]();
  }

  filter(predicate: Predicate<T>): FluentAsyncIterable<T> {
    return new FluentAsyncIterable(filter(this.source, predicate));
  }

  map<U>(
    transform: (item: T, index: number) => U | Promise<U>,
  ): FluentAsyncIterable<U> {
    return new FluentAsyncIterable(map(this.source, transform));
  }

  take(count: number): FluentAsyncIterable<T> {
    return new FluentAsyncIterable(take(this.source, count));
  }

  toArray(): Promise<T[]> {
    return toArray(this.source);
  }

  forEach(fn: (item: T, index: number) => void | Promise<void>): Promise<void> {
    return forEach(this.source, fn);
  }
}

export async function toArray<T>(source: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = [];
  for await (const item of source) {
    collected.push(item);
  }
  return collected;
}

/**
 * Runs `fn` on every item, awaiting it before the next pull, so a slow
 * consumer holds back the source.
 */
export async function forEach<T>(
  source: AsyncIterable<T>,
  fn: (item: T, index: number) => void | Promise<void>,
): Promise<void> {
  let position = 0;
  for await (const item of source) {
    await fn(item, position);
    position += 1;
  }
}

/**
 * Passes through the items `predicate` accepts, in order, deciding each one
 * as it arrives.
 */
export async function* filter<T>(
  source: AsyncIterable<T>,
  predicate: Predicate<T>,
): AsyncGenerator<T, void, undefined> {
  let position = 0;
  for await (const item of source) {
    const keep = await predicate(item, position);
    position += 1;
    if (keep) yield item;
  }
}

export async function* map<T, U>(
  source: AsyncIterable<T>,
  transform: (item: T, index: number) => U | Promise<U>,
): AsyncGenerator<U, void, undefined> {
  let position = 0;
  for await (const item of source) {
    yield await transform(item, position);
    position += 1;
  }
}

/**
 * Yields at most `count` items, then returns the source so nothing more is
 * fetched.
 */
export async function* take<T>(
  source: AsyncIterable<T>,
  count: number,
): AsyncGenerator<T, void, undefined> {
  if (count <= 0) return;

  let remaining = count;
  for await (const item of source) {
    yield item;
    remaining -= 1;
    if (remaining === 0) return;
  }
}
