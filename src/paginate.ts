import { FluentAsyncIterable } from "./fluent";

/**
 * One fetched batch of items. An empty page marks the end of the listing.
 */
export type Page<T> = readonly T[];

/**
 * Fetches the page with the given 1-based index.
 */
export type PageFetcher<T> = (
  page: number,
  context: { signal?: AbortSignal },
) => Promise<Page<T>>;

/**
 * Hooks for pagination for logging and debugging etc
 */
export type PaginationHooks = {
  onPage?: (options: { page: number }) => void | Promise<void>;
  onPageFetched?: (options: {
    page: number;
    items: number;
  }) => void | Promise<void>;
  onReturn?: () => void | Promise<void>;
  /** The sequence stopped at `maxPages` before reaching an empty page. */
  onMaxPages?: (context: { pages: number }) => void | Promise<void>;
  onError?: (error: unknown, context: { page: number }) => void | Promise<void>;
};

export type PaginationOptions = {
  initialPage?: number | null;
  /** Stop after this many fetches even if the last page was not empty. */
  maxPages?: number;
  /** Aborting stops the sequence before the next fetch and is forwarded to the fetcher. */
  signal?: AbortSignal;
  hooks?: PaginationHooks;
};

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Fetches pages one at a time, starting at `initialPage`, and yields each of
 * them including the terminal empty page. Nothing is fetched after an empty
 * page, a failed fetch, an aborted signal or the consumer returning.
 */
export async function* sequencePages<T>(
  fetchPage: PageFetcher<T>,
  options: PaginationOptions = {},
): AsyncGenerator<Page<T>, void, undefined> {
  const { signal, hooks, maxPages } = options;
  const state = { nextIndex: options.initialPage ?? 1 };

  assertPositiveInteger("initialPage", state.nextIndex);
  if (maxPages !== undefined) {
    assertPositiveInteger("maxPages", maxPages);
  }

  let fetched = 0;
  let failed = false;

  try {
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition -- every exit is a return or a throw
    while (true) {
      if (signal?.aborted) return;
      if (maxPages !== undefined && fetched >= maxPages) {
        await hooks?.onMaxPages?.({ pages: fetched });
        return;
      }

      const page = state.nextIndex;
      await hooks?.onPage?.({ page });

      let items: Page<T>;
      try {
        items = await fetchPage(page, { signal });
      } catch (error) {
        // abandoned in flight
        if (signal?.aborted) return;
        await hooks?.onError?.(error, { page });
        throw error;
      }

      state.nextIndex += 1;
      fetched += 1;
      await hooks?.onPageFetched?.({ page, items: items.length });

      yield items;

      if (items.length === 0) return;
    }
  } catch (error) {
    // a throwing hook fails the sequence like a fetch error
    failed = true;
    throw error;
  } finally {
    if (!failed) {
      await hooks?.onReturn?.();
    }
  }
}

/**
 * Yields the items of each page in order and ends at the first empty page.
 * Holds at most one page at a time.
 */
export async function* flattenPages<T>(
  pages: AsyncIterable<Page<T>>,
): AsyncGenerator<T, void, undefined> {
  for await (const page of pages) {
    if (page.length === 0) return;
    yield* page;
  }
}

/**
 * Creates a fluent async iterable over every item of a page-numbered listing
 * @param fetchPage Function that fetches one page by its 1-based index
 * @param options Pagination configuration options
 *
 * @example
 * const strong = await paginate(fetchBeers)
 *   .filter((beer) => beer.abv > 15)
 *   .map((beer) => beer.name)
 *   .toArray();
 */
export function paginate<T>(
  fetchPage: PageFetcher<T>,
  options: PaginationOptions = {},
): FluentAsyncIterable<T> {
  return new FluentAsyncIterable(
    flattenPages(sequencePages(fetchPage, options)),
  );
}

/**
 * Paginates and keeps only the items the predicate accepts, in order.
 */
export function paginateWhere<T>(
  fetchPage: PageFetcher<T>,
  predicate: (item: T) => boolean,
  options: PaginationOptions = {},
): FluentAsyncIterable<T> {
  return paginate(fetchPage, options).filter(predicate);
}
