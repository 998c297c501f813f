import { z } from "zod";
import { FetchError } from "./errors";
import type { Page, PageFetcher } from "./paginate";

// Upstream objects carry many more fields; z.object strips them.
export const beerSchema = z.object({
  name: z.string(),
  tagline: z.string(),
  abv: z.number(),
});

export const beerPageSchema = z.array(beerSchema);

export type Beer = Readonly<z.infer<typeof beerSchema>>;

export type HttpFetch = (input: URL, init: RequestInit) => Promise<Response>;

export type BeerClientOptions = {
  baseUrl: string;
  /** Sent as `per_page` when set. */
  perPage?: number;
  timeoutMs?: number;
  fetch?: HttpFetch;
};

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Validates a decoded response body as one page of beers.
 */
export function parseBeerPage(body: unknown, page: number): Page<Beer> {
  const parsed = beerPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new FetchError(`Unexpected response shape for page ${page}`, {
      page,
      kind: "decode",
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Creates a page fetcher for a beer listing that takes a 1-based `page`
 * query parameter and answers an out-of-range page with `[]`.
 */
export function createBeerClient(options: BeerClientOptions): PageFetcher<Beer> {
  const httpFetch: HttpFetch = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return async (page, { signal }) => {
    const url = new URL(options.baseUrl);
    url.searchParams.set("page", String(page));
    if (options.perPage !== undefined) {
      url.searchParams.set("per_page", String(options.perPage));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await httpFetch(url, {
          headers: { accept: "application/json" },
          signal: controller.signal,
        });
      } catch (error) {
        throw new FetchError(`Request for page ${page} failed`, {
          page,
          kind: "network",
          cause: error,
        });
      }

      if (!response.ok) {
        // release the connection; the error body is not used
        await response.body?.cancel();
        throw new FetchError(
          `Upstream responded ${response.status} for page ${page}`,
          { page, kind: "status", status: response.status },
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new FetchError(`Malformed JSON body for page ${page}`, {
          page,
          kind: "decode",
          cause: error,
        });
      }

      return parseBeerPage(body, page);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  };
}

export function strongerThan(minAbv: number): (beer: Beer) => boolean {
  return (beer) => beer.abv > minAbv;
}
