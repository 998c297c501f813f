import { describe, it, expect, vi } from "vitest";
import {
  createBeerClient,
  parseBeerPage,
  strongerThan,
  FetchError,
} from "../src/index";
import type { HttpFetch } from "../src/index";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

const upstreamBeer = {
  id: 7,
  name: "Tokyo*",
  tagline: "Intergalactic Stout.",
  first_brewed: "01/2008",
  abv: 18.2,
  ibu: 85,
};

describe("createBeerClient", () => {
  it("should request the page and decode name, tagline and abv", async () => {
    const httpFetch = vi.fn<HttpFetch>(async () => jsonResponse([upstreamBeer]));
    const fetchPage = createBeerClient({
      baseUrl: "http://beers.test/v2/beers",
      fetch: httpFetch,
    });

    const page = await fetchPage(3, {});

    expect(page).toEqual([
      { name: "Tokyo*", tagline: "Intergalactic Stout.", abv: 18.2 },
    ]);
    expect(httpFetch).toHaveBeenCalledTimes(1);
    const [url, init] = httpFetch.mock.calls[0];
    expect(url.toString()).toBe("http://beers.test/v2/beers?page=3");
    expect(init.headers).toEqual({ accept: "application/json" });
  });

  it("should send per_page when configured", async () => {
    const httpFetch = vi.fn<HttpFetch>(async () => jsonResponse([]));
    const fetchPage = createBeerClient({
      baseUrl: "http://beers.test/v2/beers?brewed_after=01-2010",
      perPage: 80,
      fetch: httpFetch,
    });

    await expect(fetchPage(1, {})).resolves.toEqual([]);

    expect(httpFetch.mock.calls[0][0].toString()).toBe(
      "http://beers.test/v2/beers?brewed_after=01-2010&page=1&per_page=80",
    );
  });

  it("should fail with a status error on a non-success response", async () => {
    const fetchPage = createBeerClient({
      baseUrl: "http://beers.test/v2/beers",
      fetch: async () => jsonResponse({ message: "nope" }, 503),
    });

    const error = await fetchPage(2, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      page: 2,
      kind: "status",
      status: 503,
      message: "Upstream responded 503 for page 2",
    });
  });

  it("should release the body of a non-success response", async () => {
    const response = jsonResponse({ message: "nope" }, 500);
    const fetchPage = createBeerClient({
      baseUrl: "http://beers.test/v2/beers",
      fetch: async () => response,
    });

    await expect(fetchPage(1, {})).rejects.toMatchObject({ kind: "status" });
    expect(response.bodyUsed).toBe(true);
  });

  it("should fail with a network error when the request rejects", async () => {
    const cause = new TypeError("fetch failed");
    const fetchPage = createBeerClient({
      baseUrl: "http://beers.test/v2/beers",
      fetch: async () => {
        throw cause;
      },
    });

    const error = await fetchPage(1, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ page: 1, kind: "network", cause });
  });

  it("should fail with a decode error on a malformed body", async () => {
    const fetchPage = createBeerClient({
      baseUrl: "http://beers.test/v2/beers",
      fetch: async () => new Response("<html>", { status: 200 }),
    });

    await expect(fetchPage(1, {})).rejects.toMatchObject({
      name: "FetchError",
      kind: "decode",
      message: "Malformed JSON body for page 1",
    });
  });

  it("should abort the request when the caller's signal aborts", async () => {
    const controller = new AbortController();
    let requestSignal: AbortSignal | undefined;
    const fetchPage = createBeerClient({
      baseUrl: "http://beers.test/v2/beers",
      fetch: (_url, init) => {
        requestSignal = init.signal ?? undefined;
        return new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () =>
            reject(new Error("aborted")),
          );
        });
      },
    });

    const pending = fetchPage(1, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: "network" });
    expect(requestSignal?.aborted).toBe(true);
  });

  it("should abort the request after timeoutMs", async () => {
    vi.useFakeTimers();
    try {
      const fetchPage = createBeerClient({
        baseUrl: "http://beers.test/v2/beers",
        timeoutMs: 50,
        fetch: (_url, init) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener("abort", () =>
              reject(new Error("aborted")),
            );
          }),
      });

      const pending = fetchPage(1, {});
      const assertion = expect(pending).rejects.toMatchObject({
        kind: "network",
        message: "Request for page 1 failed",
      });
      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("parseBeerPage", () => {
  it("should reject objects missing a required field", () => {
    expect(() =>
      parseBeerPage([{ name: "Punk IPA", abv: 5.6 }], 4),
    ).toThrow("Unexpected response shape for page 4");
  });

  it("should reject a body that is not an array", () => {
    expect(() => parseBeerPage({ beers: [] }, 1)).toThrow(FetchError);
  });

  it("should accept an empty page", () => {
    expect(parseBeerPage([], 9)).toEqual([]);
  });
});

describe("strongerThan", () => {
  it("should accept only beers strictly above the threshold", () => {
    const predicate = strongerThan(15);

    expect(predicate({ name: "a", tagline: "", abv: 15.01 })).toBe(true);
    expect(predicate({ name: "b", tagline: "", abv: 15 })).toBe(false);
    expect(predicate({ name: "c", tagline: "", abv: 4.5 })).toBe(false);
  });
});
